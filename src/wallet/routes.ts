import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { GameError, STATUS_BY_KIND } from '../game/errors';
import type { Ledger } from './state';

const MintSchema = z.object({
    playerId: z.string().min(1),
    amount: z.number().int().positive().safe(),
});

export function walletRoutes(ledger: Ledger): Router {
    const router = Router();

    /**
     * @route GET /wallet/:playerId/balance
     * Retrieves the current balance for a given player.
     */
    router.get('/:playerId/balance', (req: Request, res: Response) => {
        const { playerId } = req.params;
        res.status(200).json({ playerId, balance: ledger.getBalance(playerId) });
    });

    /**
     * @route POST /wallet/mint
     * Mints a specified amount of currency for a player.
     * This is a simplified function for demonstration purposes.
     */
    router.post('/mint', (req: Request, res: Response) => {
        const parsed = MintSchema.safeParse(req.body);
        if (!parsed.success) {
            return res.status(400).json({ error: 'playerId and a positive integer amount are required', details: parsed.error.issues });
        }
        const { playerId, amount } = parsed.data;
        try {
            const newBalance = ledger.addToBalance(playerId, amount);
            res.status(200).json({ playerId, newBalance });
        } catch (err) {
            if (!(err instanceof GameError)) throw err;
            res.status(STATUS_BY_KIND[err.kind]).json({ error: err.message, kind: err.kind, code: err.code });
        }
    });

    return router;
}
