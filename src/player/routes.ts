import { Router, Request, Response } from 'express';
import { z } from 'zod';
import type { PlayerRegistry } from './state';

const RegisterSchema = z.object({
    playerId: z.string().trim().min(1).max(64),
});

export function playerRoutes(players: PlayerRegistry): Router {
    const router = Router();

    /**
     * @route POST /player/register
     * Registers a new player and returns a secret key for them.
     * The key should be stored securely by the client.
     */
    router.post('/register', (req: Request, res: Response) => {
        const parsed = RegisterSchema.safeParse(req.body);
        if (!parsed.success) {
            return res.status(400).json({ error: 'playerId is required and must be a string', details: parsed.error.issues });
        }
        const { playerId } = parsed.data;

        const key = players.register(playerId);
        if (!key) {
            return res.status(409).json({ error: 'Player with this ID already exists' });
        }

        // Return the key to the user. This is the ONLY time it's sent.
        res.status(201).json({ playerId, key });
    });

    /**
     * @route GET /player/list
     * Lists all registered players (IDs only).
     */
    router.get('/list', (_req: Request, res: Response) => {
        res.status(200).json({ players: players.listPlayers() });
    });

    return router;
}
