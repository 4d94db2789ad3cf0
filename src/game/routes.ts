import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { computeCommitment, generateSecret } from '../crypto';
import { requirePlayer } from '../player/auth';
import type { PlayerRegistry } from '../player/state';
import { GameError, STATUS_BY_KIND } from './errors';
import type { GameStateMachine } from './machine';
import { CHOICES, type GameRecord } from './types';

const CommitmentRequestSchema = z.object({
    choice: z.enum(CHOICES),
    secret: z.string().min(1).optional(),
});

const StakeSchema = z.object({
    commitment: z.string(),
    stake: z.number(),
});

const RevealSchema = z.object({
    choice: z.string(),
    secret: z.string(),
});

/**
 * Public view of a game. Commitments stay visible so either party can audit them.
 */
function toView(game: GameRecord) {
    return {
        gameId: game.id,
        phase: game.phase,
        stake: game.stake,
        deadline: game.deadline,
        firstParty: game.firstParty,
        secondParty: game.secondParty ?? null,
        firstCommitment: game.firstCommitment,
        secondCommitment: game.secondCommitment ?? null,
        firstChoice: game.firstChoice ?? null,
        secondChoice: game.secondChoice ?? null,
        settlement: game.settlement ?? null,
    };
}

// Ids are positive integers; anything else cannot name a game.
function parseGameId(raw: string): number | undefined {
    if (!/^[1-9][0-9]*$/.test(raw)) return undefined;
    const id = Number(raw);
    return Number.isSafeInteger(id) ? id : undefined;
}

/**
 * Turns a rejected operation into its HTTP response. Anything that is not a
 * GameError is a server defect and is reported without details.
 */
function sendError(res: Response, err: unknown) {
    if (err instanceof GameError) {
        return res.status(STATUS_BY_KIND[err.kind]).json({ error: err.message, kind: err.kind, code: err.code });
    }
    console.error('Unexpected failure while handling a game request:', err);
    return res.status(500).json({ error: 'internal error' });
}

function gameNotFound(res: Response) {
    return res.status(404).json({ error: 'game not found', kind: 'NotFound', code: 'GameNotFound' });
}

export function gameRoutes(machine: GameStateMachine, players: PlayerRegistry): Router {
    const router = Router();

    /**
     * @route POST /game/commitment
     * Computes a commitment for a choice. A secret is generated when none is given.
     * Players who do not trust the server should compute this locally instead.
     */
    router.post('/commitment', (req: Request, res: Response) => {
        const parsed = CommitmentRequestSchema.safeParse(req.body);
        if (!parsed.success) {
            return res.status(400).json({ error: `choice must be one of ${CHOICES.join(', ')}`, details: parsed.error.issues });
        }
        const choice = parsed.data.choice;
        const secret = parsed.data.secret ?? generateSecret();
        res.status(200).json({ choice, secret, commitment: computeCommitment(choice, secret) });
    });

    /**
     * @route POST /game/create
     * Opens a game with the caller's commitment and escrows their stake.
     */
    router.post('/create', (req: Request, res: Response) => {
        const playerId = requirePlayer(players, req, res);
        if (!playerId) return;
        const parsed = StakeSchema.safeParse(req.body);
        if (!parsed.success) {
            return res.status(400).json({ error: 'commitment and stake are required', details: parsed.error.issues });
        }
        try {
            const game = machine.createGame(playerId, parsed.data.commitment, parsed.data.stake);
            res.status(201).json(toView(game));
        } catch (err) {
            sendError(res, err);
        }
    });

    /**
     * @route POST /game/:id/join
     * Joins an open game with a matching stake.
     */
    router.post('/:id/join', (req: Request, res: Response) => {
        const playerId = requirePlayer(players, req, res);
        if (!playerId) return;
        const gameId = parseGameId(req.params.id);
        if (gameId === undefined) return gameNotFound(res);
        const parsed = StakeSchema.safeParse(req.body);
        if (!parsed.success) {
            return res.status(400).json({ error: 'commitment and stake are required', details: parsed.error.issues });
        }
        try {
            const game = machine.joinGame(playerId, gameId, parsed.data.commitment, parsed.data.stake);
            res.status(200).json(toView(game));
        } catch (err) {
            sendError(res, err);
        }
    });

    /**
     * @route POST /game/:id/reveal
     * Reveals the caller's choice and secret. The second reveal settles the game.
     */
    router.post('/:id/reveal', (req: Request, res: Response) => {
        const playerId = requirePlayer(players, req, res);
        if (!playerId) return;
        const gameId = parseGameId(req.params.id);
        if (gameId === undefined) return gameNotFound(res);
        const parsed = RevealSchema.safeParse(req.body);
        if (!parsed.success) {
            return res.status(400).json({ error: 'choice and secret are required', details: parsed.error.issues });
        }
        try {
            const game = machine.reveal(playerId, gameId, parsed.data.choice, parsed.data.secret);
            res.status(200).json(toView(game));
        } catch (err) {
            sendError(res, err);
        }
    });

    /**
     * @route POST /game/:id/claim-timeout
     * Closes a game whose counterpart missed the deadline.
     */
    router.post('/:id/claim-timeout', (req: Request, res: Response) => {
        const playerId = requirePlayer(players, req, res);
        if (!playerId) return;
        const gameId = parseGameId(req.params.id);
        if (gameId === undefined) return gameNotFound(res);
        try {
            const game = machine.claimTimeout(playerId, gameId);
            res.status(200).json(toView(game));
        } catch (err) {
            sendError(res, err);
        }
    });

    /**
     * @route GET /game
     * Lists every game, oldest first.
     */
    router.get('/', (_req: Request, res: Response) => {
        res.status(200).json({ games: machine.listGames().map(toView) });
    });

    /**
     * @route GET /game/:id
     * Gets the current state of a game, including after it finished.
     */
    router.get('/:id', (req: Request, res: Response) => {
        const gameId = parseGameId(req.params.id);
        const game = gameId === undefined ? undefined : machine.getGame(gameId);
        if (!game) return gameNotFound(res);
        res.status(200).json(toView(game));
    });

    /**
     * @route GET /game/:id/events
     * Lists the notifications published for a game, oldest first.
     */
    router.get('/:id/events', (req: Request, res: Response) => {
        const gameId = parseGameId(req.params.id);
        if (gameId === undefined || !machine.getGame(gameId)) return gameNotFound(res);
        res.status(200).json({ gameId, events: machine.listEvents(gameId) });
    });

    return router;
}
