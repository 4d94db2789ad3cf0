import type { Request, Response } from 'express';
import type { PlayerRegistry } from './state';

/**
 * Resolves the caller from an `Authorization: Bearer <key>` header.
 * Sends the 401/403 response itself and returns undefined when the caller is unknown.
 */
export function requirePlayer(players: PlayerRegistry, req: Request, res: Response): string | undefined {
    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
        res.status(401).json({ error: 'Authorization header with Bearer token is required' });
        return undefined;
    }
    const key = authHeader.slice('Bearer '.length).trim();
    const playerId = players.getPlayerIdByKey(key);
    if (!playerId) {
        res.status(403).json({ error: 'Invalid authentication key' });
        return undefined;
    }
    return playerId;
}
