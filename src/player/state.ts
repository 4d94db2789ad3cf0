import { cryptoRandomId } from '../crypto';

/**
 * Manages player state, including secret keys for authentication.
 * NOTE: This is a simple in-memory store for demonstration.
 * In a real application, use a secure, persistent database and hash the secret keys.
 */
export class PlayerRegistry {
    private readonly playersByKey = new Map<string, string>(); // key -> playerId
    private readonly keysByPlayerId = new Map<string, string>(); // playerId -> key

    /**
     * Creates a new player and issues their secret key.
     * @returns The key, or undefined if the ID is already taken.
     */
    register(playerId: string): string | undefined {
        if (this.playerExists(playerId)) return undefined;
        const key = `sk_` + cryptoRandomId(); // Simple prefix for clarity
        this.playersByKey.set(key, playerId);
        this.keysByPlayerId.set(playerId, key);
        return key;
    }

    /**
     * Finds a player by their secret key.
     * @returns The playerId, or undefined if not found.
     */
    getPlayerIdByKey(key: string): string | undefined {
        return this.playersByKey.get(key);
    }

    playerExists(playerId: string): boolean {
        return this.keysByPlayerId.has(playerId);
    }

    /**
     * Returns a list of all registered player IDs.
     */
    listPlayers(): string[] {
        return Array.from(this.keysByPlayerId.keys());
    }
}
