import type { GameEvent, GameRecord } from './types';

/**
 * Owns every game record and its audit trail.
 * Records are handed out as copies, so the only way to change one is save()/update().
 * In a production environment, this would be replaced with a persistent database.
 */
export class GameRecordStore {
    private readonly games = new Map<number, GameRecord>();
    private readonly events = new Map<number, GameEvent[]>();
    // 0 is reserved to mean "no such game".
    private lastId = 0;

    /**
     * Stores a new record under a freshly allocated id.
     * @returns The new game's id.
     */
    create(record: Omit<GameRecord, 'id'>): number {
        const id = ++this.lastId;
        this.games.set(id, structuredClone({ ...record, id }));
        this.events.set(id, []);
        return id;
    }

    /**
     * Retrieves a game state by its ID.
     * @returns A copy of the record, or undefined if not found.
     */
    get(id: number): GameRecord | undefined {
        const game = this.games.get(id);
        return game ? structuredClone(game) : undefined;
    }

    /**
     * Replaces a stored record with a new version.
     */
    save(record: GameRecord): void {
        if (!this.games.has(record.id)) {
            throw new Error(`game ${record.id} was never created`);
        }
        this.games.set(record.id, structuredClone(record));
    }

    /**
     * Applies a mutation to a copy of a record and stores the result.
     * If the mutation throws, the stored record is left as it was.
     * @returns The stored record, or undefined if not found.
     */
    update(id: number, mutation: (draft: GameRecord) => void): GameRecord | undefined {
        const draft = this.get(id);
        if (!draft) return undefined;
        mutation(draft);
        this.save(draft);
        return structuredClone(draft);
    }

    /**
     * Lists every record in id order.
     */
    list(): GameRecord[] {
        return Array.from(this.games.values(), game => structuredClone(game));
    }

    appendEvent(event: GameEvent): void {
        const log = this.events.get(event.gameId);
        if (!log) {
            throw new Error(`game ${event.gameId} was never created`);
        }
        log.push(structuredClone(event));
    }

    /**
     * Lists the events published for a game, oldest first.
     */
    listEvents(gameId: number): GameEvent[] {
        return (this.events.get(gameId) ?? []).map(event => structuredClone(event));
    }
}
