import { GameError, ValueConservationError } from '../game/errors';

/**
 * Point-in-time copy of the ledger, used to undo a failed operation.
 */
export type LedgerSnapshot = {
    balances: Map<string, number>;
    escrow: Map<number, number>;
};

/**
 * Manages the in-memory ledger for player balances and the stakes held for each game.
 * For simplicity, amounts are stored in maps in memory.
 * In a real application, this should be a persistent database.
 */
export class Ledger {
    private balances = new Map<string, number>();
    private escrow = new Map<number, number>();

    /**
     * Gets the balance for a given player.
     * @returns The player's current balance, or 0 if they have no record.
     */
    getBalance(playerId: string): number {
        return this.balances.get(playerId) ?? 0;
    }

    /**
     * Adds a specified amount to a player's balance.
     * @returns The new balance.
     */
    addToBalance(playerId: string, amount: number): number {
        const newBalance = this.getBalance(playerId) + amount;
        if (!Number.isSafeInteger(newBalance)) {
            throw new GameError('InvalidInput', 'BalanceOverflow', `balance of ${playerId} would exceed the largest safe amount`);
        }
        this.balances.set(playerId, newBalance);
        return newBalance;
    }

    /**
     * Subtracts a specified amount from a player's balance.
     * @returns The new balance.
     */
    subtractFromBalance(playerId: string, amount: number): number {
        const newBalance = this.getBalance(playerId) - amount;
        this.balances.set(playerId, newBalance);
        return newBalance;
    }

    /**
     * Amount currently held in escrow for a game.
     */
    escrowed(gameId: number): number {
        return this.escrow.get(gameId) ?? 0;
    }

    /**
     * Moves a stake from a player's balance into a game's escrow.
     */
    deposit(gameId: number, playerId: string, amount: number): void {
        if (this.getBalance(playerId) < amount) {
            throw new GameError('InsufficientFunds', 'InsufficientFunds', 'Insufficient funds for stake');
        }
        this.subtractFromBalance(playerId, amount);
        this.escrow.set(gameId, this.escrowed(gameId) + amount);
    }

    /**
     * Releases funds held for a game to a recipient.
     */
    payout(gameId: number, recipient: string, amount: number): void {
        const held = this.escrowed(gameId);
        if (amount <= 0 || amount > held) {
            throw new ValueConservationError(`payout of ${amount} from game ${gameId} exceeds escrow of ${held}`);
        }
        this.escrow.set(gameId, held - amount);
        this.addToBalance(recipient, amount);
    }

    snapshot(): LedgerSnapshot {
        return { balances: new Map(this.balances), escrow: new Map(this.escrow) };
    }

    restore(snapshot: LedgerSnapshot): void {
        this.balances = new Map(snapshot.balances);
        this.escrow = new Map(snapshot.escrow);
    }
}
