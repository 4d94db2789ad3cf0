import type { Ledger } from '../wallet/state';
import { ValueConservationError } from './errors';
import type { GameRecord, Outcome, Payout } from './types';

/**
 * Works out who receives what for a played game.
 * A draw refunds both stakes; otherwise the winner takes the pot.
 */
export function planPayouts(record: GameRecord, outcome: Outcome): Payout[] {
    if (!record.secondParty) {
        throw new ValueConservationError(`game ${record.id} has no second party to settle with`);
    }
    const pot = record.stake * 2;
    switch (outcome) {
        case 'draw':
            return [
                { recipient: record.firstParty, amount: record.stake },
                { recipient: record.secondParty, amount: record.stake },
            ];
        case 'first_wins':
            return [{ recipient: record.firstParty, amount: pot }];
        case 'second_wins':
            return [{ recipient: record.secondParty, amount: pot }];
    }
}

// Pays out the whole escrow or throws; the caller rolls the ledger back on a throw.
function settle(ledger: Ledger, gameId: number, payouts: Payout[]): Payout[] {
    const held = ledger.escrowed(gameId);
    const total = payouts.reduce((sum, p) => sum + p.amount, 0);
    if (held <= 0 || total !== held) {
        throw new ValueConservationError(`game ${gameId} would pay ${total} against escrow of ${held}`);
    }
    for (const p of payouts) {
        ledger.payout(gameId, p.recipient, p.amount);
    }
    if (ledger.escrowed(gameId) !== 0) {
        throw new ValueConservationError(`game ${gameId} left ${ledger.escrowed(gameId)} in escrow`);
    }
    return payouts;
}

/**
 * Distributes a played (or forfeited) game's pot according to its outcome.
 * @returns The transfers that were made.
 */
export function resolveAndPay(ledger: Ledger, record: GameRecord, outcome: Outcome): Payout[] {
    return settle(ledger, record.id, planPayouts(record, outcome));
}

/**
 * Returns the creator's stake for a game nobody joined.
 */
export function refundOpenGame(ledger: Ledger, record: GameRecord): Payout[] {
    return settle(ledger, record.id, [{ recipient: record.firstParty, amount: record.stake }]);
}
