import { isCommitment, verifyCommitment } from '../crypto';
import type { Ledger } from '../wallet/state';
import { GameError } from './errors';
import { refundOpenGame, resolveAndPay } from './payout';
import { resolveOutcome } from './rules';
import type { GameRecordStore } from './state';
import { CHOICES, type Choice, type GameEvent, type GameRecord, type Outcome } from './types';

export type MachineOptions = {
    joinTimeoutMs: number;
    revealTimeoutMs: number;
    now?: () => number;
};

export type GameListener = (event: GameEvent) => void;

function isChoice(value: unknown): value is Choice {
    return typeof value === 'string' && (CHOICES as readonly string[]).includes(value);
}

function assertCommitment(commitment: string): void {
    if (!isCommitment(commitment)) {
        throw new GameError('InvalidInput', 'InvalidCommitment', 'commitment must be a 64-character lowercase hex digest');
    }
}

function notFound(id: number): GameError {
    return new GameError('NotFound', 'GameNotFound', `game ${id} not found`);
}

/**
 * Drives each game through open -> joined -> first_revealed -> finished.
 *
 * Every public operation is all-or-nothing: it works on a copy of the record,
 * buffers its events, and on any throw restores the ledger to the snapshot
 * taken when it started. Nothing is saved or published until it succeeds.
 */
export class GameStateMachine {
    private readonly listeners = new Set<GameListener>();
    private readonly now: () => number;

    constructor(
        private readonly store: GameRecordStore,
        private readonly ledger: Ledger,
        private readonly options: MachineOptions,
    ) {
        this.now = options.now ?? Date.now;
    }

    /**
     * Registers an observer for committed events.
     * @returns A function that removes the observer.
     */
    subscribe(listener: GameListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    getGame(id: number): GameRecord | undefined {
        return this.store.get(id);
    }

    listGames(): GameRecord[] {
        return this.store.list();
    }

    listEvents(id: number): GameEvent[] {
        return this.store.listEvents(id);
    }

    /**
     * Opens a game and escrows the creator's stake.
     */
    createGame(caller: string, commitment: string, stake: number): GameRecord {
        return this.atomically(emit => {
            if (!Number.isSafeInteger(stake) || stake <= 0) {
                throw new GameError('InvalidInput', 'InvalidStake', 'stake must be a positive integer');
            }
            assertCommitment(commitment);
            if (this.ledger.getBalance(caller) < stake) {
                throw new GameError('InsufficientFunds', 'InsufficientFunds', 'Insufficient funds for stake');
            }

            const now = this.now();
            const id = this.store.create({
                createdAt: now,
                updatedAt: now,
                deadline: now + this.options.joinTimeoutMs,
                stake,
                phase: 'open',
                firstParty: caller,
                firstCommitment: commitment,
            });
            this.ledger.deposit(id, caller, stake);
            emit({ type: 'GameCreated', gameId: id, firstParty: caller, stake, at: now });
            return this.mustGet(id);
        });
    }

    /**
     * Accepts an open game with a matching stake.
     */
    joinGame(caller: string, id: number, commitment: string, stake: number): GameRecord {
        return this.atomically(emit =>
            this.mutate(id, game => {
                if (game.phase !== 'open') {
                    throw new GameError('InvalidPhase', 'InvalidPhase', 'game is not open for joining');
                }
                if (caller === game.firstParty) {
                    throw new GameError('Unauthorized', 'SelfPlay', 'cannot join your own game');
                }
                if (stake !== game.stake) {
                    throw new GameError('InvalidInput', 'StakeMismatch', `stake must match the creator's stake of ${game.stake}`);
                }
                assertCommitment(commitment);
                this.ledger.deposit(id, caller, stake);

                const now = this.now();
                game.secondParty = caller;
                game.secondCommitment = commitment;
                game.phase = 'joined';
                game.updatedAt = now;
                game.deadline = now + this.options.revealTimeoutMs;
                emit({ type: 'GameJoined', gameId: id, secondParty: caller, at: now });
            }),
        );
    }

    /**
     * Discloses a committed move. The first party must go first; the second
     * party's reveal settles the game in the same operation.
     */
    reveal(caller: string, id: number, choice: unknown, secret: string): GameRecord {
        return this.atomically(emit => {
            if (!isChoice(choice)) {
                throw new GameError('InvalidInput', 'InvalidChoice', `choice must be one of ${CHOICES.join(', ')}`);
            }
            const move: Choice = choice;
            return this.mutate(id, game => {
                const now = this.now();
                if (caller === game.firstParty) {
                    if (game.firstChoice !== undefined) {
                        throw new GameError('AlreadyRevealed', 'AlreadyRevealed', 'move already revealed');
                    }
                    if (game.phase !== 'joined') {
                        throw new GameError('InvalidPhase', 'WrongPhase', 'the first party can only reveal once the game is joined');
                    }
                    this.checkReveal(move, secret, game.firstCommitment);
                    game.firstChoice = move;
                    game.phase = 'first_revealed';
                    game.deadline = now + this.options.revealTimeoutMs;
                } else if (caller === game.secondParty) {
                    if (game.secondChoice !== undefined) {
                        throw new GameError('AlreadyRevealed', 'AlreadyRevealed', 'move already revealed');
                    }
                    if (game.phase !== 'first_revealed') {
                        throw new GameError('InvalidPhase', 'WrongPhase', 'the second party reveals after the first party');
                    }
                    this.checkReveal(move, secret, game.secondCommitment);
                    game.secondChoice = move;
                } else {
                    throw new GameError('Unauthorized', 'NotAPlayer', 'caller is not a player in this game');
                }
                game.updatedAt = now;
                emit({ type: 'MoveRevealed', gameId: id, party: caller, choice: move, at: now });

                if (game.firstChoice !== undefined && game.secondChoice !== undefined) {
                    this.finish(game, resolveOutcome(game.firstChoice, game.secondChoice), 'played', emit);
                }
            });
        });
    }

    /**
     * Closes a game whose deadline passed while waiting on one party.
     * An unjoined game is refunded to its creator; a stalled reveal
     * forfeits the pot to the party who is not stalling.
     */
    claimTimeout(caller: string, id: number): GameRecord {
        return this.atomically(emit =>
            this.mutate(id, game => {
                if (game.phase === 'finished') {
                    throw new GameError('InvalidPhase', 'InvalidPhase', 'game already finished');
                }
                if (caller !== game.firstParty && caller !== game.secondParty) {
                    throw new GameError('Unauthorized', 'NotAPlayer', 'caller is not a player in this game');
                }
                const now = this.now();
                if (now <= game.deadline) {
                    throw new GameError('InvalidPhase', 'DeadlineNotReached', 'deadline has not passed yet');
                }

                const claimant = game.phase === 'joined' ? game.secondParty : game.firstParty;
                if (caller !== claimant) {
                    throw new GameError('Unauthorized', 'NotEntitled', 'only the waiting party can claim this timeout');
                }

                if (game.phase === 'open') {
                    const payouts = refundOpenGame(this.ledger, game);
                    game.phase = 'finished';
                    game.updatedAt = now;
                    game.settlement = { reason: 'cancelled', payouts, finishedAt: now };
                    emit({ type: 'GameCancelled', gameId: id, refund: game.stake, at: now });
                    return;
                }
                this.finish(game, game.phase === 'joined' ? 'second_wins' : 'first_wins', 'forfeit', emit);
            }),
        );
    }

    private checkReveal(choice: Choice, secret: string, commitment: string | undefined): void {
        if (commitment === undefined || !verifyCommitment(choice, secret, commitment)) {
            throw new GameError('CommitmentMismatch', 'CommitmentMismatch', 'choice and secret do not match the commitment');
        }
    }

    // The single point where escrow leaves a played game.
    private finish(game: GameRecord, outcome: Outcome, reason: 'played' | 'forfeit', emit: (event: GameEvent) => void): void {
        const now = this.now();
        const payouts = resolveAndPay(this.ledger, game, outcome);
        const winner = outcome === 'first_wins' ? game.firstParty : outcome === 'second_wins' ? game.secondParty : undefined;

        game.phase = 'finished';
        game.updatedAt = now;
        game.settlement = { reason, outcome, winner, payouts, finishedAt: now };
        if (winner === undefined) {
            emit({ type: 'GameDraw', gameId: game.id, at: now });
        } else {
            emit({ type: 'GameFinished', gameId: game.id, winner, prize: game.stake * 2, at: now });
        }
    }

    private mustGet(id: number): GameRecord {
        const game = this.store.get(id);
        if (!game) throw notFound(id);
        return game;
    }

    private mutate(id: number, mutation: (draft: GameRecord) => void): GameRecord {
        const game = this.store.update(id, mutation);
        if (!game) throw notFound(id);
        return game;
    }

    private atomically<T>(work: (emit: (event: GameEvent) => void) => T): T {
        const snapshot = this.ledger.snapshot();
        const pending: GameEvent[] = [];
        let result: T;
        try {
            result = work(event => pending.push(event));
        } catch (err) {
            this.ledger.restore(snapshot);
            throw err;
        }
        // Committed: the audit log is written in full before any observer runs.
        for (const event of pending) {
            this.store.appendEvent(event);
            console.log(`[game ${event.gameId}] ${event.type}`);
        }
        for (const event of pending) {
            for (const listener of this.listeners) {
                try {
                    listener(event);
                } catch (err) {
                    console.error(`Listener failed on ${event.type} for game ${event.gameId}:`, err);
                }
            }
        }
        return result;
    }
}
