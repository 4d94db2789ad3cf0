/**
 * The five legal moves, in the order of their commitment codes.
 */
export const CHOICES = ['rock', 'paper', 'scissors', 'lizard', 'spock'] as const;

export type Choice = (typeof CHOICES)[number];

/**
 * Byte value hashed in place of each choice when computing a commitment.
 */
export const CHOICE_CODES: Record<Choice, number> = {
    rock: 1,
    paper: 2,
    scissors: 3,
    lizard: 4,
    spock: 5,
};

/**
 * Lifecycle of a game. Phases only move forward; 'finished' is terminal.
 */
export type GamePhase = 'open' | 'joined' | 'first_revealed' | 'finished';

export type Outcome = 'first_wins' | 'second_wins' | 'draw';

/**
 * A single transfer out of a game's escrow.
 */
export type Payout = {
    recipient: string;
    amount: number;
};

/**
 * How a finished game was closed.
 */
export type Settlement = {
    reason: 'played' | 'forfeit' | 'cancelled';
    outcome?: Outcome; // Absent for cancelled games
    winner?: string; // Absent on a draw or a cancellation
    payouts: Payout[];
    finishedAt: number;
};

/**
 * Represents the state of a single wagered game.
 */
export type GameRecord = {
    id: number; // Unique identifier, starting at 1; 0 never names a game
    createdAt: number; // Timestamp of game creation
    updatedAt: number; // Timestamp of the last accepted operation
    deadline: number; // Timestamp after which the waiting party may claim a timeout
    stake: number; // What each party puts in escrow
    phase: GamePhase;
    firstParty: string;
    firstCommitment: string;
    firstChoice?: Choice; // Set once the first party reveals
    secondParty?: string; // Set once someone joins
    secondCommitment?: string;
    secondChoice?: Choice;
    settlement?: Settlement; // Set exactly once, when the game finishes
};

/**
 * Notifications published after an operation commits.
 */
export type GameEvent =
    | { type: 'GameCreated'; gameId: number; firstParty: string; stake: number; at: number }
    | { type: 'GameJoined'; gameId: number; secondParty: string; at: number }
    | { type: 'MoveRevealed'; gameId: number; party: string; choice: Choice; at: number }
    | { type: 'GameFinished'; gameId: number; winner: string; prize: number; at: number }
    | { type: 'GameDraw'; gameId: number; at: number }
    | { type: 'GameCancelled'; gameId: number; refund: number; at: number };
