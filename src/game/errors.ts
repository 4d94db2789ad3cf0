export type GameErrorKind =
    | 'InvalidInput'
    | 'NotFound'
    | 'InvalidPhase'
    | 'Unauthorized'
    | 'AlreadyRevealed'
    | 'CommitmentMismatch'
    | 'InsufficientFunds';

export type GameErrorCode =
    | 'InvalidStake'
    | 'InvalidCommitment'
    | 'InvalidChoice'
    | 'StakeMismatch'
    | 'GameNotFound'
    | 'InvalidPhase'
    | 'WrongPhase'
    | 'DeadlineNotReached'
    | 'SelfPlay'
    | 'NotAPlayer'
    | 'NotEntitled'
    | 'AlreadyRevealed'
    | 'CommitmentMismatch'
    | 'InsufficientFunds'
    | 'BalanceOverflow';

/**
 * HTTP status sent back for each kind of rejected operation.
 */
export const STATUS_BY_KIND: Record<GameErrorKind, number> = {
    InvalidInput: 400,
    NotFound: 404,
    InvalidPhase: 409,
    Unauthorized: 403,
    AlreadyRevealed: 409,
    CommitmentMismatch: 422,
    InsufficientFunds: 402,
};

/**
 * A rejected operation. Nothing it touched was applied.
 */
export class GameError extends Error {
    readonly kind: GameErrorKind;
    readonly code: GameErrorCode;

    constructor(kind: GameErrorKind, code: GameErrorCode, message: string) {
        super(message);
        this.name = 'GameError';
        this.kind = kind;
        this.code = code;
    }
}

/**
 * Raised when a payout would not balance a game's escrow.
 * This is a defect, never a client error.
 */
export class ValueConservationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ValueConservationError';
    }
}
