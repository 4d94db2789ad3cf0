import { createHash, randomBytes, timingSafeEqual } from 'crypto';
import { CHOICE_CODES, type Choice } from './game/types';

const COMMITMENT_PATTERN = /^[0-9a-f]{64}$/;

/**
 * Computes the commitment a player publishes before revealing.
 * The digest covers one byte for the choice followed by the UTF-8 secret,
 * so the choice boundary is never ambiguous.
 * @param choice The move being committed to.
 * @param secret The player's private salt.
 * @returns A 64-character lowercase hex SHA-256 digest.
 */
export function computeCommitment(choice: Choice, secret: string): string {
    return createHash('sha256')
        .update(Buffer.from([CHOICE_CODES[choice]]))
        .update(Buffer.from(secret, 'utf8'))
        .digest('hex');
}

/**
 * Checks that a revealed choice and secret reproduce a stored commitment.
 * A mismatch is reported as false; it is up to the caller to reject the move.
 */
export function verifyCommitment(choice: Choice, secret: string, storedDigest: string): boolean {
    if (!isCommitment(storedDigest)) return false;
    const expected = Buffer.from(computeCommitment(choice, secret), 'hex');
    const actual = Buffer.from(storedDigest, 'hex');
    return timingSafeEqual(expected, actual);
}

/**
 * Tells whether a value has the shape of a commitment digest.
 */
export function isCommitment(value: string): boolean {
    return COMMITMENT_PATTERN.test(value);
}

/**
 * Generates a fresh secret suitable for a commitment.
 * @returns A 64-character hex string.
 */
export function generateSecret(): string {
    return randomBytes(32).toString('hex');
}

/**
 * Generates a cryptographically secure random ID.
 * @returns A 32-character hex string.
 */
export function cryptoRandomId(): string {
    return randomBytes(16).toString('hex');
}
