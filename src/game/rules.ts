import type { Choice, Outcome } from './types';

// Each move defeats exactly two others.
const BEATS: Record<Choice, readonly [Choice, Choice]> = {
    rock: ['scissors', 'lizard'],
    paper: ['rock', 'spock'],
    scissors: ['paper', 'lizard'],
    lizard: ['spock', 'paper'],
    spock: ['scissors', 'rock'],
};

/**
 * Whether `a` defeats `b`.
 */
export function beats(a: Choice, b: Choice): boolean {
    return BEATS[a].includes(b);
}

/**
 * Decides a round between the first and second party.
 * For any two different moves exactly one of them wins, so a non-draw
 * that the first party does not win is won by the second.
 */
export function resolveOutcome(first: Choice, second: Choice): Outcome {
    if (first === second) return 'draw';
    return beats(first, second) ? 'first_wins' : 'second_wins';
}
