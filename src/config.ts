import 'dotenv/config';

// This module is responsible for loading and validating environment variables.
// It will throw an error and prevent the app from starting if a variable is malformed.

export type Config = {
    port: number;
    joinTimeoutMs: number; // How long an open game waits for an opponent before it can be cancelled
    revealTimeoutMs: number; // How long a player has to reveal before the opponent can claim
};

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isSafeInteger(value) || value <= 0) {
        throw new Error(`${name} must be a positive integer, got "${raw}". Please fix your .env file.`);
    }
    return value;
}

/**
 * Builds the application config from an environment map.
 * @param env The environment to read, usually process.env.
 */
export function readConfig(env: NodeJS.ProcessEnv): Config {
    return {
        port: readPositiveInt(env, 'PORT', 3000),
        joinTimeoutMs: readPositiveInt(env, 'JOIN_TIMEOUT_SECONDS', 3600) * 1000,
        revealTimeoutMs: readPositiveInt(env, 'REVEAL_TIMEOUT_SECONDS', 600) * 1000,
    };
}

/**
 * The session-wide config derived from the process environment.
 */
export const config = readConfig(process.env);
