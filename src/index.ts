import { createApp } from './app';
import { config } from './config'; // This will load and validate the environment variables

/**
 * Main application entry point.
 */
async function main() {
    const { app } = createApp({
        joinTimeoutMs: config.joinTimeoutMs,
        revealTimeoutMs: config.revealTimeoutMs,
    });

    app.listen(config.port, () => {
        console.log(`RPSLS escrow server (Express) listening on :${config.port}`);
    });
}

main().catch(console.error);
