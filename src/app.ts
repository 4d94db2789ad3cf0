import express, { type Express } from 'express';
import { gameRoutes } from './game/routes';
import { GameStateMachine, type MachineOptions } from './game/machine';
import { GameRecordStore } from './game/state';
import { playerRoutes } from './player/routes';
import { PlayerRegistry } from './player/state';
import { walletRoutes } from './wallet/routes';
import { Ledger } from './wallet/state';

export type AppContext = {
    app: Express;
    machine: GameStateMachine;
    ledger: Ledger;
    players: PlayerRegistry;
};

/**
 * Wires the stores, the state machine and the routes into an Express app.
 */
export function createApp(options: MachineOptions): AppContext {
    const ledger = new Ledger();
    const players = new PlayerRegistry();
    const machine = new GameStateMachine(new GameRecordStore(), ledger, options);

    const app = express();
    // Middleware to parse JSON bodies.
    app.use(express.json({ limit: '1mb' }));

    // A simple health check endpoint.
    app.get('/health', (_req, res) => {
        res.status(200).json({ ok: true });
    });

    app.use('/game', gameRoutes(machine, players));

    // Mount the wallet routes under the /wallet path (NOT FOR PRODUCTION)
    app.use('/wallet', walletRoutes(ledger));

    app.use('/player', playerRoutes(players));

    return { app, machine, ledger, players };
}
