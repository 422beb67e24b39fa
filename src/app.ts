import cors from 'cors';
import express, { Express } from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import { AppConfig } from './config';
import { errorHandler } from './http';
import { createAdminRouter } from './admin/routes';
import { createAiRouter } from './ai/routes';
import { createUnavailableGenerator, UpgradeGenerator } from './ai/generator';
import { createFriendsRouter } from './friends/routes';
import { createInMemoryFriendStore, FriendStore } from './friends/state';
import { createGameRouter } from './game/routes';
import { UpgradeCatalog } from './game/types';
import { createUpgradeCatalog } from './game/upgrades';
import { createLeaderboardRouter } from './leaderboard/routes';
import { createPlayerRouter } from './player/routes';
import { createInMemoryPlayerStore } from './player/state';
import { Clock, PlayerStore } from './player/types';

export type AppDependencies = {
    config: AppConfig;
    clock?: Clock;
    players?: PlayerStore;
    friends?: FriendStore;
    catalog?: UpgradeCatalog;
    generator?: UpgradeGenerator;
};

/**
 * Builds the Express application. Stores default to in-memory ones.
 */
export function createApp(deps: AppDependencies): Express {
    const { config } = deps;
    const clock = deps.clock ?? (() => new Date());
    const players = deps.players ?? createInMemoryPlayerStore(clock);
    const friends = deps.friends ?? createInMemoryFriendStore();
    const catalog = deps.catalog ?? createUpgradeCatalog();
    const generator = deps.generator ?? createUnavailableGenerator();

    const app = express();
    app.use(helmet());
    app.use(
        cors({
            origin: config.corsOrigin,
            methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
            allowedHeaders: ['Content-Type', 'Authorization'],
        }),
    );
    if (config.logFormat !== 'none') {
        app.use(morgan(config.logFormat));
    }
    // Middleware to parse JSON bodies.
    app.use(express.json({ limit: '1mb' }));

    // A simple health check endpoint.
    app.get('/health', (_req, res) => {
        res.status(200).json({ ok: true });
    });

    // Registration, player lookups and token checks live at the root.
    app.use('/', createPlayerRouter(players, clock));
    app.use('/game', createGameRouter({ store: players, catalog, clock, clickRatePerSecond: config.clickRatePerSecond }));
    app.use('/leaderboard', createLeaderboardRouter(players, clock, config.leaderboardSize));
    app.use('/friends', createFriendsRouter(players, friends, clock));
    app.use('/ai', createAiRouter(players, generator));
    app.use('/admin', createAdminRouter(players, friends, config.adminKey));

    app.use(errorHandler);

    return app;
}
