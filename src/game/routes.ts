import { Router, Request, Response } from 'express';
import { AuthenticationError, RateLimitError } from '../errors';
import { getBearerToken, handleRouteError } from '../http';
import { Clock, PlayerRecord, PlayerStore } from '../player/types';
import { parseActionBatch } from './reconcile';
import { applyActionBatch } from './service';
import { UpgradeCatalog } from './types';
import { upgradeCost } from './upgrades';

export type GameRouterOptions = {
    store: PlayerStore;
    catalog: UpgradeCatalog;
    clock: Clock;
    clickRatePerSecond: number;
};

export function createGameRouter(options: GameRouterOptions): Router {
    const { store, catalog, clock, clickRatePerSecond } = options;
    const router = Router();

    /**
     * @route POST /game/actions
     * Applies a batch of clicks and upgrade purchases for the bearer's player.
     * The batch is applied whole or not at all.
     */
    router.post('/actions', async (req: Request, res: Response) => {
        try {
            const token = getBearerToken(req);
            if (!token) {
                throw new AuthenticationError('Authorization header with Bearer token is required');
            }
            const actions = parseActionBatch(req.body);
            const result = await applyActionBatch(store, token, actions, { catalog, clock, clickRatePerSecond });
            res.status(200).json({
                message: 'Actions processed',
                score: result.record.score,
                sps: result.record.sps,
                ppc: result.record.ppc,
            });
        } catch (error) {
            if (error instanceof RateLimitError) {
                console.warn('Rejected action batch over click ceiling', {
                    clickCount: error.clickCount,
                    maxClicks: error.maxClicks,
                });
            }
            handleRouteError(res, error);
        }
    });

    /**
     * @route GET /game/upgrades
     * Lists the upgrade catalog. With a bearer token, each entry also carries
     * the caller's owned level and the price of the next one.
     */
    router.get('/upgrades', async (req: Request, res: Response) => {
        try {
            const token = getBearerToken(req);
            let player: PlayerRecord | undefined;
            if (token) {
                player = await store.lookupByToken(token);
                if (!player) {
                    throw new AuthenticationError('Invalid authentication token');
                }
            }
            const upgrades = Array.from(catalog.values(), definition => {
                const level = player?.upgrades[definition.id] ?? 0;
                return {
                    ...definition,
                    ...(player ? { level, nextCost: upgradeCost(definition, level) } : {}),
                };
            });
            res.status(200).json({ upgrades });
        } catch (error) {
            handleRouteError(res, error);
        }
    });

    return router;
}
