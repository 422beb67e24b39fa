import { Router, Request, Response } from 'express';
import { handleRouteError } from '../http';
import { projectPlayer } from '../game/reconcile';
import { Clock, PlayerStore } from '../player/types';

export type LeaderboardEntry = {
    name: string;
    score: number;
};

/**
 * Ranks every player by score as of `now`, highest first. Equal scores are
 * ordered by name so the ranking is stable between requests.
 */
export async function buildLeaderboard(store: PlayerStore, now: Date, limit: number): Promise<LeaderboardEntry[]> {
    const players = await store.list();
    return players
        .map(player => {
            const { name, score } = projectPlayer(player, now);
            return { name, score };
        })
        .sort((a, b) => b.score - a.score || a.name.localeCompare(b.name))
        .slice(0, limit);
}

export function createLeaderboardRouter(store: PlayerStore, clock: Clock, limit: number): Router {
    const router = Router();

    /**
     * @route GET /leaderboard
     * Returns the top players as `{ name, score }`.
     */
    router.get('/', async (_req: Request, res: Response) => {
        try {
            res.status(200).json(await buildLeaderboard(store, clock(), limit));
        } catch (error) {
            handleRouteError(res, error);
        }
    });

    return router;
}
