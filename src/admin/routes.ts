import { timingSafeEqual } from 'crypto';
import { NextFunction, Router, Request, Response } from 'express';
import { NotFoundError } from '../errors';
import { getBearerToken, handleRouteError, sendError } from '../http';
import { FriendStore } from '../friends/state';
import { PlayerStore } from '../player/types';

function keysMatch(presented: string, expected: string): boolean {
    const a = Buffer.from(presented, 'utf8');
    const b = Buffer.from(expected, 'utf8');
    return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Administrative operations. Every request must carry `Bearer <ADMIN_KEY>`;
 * with no key configured the whole surface is closed.
 */
export function createAdminRouter(players: PlayerStore, friends: FriendStore, adminKey: string | undefined): Router {
    const router = Router();

    router.use((req: Request, res: Response, next: NextFunction) => {
        const presented = getBearerToken(req);
        if (!adminKey || !presented || !keysMatch(presented, adminKey)) {
            return sendError(res, 403, 'Forbidden', 'Admin key required');
        }
        next();
    });

    /**
     * @route DELETE /admin/players/:id
     * Deletes a player along with their friend requests and friendships.
     */
    router.delete('/players/:id', async (req: Request, res: Response) => {
        try {
            const deleted = await players.delete(req.params.id);
            if (!deleted) {
                throw new NotFoundError('Player not found');
            }
            friends.removePlayer(req.params.id);
            res.status(204).end();
        } catch (error) {
            handleRouteError(res, error);
        }
    });

    return router;
}
