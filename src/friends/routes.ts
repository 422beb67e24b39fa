import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { ConflictError, NotFoundError, ValidationError } from '../errors';
import { handleRouteError } from '../http';
import { projectPlayer } from '../game/reconcile';
import { requirePlayer } from '../player/auth';
import { Clock, PlayerStore } from '../player/types';
import { FriendStore } from './state';

const friendRequestSchema = z.object({
    name: z.string().trim().min(1),
});

export function createFriendsRouter(players: PlayerStore, friends: FriendStore, clock: Clock): Router {
    const router = Router();

    /**
     * @route GET /friends
     * Lists the authenticated player's friends with their current score.
     */
    router.get('/', async (req: Request, res: Response) => {
        try {
            const player = await requirePlayer(players, req);
            const now = clock();
            const out: { name: string; score: number; sps: number }[] = [];
            for (const friendId of friends.listFriends(player.id)) {
                const friend = await players.findById(friendId);
                if (!friend) continue;
                const { name, score, sps } = projectPlayer(friend, now);
                out.push({ name, score, sps });
            }
            out.sort((a, b) => a.name.localeCompare(b.name));
            res.status(200).json({ friends: out });
        } catch (error) {
            handleRouteError(res, error);
        }
    });

    /**
     * @route POST /friends/requests
     * Sends a friend request to the player named in the body.
     * Body: { name }
     */
    router.post('/requests', async (req: Request, res: Response) => {
        try {
            const sender = await requirePlayer(players, req);
            const parsed = friendRequestSchema.safeParse(req.body);
            if (!parsed.success) {
                throw new ValidationError('name is required', parsed.error.flatten());
            }
            const recipient = await players.findByName(parsed.data.name);
            if (!recipient) {
                throw new NotFoundError('Player not found');
            }
            if (recipient.id === sender.id) {
                throw new ValidationError('Cannot send a friend request to yourself');
            }
            if (friends.areFriends(sender.id, recipient.id)) {
                throw new ConflictError(`Already friends with ${recipient.name}`);
            }
            if (friends.hasPendingBetween(sender.id, recipient.id)) {
                throw new ConflictError(`A friend request with ${recipient.name} is already pending`);
            }
            const request = friends.createRequest(sender.id, recipient.id, clock());
            res.status(201).json({ requestId: request.requestId });
        } catch (error) {
            handleRouteError(res, error);
        }
    });

    /**
     * @route GET /friends/requests
     * Fetches all pending friend requests addressed to the authenticated player.
     */
    router.get('/requests', async (req: Request, res: Response) => {
        try {
            const player = await requirePlayer(players, req);
            const out: { requestId: string; from: string; createdAt: string }[] = [];
            for (const request of friends.getPendingForRecipient(player.id)) {
                const sender = await players.findById(request.senderId);
                if (!sender) continue;
                out.push({ requestId: request.requestId, from: sender.name, createdAt: request.createdAt });
            }
            res.status(200).json({ requests: out });
        } catch (error) {
            handleRouteError(res, error);
        }
    });

    const resolve = (decision: 'accepted' | 'rejected') => async (req: Request, res: Response) => {
        try {
            const player = await requirePlayer(players, req);
            const request = friends.getRequest(req.params.requestId);
            if (!request || request.recipientId !== player.id || request.status !== 'pending') {
                throw new NotFoundError('Friend request not found or not authorized');
            }
            friends.resolveRequest(request.requestId, decision);
            res.status(200).json({ requestId: request.requestId, status: decision });
        } catch (error) {
            handleRouteError(res, error);
        }
    };

    /**
     * @route POST /friends/requests/:requestId/accept
     * Recipient accepts a pending request; both players become friends.
     */
    router.post('/requests/:requestId/accept', resolve('accepted'));

    /**
     * @route POST /friends/requests/:requestId/reject
     * Recipient declines a pending request.
     */
    router.post('/requests/:requestId/reject', resolve('rejected'));

    /**
     * @route DELETE /friends/:name
     * Ends a friendship with the named player.
     */
    router.delete('/:name', async (req: Request, res: Response) => {
        try {
            const player = await requirePlayer(players, req);
            const friend = await players.findByName(req.params.name);
            if (!friend || !friends.removeFriendship(player.id, friend.id)) {
                throw new NotFoundError('Not friends with that player');
            }
            res.status(204).end();
        } catch (error) {
            handleRouteError(res, error);
        }
    });

    return router;
}
