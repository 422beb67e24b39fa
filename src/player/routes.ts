import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { NotFoundError, ValidationError } from '../errors';
import { getBearerToken, handleRouteError } from '../http';
import { projectPlayer } from '../game/reconcile';
import { Clock, PlayerStore } from './types';

const registerSchema = z.object({
    name: z.string().trim().min(1).max(32),
});

export function createPlayerRouter(store: PlayerStore, clock: Clock): Router {
    const router = Router();

    /**
     * @route POST /register
     * Registers a new player and returns their bearer token.
     * The token is the ONLY credential and is sent only once.
     */
    router.post('/register', async (req: Request, res: Response) => {
        try {
            const parsed = registerSchema.safeParse(req.body);
            if (!parsed.success) {
                throw new ValidationError('name is required and must be 1-32 characters', parsed.error.flatten());
            }
            const player = await store.create(parsed.data.name);
            res.status(201).json({ token: player.token });
        } catch (error) {
            handleRouteError(res, error);
        }
    });

    /**
     * @route GET /player_data/:tokenOrName
     * Returns a player's score and sps as of now, looked up by token first and
     * by name otherwise. Passive income is projected, not persisted, so polling
     * never shortens the window the next action batch is measured against.
     */
    router.get('/player_data/:tokenOrName', async (req: Request, res: Response) => {
        try {
            const key = req.params.tokenOrName;
            const player = (await store.lookupByToken(key)) ?? (await store.findByName(key));
            if (!player) {
                throw new NotFoundError('Player not found');
            }
            const view = projectPlayer(player, clock());
            res.status(200).json({ name: view.name, score: view.score, sps: view.sps });
        } catch (error) {
            handleRouteError(res, error);
        }
    });

    /**
     * @route GET /token_valid
     * Answers "true" or "false" for the bearer token (or `?token=`).
     */
    router.get('/token_valid', async (req: Request, res: Response) => {
        try {
            const token = getBearerToken(req) ?? (typeof req.query.token === 'string' ? req.query.token : undefined);
            const player = token ? await store.lookupByToken(token) : undefined;
            res.status(200).type('text/plain').send(String(player !== undefined));
        } catch (error) {
            handleRouteError(res, error);
        }
    });

    return router;
}
