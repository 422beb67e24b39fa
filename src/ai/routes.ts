import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { ValidationError } from '../errors';
import { handleRouteError } from '../http';
import { requirePlayer } from '../player/auth';
import { PlayerStore } from '../player/types';
import { UpgradeGenerator } from './generator';

const upgradeIdeaSchema = z.object({
    prompt: z.string().trim().min(1).max(500),
});

export function createAiRouter(players: PlayerStore, generator: UpgradeGenerator): Router {
    const router = Router();

    /**
     * @route POST /ai/upgrade
     * Asks the configured generator for an upgrade idea. Answers 503 when
     * no generator is available.
     */
    router.post('/upgrade', async (req: Request, res: Response) => {
        try {
            const player = await requirePlayer(players, req);
            const parsed = upgradeIdeaSchema.safeParse(req.body);
            if (!parsed.success) {
                throw new ValidationError('prompt is required and must be at most 500 characters', parsed.error.flatten());
            }
            const playerLevel = Object.values(player.upgrades).reduce((sum, level) => sum + level, 0);
            const idea = await generator.generate({ prompt: parsed.data.prompt, playerLevel });
            res.status(200).json(idea);
        } catch (error) {
            handleRouteError(res, error);
        }
    });

    return router;
}
