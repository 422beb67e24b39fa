import request from 'supertest';
import { describe, expect, it, vi } from 'vitest';
import { createTestApp, register } from '../testing/app';
import { UpgradeGenerator } from './generator';

describe('ai routes', () => {
    it('answers 503 when no generator is configured', async () => {
        const { app } = createTestApp();
        const token = await register(app, 'alice');

        const response = await request(app)
            .post('/ai/upgrade')
            .set('Authorization', `Bearer ${token}`)
            .send({ prompt: 'something with cats' })
            .expect(503);

        expect(response.body).toEqual({ error: 'GeneratorUnavailable', message: 'Upgrade generation is not available' });
    });

    it('returns the generated idea and passes the owned upgrade levels', async () => {
        const generate = vi.fn<UpgradeGenerator['generate']>().mockResolvedValue({
            name: 'Cat Cafe',
            description: 'Cats knead the dough',
            baseCost: 75,
        });
        const { app, players } = createTestApp({}, { generator: { generate } });
        const token = await register(app, 'alice');
        const alice = await players.lookupByToken(token);
        if (!alice) throw new Error('expected player');
        await players.save({ ...alice, upgrades: { cursor: 2, grandma: 1 } });

        const response = await request(app)
            .post('/ai/upgrade')
            .set('Authorization', `Bearer ${token}`)
            .send({ prompt: '  something with cats ' })
            .expect(200);

        expect(response.body).toEqual({ name: 'Cat Cafe', description: 'Cats knead the dough', baseCost: 75 });
        expect(generate).toHaveBeenCalledWith({ prompt: 'something with cats', playerLevel: 3 });
    });

    it('validates the prompt and requires a token', async () => {
        const { app } = createTestApp();
        const token = await register(app, 'alice');

        await request(app).post('/ai/upgrade').send({ prompt: 'x' }).expect(401);
        await request(app).post('/ai/upgrade').set('Authorization', `Bearer ${token}`).send({}).expect(400);
    });
});
