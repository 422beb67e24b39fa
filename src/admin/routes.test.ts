import request from 'supertest';
import { describe, expect, it } from 'vitest';
import { createTestApp, register } from '../testing/app';

const ADMIN_KEY = 'test-admin-key';

describe('admin routes', () => {
    it('deletes a player and their friendships', async () => {
        const { app, players } = createTestApp({ ADMIN_KEY });
        const alice = await register(app, 'alice');
        const bob = await register(app, 'bob');
        const sent = await request(app)
            .post('/friends/requests')
            .set('Authorization', `Bearer ${alice}`)
            .send({ name: 'bob' })
            .expect(201);
        await request(app).post(`/friends/requests/${sent.body.requestId}/accept`).set('Authorization', `Bearer ${bob}`).expect(200);
        const bobRecord = await players.lookupByToken(bob);
        if (!bobRecord) throw new Error('expected player');

        await request(app).delete(`/admin/players/${bobRecord.id}`).set('Authorization', `Bearer ${ADMIN_KEY}`).expect(204);

        const valid = await request(app).get('/token_valid').set('Authorization', `Bearer ${bob}`).expect(200);
        expect(valid.text).toBe('false');
        const friends = await request(app).get('/friends').set('Authorization', `Bearer ${alice}`).expect(200);
        expect(friends.body).toEqual({ friends: [] });
    });

    it('answers 404 for an unknown player', async () => {
        const { app } = createTestApp({ ADMIN_KEY });

        await request(app).delete('/admin/players/missing').set('Authorization', `Bearer ${ADMIN_KEY}`).expect(404);
    });

    it('refuses requests without the admin key', async () => {
        const { app, players } = createTestApp({ ADMIN_KEY });
        const alice = await register(app, 'alice');
        const record = await players.lookupByToken(alice);
        if (!record) throw new Error('expected player');

        await request(app).delete(`/admin/players/${record.id}`).expect(403);
        const wrong = await request(app).delete(`/admin/players/${record.id}`).set('Authorization', 'Bearer not-the-key').expect(403);
        expect(wrong.body).toEqual({ error: 'Forbidden', message: 'Admin key required' });
        // A player token is not an admin key.
        await request(app).delete(`/admin/players/${record.id}`).set('Authorization', `Bearer ${alice}`).expect(403);

        expect(await players.findById(record.id)).toBeDefined();
    });

    it('stays closed when no admin key is configured', async () => {
        const { app } = createTestApp();

        await request(app).delete('/admin/players/anyone').set('Authorization', 'Bearer anything').expect(403);
    });
});
