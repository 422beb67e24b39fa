import { Request } from 'express';
import { AuthenticationError } from '../errors';
import { getBearerToken } from '../http';
import { PlayerRecord, PlayerStore } from './types';

/**
 * Resolves the player named by the request's bearer token.
 * Throws an AuthenticationError when the header is missing or the token unknown.
 */
export async function requirePlayer(store: PlayerStore, req: Request): Promise<PlayerRecord> {
    const token = getBearerToken(req);
    if (!token) {
        throw new AuthenticationError('Authorization header with Bearer token is required');
    }
    const player = await store.lookupByToken(token);
    if (!player) {
        throw new AuthenticationError('Invalid authentication token');
    }
    return player;
}
