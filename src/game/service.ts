import { AuthenticationError } from '../errors';
import { Clock, PlayerStore } from '../player/types';
import { reconcile } from './reconcile';
import { Action, ReconcileOptions, ReconcileResult } from './types';

export type ApplyBatchOptions = ReconcileOptions & {
    clock: Clock;
};

/**
 * Resolves the token, then reconciles and saves the batch while holding the
 * player's exclusive section. The record is re-read inside the section so a
 * concurrent batch for the same player is never overwritten, and the clock is
 * read there too so `lastUpdated` only moves forward.
 */
export async function applyActionBatch(
    store: PlayerStore,
    token: string,
    actions: Action[],
    options: ApplyBatchOptions,
): Promise<ReconcileResult> {
    const player = await store.lookupByToken(token);
    if (!player) {
        throw new AuthenticationError('Invalid authentication token');
    }

    return store.runExclusive(player.id, async () => {
        const current = await store.findById(player.id);
        if (!current) {
            throw new AuthenticationError('Player no longer exists');
        }
        const result = reconcile(current, actions, options.clock(), options);
        await store.save(result.record);
        return result;
    });
}
