import { z } from 'zod';
import { InsufficientFundsError, RateLimitError, UnknownUpgradeError, ValidationError } from '../errors';
import { PlayerRecord } from '../player/types';
import { Action, ReconcileOptions, ReconcileResult } from './types';
import { upgradeCost } from './upgrades';

const ZONE_DESIGNATOR = /(Z|[+-]\d{2}(:?\d{2})?)$/i;
const HAS_TIME = /\d{2}:\d{2}/;

const actionSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('click'),
        data: z.unknown().optional(),
    }),
    z.object({
        type: z.literal('buy_upgrade'),
        data: z.object({ upgrade_id: z.string().min(1) }),
    }),
]);

const batchSchema = z.object({
    actions: z.array(actionSchema),
});

/**
 * Validates a request body of the form `{ actions: [{ type, data }] }`.
 * Throws a ValidationError describing every malformed action.
 */
export function parseActionBatch(body: unknown): Action[] {
    const parsed = batchSchema.safeParse(body);
    if (!parsed.success) {
        throw new ValidationError('Malformed action batch', parsed.error.flatten());
    }
    return parsed.data.actions.map((action): Action =>
        action.type === 'click'
            ? { type: 'click' }
            : { type: 'buy_upgrade', data: { upgrade_id: action.data.upgrade_id } },
    );
}

/**
 * Reads a stored timestamp as UTC milliseconds. A timestamp carrying no zone
 * designator is taken to be UTC rather than server-local time.
 */
export function toUtcMillis(timestamp: string): number {
    let value = timestamp.trim();
    if (HAS_TIME.test(value) && !ZONE_DESIGNATOR.test(value)) {
        value = value.replace(' ', 'T') + 'Z';
    }
    const millis = Date.parse(value);
    if (Number.isNaN(millis)) {
        throw new Error(`Unreadable timestamp: ${timestamp}`);
    }
    return millis;
}

/**
 * Passive income owed to a player at `now`. A clock reading earlier than the
 * stored timestamp counts as no time passed.
 */
export function accruePassiveIncome(
    record: PlayerRecord,
    now: Date,
): { elapsedMs: number; secondsPassed: number; passiveEarned: number } {
    const elapsedMs = Math.max(0, now.getTime() - toUtcMillis(record.lastUpdated));
    // Multiply before dividing: sps * (ms / 1000) drifts below whole products.
    return {
        elapsedMs,
        secondsPassed: elapsedMs / 1000,
        passiveEarned: Math.floor((record.sps * elapsedMs) / 1000),
    };
}

/**
 * Largest number of clicks a batch may carry after `elapsedMs` milliseconds.
 * At least one click is always admitted.
 */
export function maxClicksFor(elapsedMs: number, clickRatePerSecond: number): number {
    return Math.max(1, Math.floor((elapsedMs * clickRatePerSecond) / 1000));
}

/**
 * Computes the next authoritative state of `record` after applying `actions`
 * at `now`.
 *
 * Passive income is folded in first, then the click count is checked against
 * the elapsed-time ceiling, then clicks and purchases are applied in order
 * against the running state. Any failure throws before a result exists, so a
 * rejected batch has no effect at all.
 */
export function reconcile(record: PlayerRecord, actions: Action[], now: Date, options: ReconcileOptions): ReconcileResult {
    // One elapsed-time reading feeds both the accrual and the click ceiling.
    const { elapsedMs, secondsPassed, passiveEarned } = accruePassiveIncome(record, now);
    let score = record.score + passiveEarned;

    const clickCount = actions.filter(action => action.type === 'click').length;
    const maxClicks = maxClicksFor(elapsedMs, options.clickRatePerSecond);
    if (clickCount > maxClicks) {
        throw new RateLimitError(clickCount, maxClicks, secondsPassed);
    }

    // Clicks are worth the ppc held before this batch; purchases below only
    // raise it for later batches.
    const clickValue = clickCount * record.ppc;
    score += clickValue;

    let sps = record.sps;
    let ppc = record.ppc;
    const upgrades = { ...record.upgrades };
    const purchases: string[] = [];

    for (const action of actions) {
        if (action.type !== 'buy_upgrade') continue;

        const upgradeId = action.data.upgrade_id;
        const definition = options.catalog.get(upgradeId);
        if (!definition) {
            throw new UnknownUpgradeError(upgradeId);
        }

        const level = upgrades[upgradeId] ?? 0;
        const cost = upgradeCost(definition, level);
        if (score < cost) {
            throw new InsufficientFundsError(upgradeId, cost, score);
        }

        score -= cost;
        upgrades[upgradeId] = level + 1;
        sps += definition.ppsIncrease;
        ppc += definition.ppcIncrease;
        purchases.push(upgradeId);
    }

    const lastUpdated = now.getTime() > toUtcMillis(record.lastUpdated) ? now.toISOString() : record.lastUpdated;

    return {
        record: { ...record, score, sps, ppc, upgrades, lastUpdated },
        secondsPassed,
        passiveEarned,
        clickCount,
        clickValue,
        purchases,
    };
}

/**
 * The player's state as it stands at `now`, including passive income not yet
 * folded into the stored score. Nothing is written.
 */
export function projectPlayer(record: PlayerRecord, now: Date): { name: string; score: number; sps: number; ppc: number } {
    const { passiveEarned } = accruePassiveIncome(record, now);
    return {
        name: record.name,
        score: record.score + passiveEarned,
        sps: record.sps,
        ppc: record.ppc,
    };
}
