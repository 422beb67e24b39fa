import { PlayerRecord } from '../player/types';

/**
 * Static pricing and effect of one purchasable upgrade.
 * The price of the next level is `baseCost * costMultiplier ^ level`, truncated.
 */
export type UpgradeDefinition = {
    id: string;
    name: string;
    description: string;
    baseCost: number;
    costMultiplier: number;
    ppcIncrease: number; // Added to points-per-click per level bought
    ppsIncrease: number; // Added to passive score-per-second per level bought
};

export type UpgradeCatalog = ReadonlyMap<string, UpgradeDefinition>;

export type ClickAction = {
    type: 'click';
};

export type BuyUpgradeAction = {
    type: 'buy_upgrade';
    data: { upgrade_id: string };
};

/**
 * A single client-submitted action. A batch is applied in order, all or nothing.
 */
export type Action = ClickAction | BuyUpgradeAction;

export type ReconcileOptions = {
    catalog: UpgradeCatalog;
    clickRatePerSecond: number;
};

/**
 * The outcome of applying one batch. `record` is a new object; the input
 * record is never modified.
 */
export type ReconcileResult = {
    record: PlayerRecord;
    secondsPassed: number;
    passiveEarned: number;
    clickCount: number;
    clickValue: number; // Score awarded for the batch's clicks
    purchases: string[]; // Upgrade ids bought, in batch order
};
