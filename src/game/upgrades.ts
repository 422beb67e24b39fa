import { UpgradeCatalog, UpgradeDefinition } from './types';

export const UPGRADE_DEFINITIONS: UpgradeDefinition[] = [
    {
        id: 'auto_clicker',
        name: 'Auto Clicker',
        description: 'Clicks once per second on your behalf',
        baseCost: 10,
        costMultiplier: 1.5,
        ppcIncrease: 0,
        ppsIncrease: 1,
    },
    {
        id: 'cursor',
        name: 'Reinforced Cursor',
        description: 'Each click is worth one more point',
        baseCost: 25,
        costMultiplier: 1.6,
        ppcIncrease: 1,
        ppsIncrease: 0,
    },
    {
        id: 'grandma',
        name: 'Grandma',
        description: 'Bakes 5 points per second',
        baseCost: 100,
        costMultiplier: 1.15,
        ppcIncrease: 0,
        ppsIncrease: 5,
    },
    {
        id: 'farm',
        name: 'Farm',
        description: 'Grows 20 points per second',
        baseCost: 1100,
        costMultiplier: 1.15,
        ppcIncrease: 0,
        ppsIncrease: 20,
    },
    {
        id: 'mine',
        name: 'Mine',
        description: 'Digs up 50 points per second',
        baseCost: 5000,
        costMultiplier: 1.15,
        ppcIncrease: 0,
        ppsIncrease: 50,
    },
    {
        id: 'factory',
        name: 'Factory',
        description: 'Produces 100 points per second',
        baseCost: 12000,
        costMultiplier: 1.15,
        ppcIncrease: 0,
        ppsIncrease: 100,
    },
];

export function createUpgradeCatalog(definitions: UpgradeDefinition[] = UPGRADE_DEFINITIONS): UpgradeCatalog {
    return new Map(definitions.map(definition => [definition.id, definition]));
}

/**
 * Price of buying the next level when `level` levels are already owned.
 * Truncated so a fractional price can never be undercut.
 */
export function upgradeCost(definition: UpgradeDefinition, level: number): number {
    return Math.floor(definition.baseCost * Math.pow(definition.costMultiplier, level));
}
