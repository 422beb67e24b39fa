import { describe, expect, it } from 'vitest';
import { UpgradeDefinition } from './types';
import { createUpgradeCatalog, UPGRADE_DEFINITIONS, upgradeCost } from './upgrades';

const booster: UpgradeDefinition = {
    id: 'booster',
    name: 'Booster',
    description: 'test upgrade',
    baseCost: 10,
    costMultiplier: 1.5,
    ppcIncrease: 0,
    ppsIncrease: 1,
};

describe('upgradeCost', () => {
    it('grows geometrically and truncates fractional prices', () => {
        expect(upgradeCost(booster, 0)).toBe(10);
        expect(upgradeCost(booster, 1)).toBe(15);
        expect(upgradeCost(booster, 2)).toBe(22);
        expect(upgradeCost(booster, 3)).toBe(33);
    });
});

describe('createUpgradeCatalog', () => {
    it('indexes the default definitions by id', () => {
        const catalog = createUpgradeCatalog();

        expect(catalog.size).toBe(UPGRADE_DEFINITIONS.length);
        expect(catalog.get('auto_clicker')?.baseCost).toBe(10);
        expect(catalog.get('cursor')?.ppcIncrease).toBe(1);
    });

    it('ships the documented upgrades in price order', () => {
        expect(UPGRADE_DEFINITIONS.map(definition => definition.id)).toEqual([
            'auto_clicker',
            'cursor',
            'grandma',
            'farm',
            'mine',
            'factory',
        ]);
        expect(createUpgradeCatalog().get('mine')).toMatchObject({ baseCost: 5000, ppsIncrease: 50 });
    });

    it('gives every default upgrade a positive price and some effect', () => {
        for (const definition of UPGRADE_DEFINITIONS) {
            expect(definition.baseCost).toBeGreaterThan(0);
            expect(definition.costMultiplier).toBeGreaterThan(1);
            expect(definition.ppcIncrease + definition.ppsIncrease).toBeGreaterThan(0);
        }
    });
});
