import { GeneratorUnavailableError } from '../errors';

export type UpgradeIdeaRequest = {
    prompt: string;
    playerLevel: number; // Total upgrade levels the requesting player owns
};

export type UpgradeIdea = {
    name: string;
    description: string;
    baseCost: number;
};

/**
 * An external text generator that proposes flavour upgrades. Its output is
 * advisory only and is never priced into the authoritative catalog.
 */
export interface UpgradeGenerator {
    generate(request: UpgradeIdeaRequest): Promise<UpgradeIdea>;
}

/**
 * The generator used when no backend is configured.
 */
export function createUnavailableGenerator(): UpgradeGenerator {
    return {
        async generate() {
            throw new GeneratorUnavailableError();
        },
    };
}
