export type Clock = () => Date;

/**
 * One registered player. `lastUpdated` is the ISO-8601 instant at which
 * passive income was last folded into `score`.
 */
export type PlayerRecord = {
    id: string; // Generated at registration, immutable
    name: string; // Display name, unique ignoring case
    token: string; // Bearer credential, unique and immutable
    score: number; // Spendable currency, never negative
    sps: number; // Passive score per second
    ppc: number; // Points awarded per click
    upgrades: Record<string, number>; // upgrade id -> owned level
    lastUpdated: string;
};

/**
 * Access to persisted player records. Implementations must hand out copies so
 * that a caller mutating a record never changes stored state without `save`.
 */
export interface PlayerStore {
    create(name: string): Promise<PlayerRecord>;

    lookupByToken(token: string): Promise<PlayerRecord | undefined>;

    findById(id: string): Promise<PlayerRecord | undefined>;

    findByName(name: string): Promise<PlayerRecord | undefined>;

    /** Atomically replaces score, sps, ppc, upgrades and lastUpdated. */
    save(record: PlayerRecord): Promise<void>;

    delete(id: string): Promise<boolean>;

    list(): Promise<PlayerRecord[]>;

    /**
     * Runs `task` once every earlier task for the same player has settled.
     * Tasks for different players run independently.
     */
    runExclusive<T>(playerId: string, task: () => Promise<T>): Promise<T>;
}
