import { ConflictError, NotFoundError } from '../errors';
import { createPlayerToken, cryptoRandomId } from '../crypto';
import { Clock, PlayerRecord, PlayerStore } from './types';

/**
 * Manages player records in memory.
 * NOTE: Records live for the lifetime of the process. A persistent
 * deployment swaps this for a database-backed PlayerStore.
 */

function normalizeName(name: string): string {
    return name.trim().toLowerCase();
}

function copyRecord(record: PlayerRecord): PlayerRecord {
    return { ...record, upgrades: { ...record.upgrades } };
}

class InMemoryPlayerStore implements PlayerStore {
    private readonly playersById = new Map<string, PlayerRecord>();

    private readonly idsByToken = new Map<string, string>(); // token -> id

    private readonly idsByName = new Map<string, string>(); // normalized name -> id

    // Tail of each player's task chain; removed once the chain drains.
    private readonly locks = new Map<string, Promise<void>>();

    constructor(private readonly clock: Clock) {}

    async create(name: string): Promise<PlayerRecord> {
        const displayName = name.trim();
        const key = normalizeName(displayName);
        if (this.idsByName.has(key)) {
            throw new ConflictError(`Player name already taken: ${displayName}`);
        }

        const record: PlayerRecord = {
            id: cryptoRandomId(),
            name: displayName,
            token: createPlayerToken(),
            score: 0,
            sps: 0,
            ppc: 1,
            upgrades: {},
            lastUpdated: this.clock().toISOString(),
        };
        this.playersById.set(record.id, record);
        this.idsByToken.set(record.token, record.id);
        this.idsByName.set(key, record.id);
        return copyRecord(record);
    }

    async lookupByToken(token: string): Promise<PlayerRecord | undefined> {
        const id = this.idsByToken.get(token);
        return id === undefined ? undefined : this.findById(id);
    }

    async findById(id: string): Promise<PlayerRecord | undefined> {
        const record = this.playersById.get(id);
        return record ? copyRecord(record) : undefined;
    }

    async findByName(name: string): Promise<PlayerRecord | undefined> {
        const id = this.idsByName.get(normalizeName(name));
        return id === undefined ? undefined : this.findById(id);
    }

    async save(record: PlayerRecord): Promise<void> {
        const stored = this.playersById.get(record.id);
        if (!stored) {
            throw new NotFoundError(`Player not found: ${record.id}`);
        }
        // id, name and token are immutable; only game state is replaced.
        this.playersById.set(record.id, {
            ...stored,
            score: record.score,
            sps: record.sps,
            ppc: record.ppc,
            upgrades: { ...record.upgrades },
            lastUpdated: record.lastUpdated,
        });
    }

    async delete(id: string): Promise<boolean> {
        const record = this.playersById.get(id);
        if (!record) return false;
        this.playersById.delete(id);
        this.idsByToken.delete(record.token);
        this.idsByName.delete(normalizeName(record.name));
        return true;
    }

    async list(): Promise<PlayerRecord[]> {
        return Array.from(this.playersById.values(), copyRecord);
    }

    async runExclusive<T>(playerId: string, task: () => Promise<T>): Promise<T> {
        const previous = this.locks.get(playerId) ?? Promise.resolve();
        const run = previous.then(task);
        const tail = run.then(
            () => undefined,
            () => undefined,
        );
        this.locks.set(playerId, tail);
        try {
            return await run;
        } finally {
            if (this.locks.get(playerId) === tail) {
                this.locks.delete(playerId);
            }
        }
    }
}

export function createInMemoryPlayerStore(clock: Clock = () => new Date()): PlayerStore {
    return new InMemoryPlayerStore(clock);
}
