import type { AuthorityKind, ObjectId } from '@shared/types';
import type { DiagnosticsChannel } from './diagnostics';

export interface CacheEntry {
    authority: AuthorityKind;
    observedAt: number;
}

export interface ResultCacheOptions {
    lifetime: number;
    sweepInterval: number;
    now: () => number;
    isLive: (id: ObjectId) => boolean;
    diagnostics: DiagnosticsChannel;
}

/**
 * Time-bounded map from object id to the last verdict.
 * Stale and dead entries are dropped when read, and swept on writes at most once per sweep interval.
 */
export class ResultCache {
    private entries: Map<ObjectId, CacheEntry> = new Map();
    private lifetime: number;
    private readonly sweepInterval: number;
    private readonly now: () => number;
    private readonly isLive: (id: ObjectId) => boolean;
    private readonly diagnostics: DiagnosticsChannel;
    private lastSweep: number;

    constructor(options: ResultCacheOptions) {
        this.lifetime = options.lifetime;
        this.sweepInterval = options.sweepInterval;
        this.now = options.now;
        this.isLive = options.isLive;
        this.diagnostics = options.diagnostics;
        this.lastSweep = this.now();
    }

    public get(id: ObjectId): AuthorityKind | null {
        const entry = this.entries.get(id);
        if (!entry) return null;
        if (!this.isFresh(entry) || !this.isLive(id)) {
            this.entries.delete(id);
            return null;
        }
        return entry.authority;
    }

    public set(id: ObjectId, authority: AuthorityKind): void {
        const now = this.now();
        this.entries.set(id, { authority, observedAt: now });
        if (now - this.lastSweep > this.sweepInterval) {
            this.sweep();
        }
    }

    public setLifetime(seconds: number): void {
        this.lifetime = seconds;
    }

    public clear(): void {
        this.entries = new Map();
        this.lastSweep = this.now();
    }

    public sweep(): number {
        let removed = 0;
        for (const [id, entry] of this.entries) {
            if (!this.isFresh(entry) || !this.isLive(id)) {
                this.entries.delete(id);
                removed++;
            }
        }
        this.lastSweep = this.now();
        this.diagnostics.emit({ type: 'cacheSwept', removed, remaining: this.entries.size });
        return removed;
    }

    private isFresh(entry: CacheEntry): boolean {
        return this.now() - entry.observedAt < this.lifetime;
    }
}
