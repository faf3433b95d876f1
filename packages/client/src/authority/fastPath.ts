import { AuthorityKind, type AuthorityScanOptions, type InferenceResult, type ObjectId } from '@shared/types';
import { DEFAULT_SCAN_LIMIT } from '@shared/constants';
import { insideRegion } from '@shared/math';
import { describeError } from './diagnostics';
import { INDETERMINATE_RESULT, type FusionAggregator } from './fusion';
import { isValidTarget, runProbe, ProbeKind, type ProbeContext } from './probes';
import type { ResultCache } from './resultCache';

/**
 * Speed-first checks backed by the result cache.
 * Cheap signals are tried in a fixed priority order; the velocity probe is the last resort.
 */
export class FastPathChecker {
    private readonly ctx: ProbeContext;
    private readonly cache: ResultCache;
    private readonly fusion: FusionAggregator;
    private readonly fastLatencyThreshold: number;
    private readonly isShadow: (id: ObjectId) => boolean;

    constructor(
        ctx: ProbeContext,
        cache: ResultCache,
        fusion: FusionAggregator,
        fastLatencyThreshold: number,
        isShadow: (id: ObjectId) => boolean,
    ) {
        this.ctx = ctx;
        this.cache = cache;
        this.fusion = fusion;
        this.fastLatencyThreshold = fastLatencyThreshold;
        this.isShadow = isShadow;
    }

    public fastCheck(id: ObjectId | null | undefined): AuthorityKind {
        if (!isValidTarget(this.ctx.store, id)) {
            this.ctx.diagnostics.emit({ type: 'invalidTarget', operation: 'fastCheck', target: id ?? null });
            return AuthorityKind.INDETERMINATE;
        }

        const cached = this.cache.get(id);
        if (cached !== null) return cached;

        const authority = this.evaluate(id);
        this.cache.set(id, authority);
        return authority;
    }

    public batchProcess(ids: Iterable<ObjectId>): Map<ObjectId, AuthorityKind> {
        const results = new Map<ObjectId, AuthorityKind>();
        for (const id of ids) {
            results.set(id, this.fastCheck(id));
        }
        return results;
    }

    public getObjectsWithAuthority(kind: AuthorityKind, options: AuthorityScanOptions = {}): ObjectId[] {
        const maxObjects = options.maxObjects ?? DEFAULT_SCAN_LIMIT;
        const { store } = this.ctx;
        const result: ObjectId[] = [];
        let scanned = 0;
        if (maxObjects <= 0) return result;

        for (const id of store.objects()) {
            if (this.isShadow(id) || !isValidTarget(store, id)) continue;
            try {
                if (options.skipFixed && store.isFixed(id)) continue;
                if (options.region && !insideRegion(store.getPose(id).position, options.region)) continue;
            } catch (err) {
                this.ctx.diagnostics.emit({ type: 'storeFailure', operation: 'getObjectsWithAuthority', objectId: id, error: describeError(err) });
                continue;
            }

            if (this.fastCheck(id) === kind) result.push(id);
            scanned++;
            if (scanned >= maxObjects) break;
        }
        return result;
    }

    /** Full-accuracy fusion that still warms the cache for later fast checks. */
    public detailedCheck(id: ObjectId | null | undefined): InferenceResult {
        if (!isValidTarget(this.ctx.store, id)) {
            this.ctx.diagnostics.emit({ type: 'invalidTarget', operation: 'detailedCheck', target: id ?? null });
            return { ...INDETERMINATE_RESULT };
        }
        const result = this.fusion.infer(id);
        this.cache.set(id, result.authority);
        return result;
    }

    private evaluate(id: ObjectId): AuthorityKind {
        const { store, localActorId } = this.ctx;
        try {
            if (store.isFixed(id)) return AuthorityKind.REMOTE;

            // An unset tag is not decisive here
            const tag = store.getAuthorityTag(id);
            if (tag !== null) return tag === localActorId ? AuthorityKind.LOCAL : AuthorityKind.REMOTE;

            if (store.getUpdateAge(id) < this.fastLatencyThreshold) return AuthorityKind.LOCAL;
        } catch (err) {
            this.ctx.diagnostics.emit({ type: 'storeFailure', operation: 'fastCheck', objectId: id, error: describeError(err) });
            return AuthorityKind.INDETERMINATE;
        }

        return runProbe(ProbeKind.VELOCITY_MUTATION, this.ctx, id);
    }
}
