import { AuthorityKind, type AssemblyReport, type ObjectId, type Vec3 } from '@shared/types';
import { copyVec3 } from '@shared/math';
import { describeError } from './diagnostics';
import { isValidTarget, type ProbeContext } from './probes';
import type { FusionAggregator } from './fusion';

export interface MutationThresholds {
    neighbourRemote: number;
    local: number;
}

/**
 * Extends a single object's inferred authority to everything rigidly connected to it
 * before a mutation is allowed to go through.
 */
export class AssemblyPropagator {
    private readonly ctx: ProbeContext;
    private readonly fusion: FusionAggregator;
    private readonly thresholds: MutationThresholds;

    constructor(ctx: ProbeContext, fusion: FusionAggregator, thresholds: MutationThresholds) {
        this.ctx = ctx;
        this.fusion = fusion;
        this.thresholds = thresholds;
    }

    public isSafeToMutate(id: ObjectId | null | undefined): boolean {
        const { store, diagnostics } = this.ctx;
        if (!isValidTarget(store, id)) {
            diagnostics.emit({ type: 'invalidTarget', operation: 'isSafeToMutate', target: id ?? null });
            return false;
        }

        let neighbours: ObjectId[];
        try {
            if (store.isFixed(id)) return false;
            neighbours = store.getConnectedObjects(id);
        } catch (err) {
            diagnostics.emit({ type: 'storeFailure', operation: 'isSafeToMutate', objectId: id, error: describeError(err) });
            return false;
        }

        for (const neighbour of neighbours) {
            if (this.fusion.isRemote(neighbour, this.thresholds.neighbourRemote)) return false;
        }

        // Stricter than isLocal: the caller is about to commit a write
        const result = this.fusion.infer(id);
        return result.authority === AuthorityKind.LOCAL && result.confidence >= this.thresholds.local;
    }

    /**
     * Discovers the assembly first, then checks members in discovery order and stops at the first unsafe one.
     * The closure always holds every discovered member.
     */
    public collectAssembly(id: ObjectId | null | undefined, recursive: boolean = true): AssemblyReport {
        if (!isValidTarget(this.ctx.store, id)) {
            this.ctx.diagnostics.emit({ type: 'invalidTarget', operation: 'collectAssembly', target: id ?? null });
            return { closure: [], allSafe: false, firstUnsafe: null };
        }

        const closure = this.discover(id, recursive);
        for (const member of closure) {
            if (!this.isSafeToMutate(member)) {
                this.ctx.diagnostics.emit({ type: 'partialAssembly', root: id, firstUnsafe: member, closureSize: closure.length });
                return { closure, allSafe: false, firstUnsafe: member };
            }
        }
        return { closure, allSafe: true, firstUnsafe: null };
    }

    public safeApplyForce(id: ObjectId | null | undefined, force: Vec3): boolean {
        return this.safeApply('safeApplyForce', id, (target) => this.ctx.store.applyForce(target, copyVec3(force)));
    }

    public safeApplyImpulse(id: ObjectId | null | undefined, impulse: Vec3): boolean {
        return this.safeApply('safeApplyImpulse', id, (target) => this.ctx.store.applyImpulse(target, copyVec3(impulse)));
    }

    private safeApply(operation: string, id: ObjectId | null | undefined, mutate: (target: ObjectId) => void): boolean {
        if (!isValidTarget(this.ctx.store, id)) {
            this.ctx.diagnostics.emit({ type: 'invalidTarget', operation, target: id ?? null });
            return false;
        }
        if (!this.collectAssembly(id).allSafe) return false;

        try {
            mutate(id);
        } catch (err) {
            this.ctx.diagnostics.emit({ type: 'storeFailure', operation, objectId: id, error: describeError(err) });
            return false;
        }
        return true;
    }

    // Pre-order depth-first walk; weld graphs are routinely cyclic.
    // Non-recursive stops at the root: neighbours are already vetted by isSafeToMutate.
    private discover(root: ObjectId, recursive: boolean): ObjectId[] {
        if (!recursive) return [root];

        const closure: ObjectId[] = [];
        const visited = new Set<ObjectId>();
        const stack: ObjectId[] = [root];

        while (stack.length > 0) {
            const next = stack.pop();
            if (next === undefined || visited.has(next)) continue;
            visited.add(next);
            closure.push(next);

            let connected: ObjectId[] = [];
            try {
                connected = this.ctx.store.getConnectedObjects(next);
            } catch (err) {
                this.ctx.diagnostics.emit({ type: 'storeFailure', operation: 'collectAssembly', objectId: next, error: describeError(err) });
            }
            for (let i = connected.length - 1; i >= 0; i--) {
                if (!visited.has(connected[i])) stack.push(connected[i]);
            }
        }
        return closure;
    }
}
