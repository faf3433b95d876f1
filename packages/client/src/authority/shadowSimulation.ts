import type { ITickScheduler, TaskHandle } from '@shared/simulation';
import type { ObjectId, ShadowMemberResult, ShadowRunResult, Vec3 } from '@shared/types';
import { copyVec3, distance, scaleVec3 } from '@shared/math';
import { describeError } from './diagnostics';
import type { AssemblyPropagator } from './assembly';
import { INDETERMINATE_RESULT, type FusionAggregator } from './fusion';
import { isValidTarget, type ProbeContext } from './probes';
import { CooperativeTask } from './task';

interface ShadowMember {
    original: ObjectId;
    clone: ObjectId;
    initialPosition: Vec3;
    trajectory: Vec3[];
}

/**
 * Dry-runs a force on a full assembly using invisible, non-colliding shadow clones.
 * The real objects are never written; every clone is destroyed on completion, failure or cancellation.
 */
export class ShadowSimulator {
    private readonly ctx: ProbeContext;
    private readonly scheduler: ITickScheduler;
    private readonly assembly: AssemblyPropagator;
    private readonly fusion: FusionAggregator;
    private readonly impulseScale: number;
    private readonly liveShadows = new Set<ObjectId>();

    constructor(
        ctx: ProbeContext,
        scheduler: ITickScheduler,
        assembly: AssemblyPropagator,
        fusion: FusionAggregator,
        impulseScale: number,
    ) {
        this.ctx = ctx;
        this.scheduler = scheduler;
        this.assembly = assembly;
        this.fusion = fusion;
        this.impulseScale = impulseScale;
    }

    /** True while `id` is a clone owned by a running simulation. */
    public isShadow(id: ObjectId): boolean {
        return this.liveShadows.has(id);
    }

    public simulate(
        id: ObjectId | null | undefined,
        force: Vec3,
        duration: number,
        callback: ((result: ShadowRunResult) => void) | undefined,
    ): TaskHandle<ShadowRunResult> {
        const { store, diagnostics } = this.ctx;
        const report = (result: ShadowRunResult): TaskHandle<ShadowRunResult> => {
            callback?.(result);
            return CooperativeTask.settledWith({ status: 'completed', value: result });
        };

        if (!isValidTarget(store, id)) {
            diagnostics.emit({ type: 'invalidTarget', operation: 'simulatePhysics', target: id ?? null });
            return report({ success: false, reason: 'Invalid object', assembly: [], inference: { ...INDETERMINATE_RESULT } });
        }
        if (!Number.isFinite(duration) || duration < 0) {
            diagnostics.emit({ type: 'callRejected', operation: 'simulatePhysics', reason: `invalid duration ${duration}` });
            return report({ success: false, reason: 'Invalid duration', assembly: [], inference: this.fusion.infer(id) });
        }

        const assembly = this.assembly.collectAssembly(id);
        if (!assembly.allSafe) {
            return report({
                success: false,
                reason: 'Cannot safely apply force to the entire assembly',
                assembly: assembly.closure,
                inference: this.fusion.infer(id),
            });
        }

        let members: ShadowMember[];
        try {
            members = this.spawnShadows(assembly.closure);
        } catch (err) {
            diagnostics.emit({ type: 'storeFailure', operation: 'simulatePhysics', objectId: id, error: describeError(err) });
            return report({ success: false, reason: `Shadow clone failed: ${describeError(err)}`, assembly: assembly.closure, inference: this.fusion.infer(id) });
        }

        const startedAt = this.scheduler.now();
        const impulse = scaleVec3(force, this.impulseScale);
        const target = members.find(m => m.original === id);

        return new CooperativeTask<ShadowRunResult>(this.scheduler, {
            step: () => {
                const elapsed = this.scheduler.now() - startedAt;
                if (elapsed >= duration) {
                    const result: ShadowRunResult = { success: true, duration: elapsed, members: this.collect(members) };
                    this.destroyShadows(members);
                    return { value: result };
                }

                for (const member of members) {
                    this.record(member);
                }
                if (target) this.push(target.clone, impulse);
                return undefined;
            },
            onComplete: callback,
            onCancel: () => {
                this.destroyShadows(members);
                diagnostics.emit({ type: 'taskCancelled', task: 'simulatePhysics', objectId: id });
            },
        });
    }

    private spawnShadows(closure: ObjectId[]): ShadowMember[] {
        const { store } = this.ctx;
        const members: ShadowMember[] = [];
        try {
            for (const original of closure) {
                const initialPosition = copyVec3(store.getPose(original).position);
                const clone = store.cloneObject(original);
                this.liveShadows.add(clone);
                members.push({ original, clone, initialPosition, trajectory: [] });
                store.setFixed(clone, false);
                store.setCanCollide(clone, false);
                store.setVisible(clone, false);
            }
        } catch (err) {
            this.destroyShadows(members);
            throw err;
        }
        return members;
    }

    private record(member: ShadowMember): void {
        try {
            member.trajectory.push(copyVec3(this.ctx.store.getPose(member.clone).position));
        } catch (err) {
            this.ctx.diagnostics.emit({ type: 'storeFailure', operation: 'simulatePhysics', objectId: member.clone, error: describeError(err) });
        }
    }

    private push(clone: ObjectId, impulse: Vec3): void {
        try {
            this.ctx.store.applyImpulse(clone, copyVec3(impulse));
        } catch (err) {
            this.ctx.diagnostics.emit({ type: 'storeFailure', operation: 'simulatePhysics', objectId: clone, error: describeError(err) });
        }
    }

    private collect(members: ShadowMember[]): ShadowMemberResult[] {
        const { store } = this.ctx;
        return members.map(member => {
            let finalPosition = member.initialPosition;
            let finalVelocity: Vec3 = [0, 0, 0];
            try {
                finalPosition = copyVec3(store.getPose(member.clone).position);
                finalVelocity = copyVec3(store.getVelocity(member.clone));
            } catch (err) {
                this.ctx.diagnostics.emit({ type: 'storeFailure', operation: 'simulatePhysics', objectId: member.clone, error: describeError(err) });
            }
            return {
                objectId: member.original,
                displacement: distance(finalPosition, member.initialPosition),
                trajectory: member.trajectory,
                finalVelocity,
            };
        });
    }

    private destroyShadows(members: ShadowMember[]): void {
        for (const member of members) {
            try {
                this.ctx.store.destroyObject(member.clone);
                this.liveShadows.delete(member.clone);
            } catch (err) {
                this.ctx.diagnostics.emit({ type: 'storeFailure', operation: 'simulatePhysics', objectId: member.clone, error: describeError(err) });
            }
        }
    }
}
