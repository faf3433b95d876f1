import type { ITickScheduler, TaskHandle } from '@shared/simulation';
import { AuthorityKind, type InferenceResult, type ObjectId, type Vec3 } from '@shared/types';
import { copyVec3, sameVec3 } from '@shared/math';
import { describeError } from './diagnostics';
import { INDETERMINATE_RESULT } from './fusion';
import { isValidTarget, type ProbeContext } from './probes';
import { CooperativeTask } from './task';

interface SamplingSession {
    startedAt: number;
    duration: number;
    lastPosition: Vec3;
    // Position seen at the previous remote-attribution check, recorded every tick
    lastRemoteCheckPosition: Vec3;
    changes: number;
    remoteChanges: number;
}

/** Verdict over a finished window: a strict remote majority of observed changes means REMOTE. */
export function judgeWindow(changes: number, remoteChanges: number): InferenceResult {
    if (changes === 0) return { ...INDETERMINATE_RESULT };
    if (remoteChanges > changes * 0.5) {
        return { authority: AuthorityKind.REMOTE, confidence: remoteChanges / changes };
    }
    return { authority: AuthorityKind.LOCAL, confidence: (changes - remoteChanges) / changes };
}

/**
 * Watches an object's position over a time window and attributes each change
 * to the local or remote writer from the update latency seen alongside it.
 */
export class SamplingWindowProbe {
    private readonly ctx: ProbeContext;
    private readonly scheduler: ITickScheduler;

    constructor(ctx: ProbeContext, scheduler: ITickScheduler) {
        this.ctx = ctx;
        this.scheduler = scheduler;
    }

    public observe(
        id: ObjectId | null | undefined,
        duration: number,
        callback: ((result: InferenceResult) => void) | undefined,
    ): TaskHandle<InferenceResult> {
        const { store, diagnostics } = this.ctx;

        // The windowed sample cannot be collapsed into an instant answer; fastCheck serves that
        if (typeof callback !== 'function') {
            diagnostics.emit({ type: 'callRejected', operation: 'observeOverWindow', reason: 'a completion callback is required' });
            return CooperativeTask.settledWith<InferenceResult>({ status: 'cancelled' });
        }

        if (!isValidTarget(store, id)) {
            diagnostics.emit({ type: 'invalidTarget', operation: 'observeOverWindow', target: id ?? null });
            const result = { ...INDETERMINATE_RESULT };
            callback(result);
            return CooperativeTask.settledWith({ status: 'completed', value: result });
        }

        let start: Vec3;
        try {
            start = copyVec3(store.getPose(id).position);
        } catch (err) {
            diagnostics.emit({ type: 'storeFailure', operation: 'observeOverWindow', objectId: id, error: describeError(err) });
            const result = { ...INDETERMINATE_RESULT };
            callback(result);
            return CooperativeTask.settledWith({ status: 'completed', value: result });
        }

        const session: SamplingSession = {
            startedAt: this.scheduler.now(),
            duration: Number.isFinite(duration) && duration > 0 ? duration : 0,
            lastPosition: start,
            lastRemoteCheckPosition: copyVec3(start),
            changes: 0,
            remoteChanges: 0,
        };

        return new CooperativeTask<InferenceResult>(this.scheduler, {
            step: () => {
                this.sample(id, session);
                if (this.scheduler.now() - session.startedAt < session.duration) return undefined;
                return { value: judgeWindow(session.changes, session.remoteChanges) };
            },
            onComplete: callback,
            onCancel: () => diagnostics.emit({ type: 'taskCancelled', task: 'observeOverWindow', objectId: id }),
        });
    }

    private sample(id: ObjectId, session: SamplingSession): void {
        const { store } = this.ctx;
        // A vanished object simply stops producing changes
        if (!store.isPhysicalObject(id)) return;

        try {
            const position = copyVec3(store.getPose(id).position);
            if (!sameVec3(position, session.lastPosition)) {
                session.changes++;
                session.lastPosition = position;
            }

            if (store.getUpdateAge(id) < this.ctx.latencyThreshold && !sameVec3(position, session.lastRemoteCheckPosition)) {
                session.remoteChanges++;
            }
            session.lastRemoteCheckPosition = copyVec3(position);
        } catch (err) {
            this.ctx.diagnostics.emit({ type: 'storeFailure', operation: 'observeOverWindow', objectId: id, error: describeError(err) });
        }
    }
}
