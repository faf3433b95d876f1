import type { ITickScheduler, TaskHandle } from '@shared/simulation';
import { AuthorityKind, type ObjectId, type ScanSummary } from '@shared/types';
import type { FastPathChecker } from './fastPath';
import { isValidTarget, type ProbeContext } from './probes';
import { CooperativeTask } from './task';

export type AuthorityChangeListener = (previous: AuthorityKind | null, current: AuthorityKind) => void;

export class AuthorityMonitor {
    private readonly ctx: ProbeContext;
    private readonly scheduler: ITickScheduler;
    private readonly fastPath: FastPathChecker;
    private readonly isShadow: (id: ObjectId) => boolean;

    constructor(
        ctx: ProbeContext,
        scheduler: ITickScheduler,
        fastPath: FastPathChecker,
        isShadow: (id: ObjectId) => boolean,
    ) {
        this.ctx = ctx;
        this.scheduler = scheduler;
        this.fastPath = fastPath;
        this.isShadow = isShadow;
    }

    /** Reports every verdict change on each tick until cancelled. The first observation reports previous = null. */
    public watch(id: ObjectId, onChange: AuthorityChangeListener): TaskHandle<void> {
        if (!isValidTarget(this.ctx.store, id)) {
            this.ctx.diagnostics.emit({ type: 'invalidTarget', operation: 'watch', target: id });
            return CooperativeTask.settledWith<void>({ status: 'cancelled' });
        }

        let previous: AuthorityKind | null = null;
        return new CooperativeTask<void>(this.scheduler, {
            step: () => {
                const current = this.fastPath.fastCheck(id);
                if (current !== previous) {
                    const before = previous;
                    previous = current;
                    onChange(before, current);
                }
                return undefined;
            },
            onCancel: () => this.ctx.diagnostics.emit({ type: 'taskCancelled', task: 'watch', objectId: id }),
        });
    }

    /** Summarises explicit ids, or every object in the store apart from running shadow clones. */
    public scan(ids?: Iterable<ObjectId>): ScanSummary {
        const summary: ScanSummary = { total: 0, local: 0, remote: 0, indeterminate: 0, localObjects: [] };
        const skipShadows = ids === undefined;
        for (const id of ids ?? this.ctx.store.objects()) {
            if (skipShadows && this.isShadow(id)) continue;
            summary.total++;
            switch (this.fastPath.fastCheck(id)) {
                case AuthorityKind.LOCAL:
                    summary.local++;
                    summary.localObjects.push(id);
                    break;
                case AuthorityKind.REMOTE:
                    summary.remote++;
                    break;
                case AuthorityKind.INDETERMINATE:
                    summary.indeterminate++;
                    break;
            }
        }
        return summary;
    }
}
