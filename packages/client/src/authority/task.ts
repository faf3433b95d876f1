import type { ITickScheduler, TaskHandle, TaskOutcome } from '@shared/simulation';

export interface TaskHooks<T> {
    /** Called every tick while the task is active. Return a value to complete, or undefined to keep going. */
    step(deltaTime: number): { value: T } | undefined;
    onComplete?(value: T): void;
    onCancel?(): void;
}

/**
 * A multi-tick task registered against the scheduler.
 * Completes or cancels exactly once; after that it is deregistered and inert.
 */
export class CooperativeTask<T> implements TaskHandle<T> {
    public readonly settled: Promise<TaskOutcome<T>>;
    private readonly resolveSettled: (outcome: TaskOutcome<T>) => void;
    private unsubscribe: (() => void) | null = null;
    private isActive = true;
    private readonly hooks: TaskHooks<T>;

    constructor(scheduler: ITickScheduler, hooks: TaskHooks<T>) {
        this.hooks = hooks;
        let resolveSettled: (outcome: TaskOutcome<T>) => void = () => {};
        this.settled = new Promise(resolve => { resolveSettled = resolve; });
        this.resolveSettled = resolveSettled;
        this.unsubscribe = scheduler.onTick(this.tick);
    }

    /** A handle for a call that completed synchronously or was rejected outright. */
    static settledWith<T>(outcome: TaskOutcome<T>): TaskHandle<T> {
        return { active: false, settled: Promise.resolve(outcome), cancel: () => {} };
    }

    public get active(): boolean {
        return this.isActive;
    }

    public cancel(): void {
        if (!this.isActive) return;
        this.finish();
        this.resolveSettled({ status: 'cancelled' });
        this.hooks.onCancel?.();
    }

    private tick = (deltaTime: number): void => {
        if (!this.isActive) return;
        const result = this.hooks.step(deltaTime);
        if (!result || !this.isActive) return;
        this.finish();
        this.resolveSettled({ status: 'completed', value: result.value });
        this.hooks.onComplete?.(result.value);
    };

    private finish(): void {
        this.isActive = false;
        this.unsubscribe?.();
        this.unsubscribe = null;
    }
}
