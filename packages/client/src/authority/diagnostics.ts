import { FAULT_BY_EVENT, type DiagnosticEvent } from '@shared/messages';
import type { Logger } from '@shared/log';
import type { ObjectId } from '@shared/types';

export type DiagnosticListener = (event: DiagnosticEvent) => void;

/**
 * Out-of-band channel for everything the engine does not surface through its return values.
 * Also owns the set of objects whose speculative write could not be reverted.
 */
export class DiagnosticsChannel {
    private readonly log: Logger;
    private listeners: Set<DiagnosticListener> = new Set();
    private desynchronized: Set<ObjectId> = new Set();

    constructor(log: Logger) {
        this.log = log;
    }

    public subscribe(listener: DiagnosticListener): () => void {
        this.listeners.add(listener);
        return () => { this.listeners.delete(listener); };
    }

    public emit(event: DiagnosticEvent): void {
        const fault = FAULT_BY_EVENT[event.type];
        const log = fault ? this.log.child(fault) : this.log;
        switch (event.type) {
            case 'invalidTarget':
                log.warn(`${event.operation}: invalid target`, { target: event.target });
                break;
            case 'mutationRejected':
                log.debug(`${event.probe}: write did not stick on ${event.objectId}`, event.error ? { error: event.error } : undefined);
                break;
            case 'revertFailed':
                this.desynchronized.add(event.objectId);
                log.error(`${event.probe}: revert failed, ${event.objectId} may be desynchronized`, event.error ? { error: event.error } : undefined);
                break;
            case 'partialAssembly':
                log.info(`Assembly of ${event.root} is not safe`, { firstUnsafe: event.firstUnsafe, closureSize: event.closureSize });
                break;
            case 'taskCancelled':
                log.debug(`${event.task} on ${event.objectId} cancelled`);
                break;
            case 'callRejected':
                log.warn(`${event.operation}: ${event.reason}`);
                break;
            case 'storeFailure':
                log.error(`${event.operation} failed on ${event.objectId}`, { error: event.error });
                break;
            case 'cacheSwept':
                log.debug(`Cache swept`, { removed: event.removed, remaining: event.remaining });
                break;
        }

        for (const listener of [...this.listeners]) {
            try {
                listener(event);
            } catch (err) {
                this.log.error('Diagnostic listener threw', { error: describeError(err) });
            }
        }
    }

    public desynchronizedObjects(): ObjectId[] {
        return [...this.desynchronized];
    }

    public clearDesyncFlag(id: ObjectId): void {
        this.desynchronized.delete(id);
    }
}

export function describeError(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}
