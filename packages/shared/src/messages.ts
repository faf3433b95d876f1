
import type { ObjectId } from './types';

export type InferenceFault =
  | 'InvalidTarget'
  | 'MutationRejected'
  | 'RevertFailed'
  | 'PartialAssemblyFailure'
  | 'CancellationRequested'
  | 'CallRejected'
  | 'StoreFailure';

// --- Probe diagnostics ---

export interface InvalidTargetEvent {
  type: 'invalidTarget';
  operation: string;
  target: ObjectId | null;
}

export interface MutationRejectedEvent {
  type: 'mutationRejected';
  probe: string;
  objectId: ObjectId;
  error: string | null;
}

export interface RevertFailedEvent {
  type: 'revertFailed';
  probe: string;
  objectId: ObjectId;
  error: string | null;
}

// --- Engine diagnostics ---

export interface PartialAssemblyEvent {
  type: 'partialAssembly';
  root: ObjectId;
  firstUnsafe: ObjectId;
  closureSize: number;
}

export interface TaskCancelledEvent {
  type: 'taskCancelled';
  task: string;
  objectId: ObjectId;
}

export interface CallRejectedEvent {
  type: 'callRejected';
  operation: string;
  reason: string;
}

export interface StoreFailureEvent {
  type: 'storeFailure';
  operation: string;
  objectId: ObjectId;
  error: string;
}

export interface CacheSweptEvent {
  type: 'cacheSwept';
  removed: number;
  remaining: number;
}

/** A union of every event published on the diagnostics channel. */
export type DiagnosticEvent =
  | InvalidTargetEvent
  | MutationRejectedEvent
  | RevertFailedEvent
  | PartialAssemblyEvent
  | TaskCancelledEvent
  | CallRejectedEvent
  | StoreFailureEvent
  | CacheSweptEvent;

export const FAULT_BY_EVENT: Record<DiagnosticEvent['type'], InferenceFault | null> = {
  invalidTarget: 'InvalidTarget',
  mutationRejected: 'MutationRejected',
  revertFailed: 'RevertFailed',
  partialAssembly: 'PartialAssemblyFailure',
  taskCancelled: 'CancellationRequested',
  callRejected: 'CallRejected',
  storeFailure: 'StoreFailure',
  cacheSwept: null,
};
