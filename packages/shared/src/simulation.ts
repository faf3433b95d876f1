
import type { ActorId, ObjectId, Pose, Vec3 } from './types';

/**
 * The replicated object store as seen from the observer.
 * The engine only reads it and issues speculative writes through it;
 * ownership, replication and physics stay on the store's side.
 */
export interface IReplicatedObjectStore {
  /** True when the id names an existing object of a physical kind. */
  isPhysicalObject(id: ObjectId): boolean;
  /** True while the object is still part of the live scene graph. */
  isInLiveScene(id: ObjectId): boolean;
  objects(): Iterable<ObjectId>;
  getName(id: ObjectId): string;

  getAuthorityTag(id: ObjectId): ActorId | null;
  /** Seconds since the last externally sourced state update. */
  getUpdateAge(id: ObjectId): number;

  getVelocity(id: ObjectId): Vec3;
  setVelocity(id: ObjectId, velocity: Vec3): void;
  getPose(id: ObjectId): Pose;
  setPose(id: ObjectId, pose: Pose): void;
  isFixed(id: ObjectId): boolean;
  setFixed(id: ObjectId, fixed: boolean): void;
  canCollide(id: ObjectId): boolean;
  setCanCollide(id: ObjectId, canCollide: boolean): void;
  setVisible(id: ObjectId, visible: boolean): void;
  getMass(id: ObjectId): number;

  getConnectedObjects(id: ObjectId): ObjectId[];
  /** The actor whose avatar this object belongs to, if any. */
  getAvatarOwner(id: ObjectId): ActorId | null;

  applyForce(id: ObjectId, force: Vec3): void;
  applyImpulse(id: ObjectId, impulse: Vec3): void;

  cloneObject(id: ObjectId): ObjectId;
  destroyObject(id: ObjectId): void;
}

export type TickCallback = (deltaTime: number) => void;

/** The per-frame hook long-running tasks register against. */
export interface ITickScheduler {
  /** Current simulation time in seconds. */
  now(): number;
  /** Registers a per-tick callback; the returned function deregisters it. */
  onTick(callback: TickCallback): () => void;
}

export type TaskOutcome<T> =
  | { status: 'completed'; value: T }
  | { status: 'cancelled' };

/** Handle to a cooperative multi-tick task. */
export interface TaskHandle<T> {
  readonly active: boolean;
  /** Resolves exactly once, on completion or cancellation. */
  readonly settled: Promise<TaskOutcome<T>>;
  cancel(): void;
}
