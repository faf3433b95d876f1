import { vec3 } from 'gl-matrix';
import type { IReplicatedObjectStore, ITickScheduler } from '@shared/simulation';
import type { ActorId, ObjectId, Pose, Quat, Vec3 } from '@shared/types';
import { copyPose, copyVec3 } from '@shared/math';
import { createLogger, type LogLevel, type Logger } from '@shared/log';

export const SERVER_ACTOR_ID: ActorId = 'server';

export interface SceneObjectSpec {
  id: ObjectId;
  name?: string;
  /** The actor whose writes are canonical. Defaults to the server. */
  owner?: ActorId;
  /** Replicated ownership hint. Defaults to the owner, or unset for server-owned objects. */
  authorityTag?: ActorId | null;
  position?: Vec3;
  orientation?: Quat;
  velocity?: Vec3;
  fixed?: boolean;
  canCollide?: boolean;
  mass?: number;
  avatarOwner?: ActorId | null;
  physical?: boolean;
  /** Seconds since the last replicated update; never updated by default. */
  updateAge?: number;
}

export interface RemoteUpdate {
  position?: Vec3;
  orientation?: Quat;
  velocity?: Vec3;
}

export type RejectMode = 'ignore' | 'throw';

export interface ReplicatedSceneOptions {
  observerId: ActorId;
  /** How writes to objects the observer does not own are refused. */
  rejectMode?: RejectMode;
  logLevel?: LogLevel;
}

interface SceneObject {
  id: ObjectId;
  name: string;
  owner: ActorId;
  authorityTag: ActorId | null;
  physical: boolean;
  inScene: boolean;
  pose: Pose;
  velocity: Vec3;
  fixed: boolean;
  canCollide: boolean;
  visible: boolean;
  mass: number;
  avatarOwner: ActorId | null;
  updateAge: number;
  force: Vec3;
  connections: Set<ObjectId>;
}

/**
 * In-process replicated object store seen from one observer.
 * Plays the authority's side: owner-checked writes, replicated update ages,
 * welds, shadow clones and a simple velocity integrator.
 */
export class ReplicatedScene implements IReplicatedObjectStore {
  public readonly observerId: ActorId;
  private readonly rejectMode: RejectMode;
  private readonly log: Logger;
  private readonly objectsById: Map<ObjectId, SceneObject> = new Map();
  private cloneCounter = 0;

  constructor(options: ReplicatedSceneOptions) {
    this.observerId = options.observerId;
    this.rejectMode = options.rejectMode ?? 'ignore';
    this.log = createLogger('ReplicatedScene', options.logLevel ?? 'warn');
  }

  // --- Scene setup ---

  public spawn(spec: SceneObjectSpec): ObjectId {
    if (this.objectsById.has(spec.id)) {
      throw new Error(`Object ${spec.id} already exists`);
    }
    const owner = spec.owner ?? SERVER_ACTOR_ID;
    this.objectsById.set(spec.id, {
      id: spec.id,
      name: spec.name ?? spec.id,
      owner,
      authorityTag: spec.authorityTag !== undefined ? spec.authorityTag : owner === SERVER_ACTOR_ID ? null : owner,
      physical: spec.physical ?? true,
      inScene: true,
      pose: {
        position: spec.position ? copyVec3(spec.position) : [0, 0, 0],
        orientation: spec.orientation ? [...spec.orientation] : [0, 0, 0, 1],
      },
      velocity: spec.velocity ? copyVec3(spec.velocity) : [0, 0, 0],
      fixed: spec.fixed ?? false,
      canCollide: spec.canCollide ?? true,
      visible: true,
      mass: spec.mass ?? 1,
      avatarOwner: spec.avatarOwner ?? null,
      updateAge: spec.updateAge ?? Number.POSITIVE_INFINITY,
      force: [0, 0, 0],
      connections: new Set(),
    });
    return spec.id;
  }

  public weld(a: ObjectId, b: ObjectId): void {
    this.require(a).connections.add(b);
    this.require(b).connections.add(a);
  }

  public setAuthority(id: ObjectId, owner: ActorId, authorityTag?: ActorId | null): void {
    const obj = this.require(id);
    obj.owner = owner;
    obj.authorityTag = authorityTag !== undefined ? authorityTag : owner === SERVER_ACTOR_ID ? null : owner;
  }

  public setUpdateAge(id: ObjectId, age: number): void {
    this.require(id).updateAge = age;
  }

  /** Applies state streamed from the owning peer and resets the update age. */
  public pushRemoteUpdate(id: ObjectId, update: RemoteUpdate): void {
    const obj = this.require(id);
    if (update.position) obj.pose.position = copyVec3(update.position);
    if (update.orientation) obj.pose.orientation = [...update.orientation];
    if (update.velocity) obj.velocity = copyVec3(update.velocity);
    obj.updateAge = 0;
  }

  /** Takes the object out of the live scene graph while its handle stays valid. */
  public detach(id: ObjectId): void {
    this.require(id).inScene = false;
  }

  public remove(id: ObjectId): void {
    const obj = this.objectsById.get(id);
    if (!obj) return;
    for (const other of obj.connections) {
      this.objectsById.get(other)?.connections.delete(id);
    }
    this.objectsById.delete(id);
  }

  public has(id: ObjectId): boolean {
    return this.objectsById.has(id);
  }

  public isVisible(id: ObjectId): boolean {
    return this.require(id).visible;
  }

  // --- Simulation ---

  /** Runs the scene's step before anything registered later on the same scheduler. */
  public attach(scheduler: ITickScheduler): () => void {
    return scheduler.onTick((deltaTime) => this.step(deltaTime));
  }

  public step(deltaTime: number): void {
    for (const obj of this.objectsById.values()) {
      obj.updateAge += deltaTime;
      if (obj.fixed || !obj.physical) {
        obj.force = [0, 0, 0];
        continue;
      }

      vec3.scaleAndAdd(obj.velocity, obj.velocity, obj.force, deltaTime / obj.mass);
      obj.force = [0, 0, 0];
      if (vec3.length(obj.velocity) === 0) continue;

      vec3.scaleAndAdd(obj.pose.position, obj.pose.position, obj.velocity, deltaTime);
      // Motion of an object owned elsewhere reaches us as a fresh replicated update
      if (obj.owner !== this.observerId) obj.updateAge = 0;
    }
  }

  // --- IReplicatedObjectStore ---

  public isPhysicalObject(id: ObjectId): boolean {
    return this.objectsById.get(id)?.physical ?? false;
  }

  public isInLiveScene(id: ObjectId): boolean {
    return this.objectsById.get(id)?.inScene ?? false;
  }

  public objects(): Iterable<ObjectId> {
    return [...this.objectsById.keys()];
  }

  public getName(id: ObjectId): string {
    return this.require(id).name;
  }

  public getAuthorityTag(id: ObjectId): ActorId | null {
    return this.require(id).authorityTag;
  }

  public getUpdateAge(id: ObjectId): number {
    return this.require(id).updateAge;
  }

  public getVelocity(id: ObjectId): Vec3 {
    return copyVec3(this.require(id).velocity);
  }

  public setVelocity(id: ObjectId, velocity: Vec3): void {
    const obj = this.writable(id, 'setVelocity');
    if (obj) obj.velocity = copyVec3(velocity);
  }

  public getPose(id: ObjectId): Pose {
    return copyPose(this.require(id).pose);
  }

  public setPose(id: ObjectId, pose: Pose): void {
    const obj = this.writable(id, 'setPose');
    if (obj) obj.pose = copyPose(pose);
  }

  public isFixed(id: ObjectId): boolean {
    return this.require(id).fixed;
  }

  public setFixed(id: ObjectId, fixed: boolean): void {
    const obj = this.writable(id, 'setFixed');
    if (obj) obj.fixed = fixed;
  }

  public canCollide(id: ObjectId): boolean {
    return this.require(id).canCollide;
  }

  public setCanCollide(id: ObjectId, canCollide: boolean): void {
    const obj = this.writable(id, 'setCanCollide');
    if (obj) obj.canCollide = canCollide;
  }

  public setVisible(id: ObjectId, visible: boolean): void {
    const obj = this.writable(id, 'setVisible');
    if (obj) obj.visible = visible;
  }

  public getMass(id: ObjectId): number {
    return this.require(id).mass;
  }

  public getConnectedObjects(id: ObjectId): ObjectId[] {
    return [...this.require(id).connections];
  }

  public getAvatarOwner(id: ObjectId): ActorId | null {
    return this.require(id).avatarOwner;
  }

  public applyForce(id: ObjectId, force: Vec3): void {
    const obj = this.writable(id, 'applyForce');
    if (obj) vec3.add(obj.force, obj.force, force);
  }

  public applyImpulse(id: ObjectId, impulse: Vec3): void {
    const obj = this.writable(id, 'applyImpulse');
    if (obj && !obj.fixed) vec3.scaleAndAdd(obj.velocity, obj.velocity, impulse, 1 / obj.mass);
  }

  /** Clones are local-only copies owned by the observer, with no welds and no avatar. */
  public cloneObject(id: ObjectId): ObjectId {
    const source = this.require(id);
    const cloneId = `${id}#shadow${++this.cloneCounter}`;
    this.objectsById.set(cloneId, {
      ...source,
      id: cloneId,
      owner: this.observerId,
      authorityTag: this.observerId,
      inScene: true,
      pose: copyPose(source.pose),
      velocity: copyVec3(source.velocity),
      avatarOwner: null,
      updateAge: Number.POSITIVE_INFINITY,
      force: [0, 0, 0],
      connections: new Set(),
    });
    this.log.debug(`Cloned ${id} as ${cloneId}`);
    return cloneId;
  }

  public destroyObject(id: ObjectId): void {
    if (this.writable(id, 'destroyObject')) this.remove(id);
  }

  private require(id: ObjectId): SceneObject {
    const obj = this.objectsById.get(id);
    if (!obj) throw new Error(`Unknown object ${id}`);
    return obj;
  }

  private writable(id: ObjectId, operation: string): SceneObject | null {
    const obj = this.require(id);
    if (obj.owner === this.observerId) return obj;

    this.log.debug(`${operation} on ${id} refused, owned by ${obj.owner}`);
    if (this.rejectMode === 'throw') {
      throw new Error(`${operation} rejected: ${id} is owned by ${obj.owner}`);
    }
    return null;
  }
}
