import type { IReplicatedObjectStore } from '@shared/simulation';
import type { ObjectId, Pose, Vec3 } from '@shared/types';
import { POSE_NUDGE_RADIANS, VELOCITY_NUDGE } from '@shared/constants';
import { addVec3, copyPose, copyVec3, rotateAboutX, samePose, sameVec3 } from '@shared/math';
import { describeError, type DiagnosticsChannel } from './diagnostics';

/** A writable object property the speculative probes can perturb. */
export interface SpeculativeProperty<T> {
    name: string;
    read(store: IReplicatedObjectStore, id: ObjectId): T;
    write(store: IReplicatedObjectStore, id: ObjectId, value: T): void;
    perturb(value: T): T;
    equals(a: T, b: T): boolean;
}

export const VELOCITY_PROPERTY: SpeculativeProperty<Vec3> = {
    name: 'velocity',
    read: (store, id) => copyVec3(store.getVelocity(id)),
    write: (store, id, value) => store.setVelocity(id, copyVec3(value)),
    perturb: (value) => addVec3(value, VELOCITY_NUDGE),
    equals: sameVec3,
};

export const POSE_PROPERTY: SpeculativeProperty<Pose> = {
    name: 'pose',
    read: (store, id) => copyPose(store.getPose(id)),
    write: (store, id, value) => store.setPose(id, copyPose(value)),
    perturb: (value) => ({ position: copyVec3(value.position), orientation: rotateAboutX(value.orientation, POSE_NUDGE_RADIANS) }),
    equals: samePose,
};

export const FIXED_FLAG_PROPERTY: SpeculativeProperty<boolean> = {
    name: 'fixed',
    read: (store, id) => store.isFixed(id),
    write: (store, id, value) => store.setFixed(id, value),
    perturb: (value) => !value,
    equals: (a, b) => a === b,
};

export const COLLISION_FLAG_PROPERTY: SpeculativeProperty<boolean> = {
    name: 'canCollide',
    read: (store, id) => store.canCollide(id),
    write: (store, id, value) => store.setCanCollide(id, value),
    perturb: (value) => !value,
    equals: (a, b) => a === b,
};

export type WriteOutcome = 'stuck' | 'rejected';

/**
 * Writes a perturbed value, checks whether it took, and restores the original on every exit path.
 * A restore that throws or does not take leaves the outcome untouched but reports the object
 * as possibly desynchronized.
 */
export function speculativeWrite<T>(
    store: IReplicatedObjectStore,
    id: ObjectId,
    property: SpeculativeProperty<T>,
    diagnostics: DiagnosticsChannel,
    probe: string,
): WriteOutcome {
    const original = property.read(store, id);
    let outcome: WriteOutcome = 'rejected';
    let writeError: string | null = null;

    try {
        property.write(store, id, property.perturb(original));
        if (!property.equals(property.read(store, id), original)) {
            outcome = 'stuck';
        }
    } catch (err) {
        writeError = describeError(err);
    } finally {
        restore(store, id, property, original, diagnostics, probe);
    }

    if (outcome === 'rejected') {
        diagnostics.emit({ type: 'mutationRejected', probe, objectId: id, error: writeError });
    }
    return outcome;
}

function restore<T>(
    store: IReplicatedObjectStore,
    id: ObjectId,
    property: SpeculativeProperty<T>,
    original: T,
    diagnostics: DiagnosticsChannel,
    probe: string,
): void {
    try {
        // A rejected write leaves nothing to undo
        if (property.equals(property.read(store, id), original)) return;
        property.write(store, id, original);
        if (!property.equals(property.read(store, id), original)) {
            diagnostics.emit({ type: 'revertFailed', probe, objectId: id, error: `${property.name} did not return to its original value` });
        }
    } catch (err) {
        diagnostics.emit({ type: 'revertFailed', probe, objectId: id, error: describeError(err) });
    }
}
