import type { IReplicatedObjectStore } from '@shared/simulation';
import { AuthorityKind, type ActorId, type ObjectId } from '@shared/types';
import { describeError, type DiagnosticsChannel } from './diagnostics';
import {
    COLLISION_FLAG_PROPERTY,
    FIXED_FLAG_PROPERTY,
    POSE_PROPERTY,
    VELOCITY_PROPERTY,
    speculativeWrite,
    type SpeculativeProperty,
} from './speculativeWrite';

export enum ProbeKind {
    AUTHORITY_TAG = 'authorityTag',
    UPDATE_LATENCY = 'updateLatency',
    VELOCITY_MUTATION = 'velocityMutation',
    POSE_MUTATION = 'poseMutation',
    FIXED_FLAG_MUTATION = 'fixedFlagMutation',
    COLLISION_FLAG_MUTATION = 'collisionFlagMutation',
}

/** Fusion always runs exactly this set, in this order. */
export const PROBE_ORDER: readonly ProbeKind[] = [
    ProbeKind.AUTHORITY_TAG,
    ProbeKind.UPDATE_LATENCY,
    ProbeKind.VELOCITY_MUTATION,
    ProbeKind.POSE_MUTATION,
    ProbeKind.FIXED_FLAG_MUTATION,
    ProbeKind.COLLISION_FLAG_MUTATION,
];

export interface ProbeContext {
    store: IReplicatedObjectStore;
    diagnostics: DiagnosticsChannel;
    localActorId: ActorId;
    latencyThreshold: number;
}

type ProbeStrategy = (ctx: ProbeContext, id: ObjectId) => AuthorityKind;

function mutationProbe<T>(kind: ProbeKind, property: SpeculativeProperty<T>): ProbeStrategy {
    return (ctx, id) => {
        // Fixed objects sit outside the physics step; a local write would only move our copy
        if (ctx.store.isFixed(id)) return AuthorityKind.INDETERMINATE;
        const outcome = speculativeWrite(ctx.store, id, property, ctx.diagnostics, kind);
        return outcome === 'stuck' ? AuthorityKind.LOCAL : AuthorityKind.REMOTE;
    };
}

const STRATEGIES: Record<ProbeKind, ProbeStrategy> = {
    [ProbeKind.AUTHORITY_TAG]: (ctx, id) => {
        const tag = ctx.store.getAuthorityTag(id);
        // Unset usually means the server default owner
        return tag === ctx.localActorId ? AuthorityKind.LOCAL : AuthorityKind.REMOTE;
    },

    [ProbeKind.UPDATE_LATENCY]: (ctx, id) =>
        ctx.store.getUpdateAge(id) < ctx.latencyThreshold ? AuthorityKind.LOCAL : AuthorityKind.REMOTE,

    [ProbeKind.VELOCITY_MUTATION]: mutationProbe(ProbeKind.VELOCITY_MUTATION, VELOCITY_PROPERTY),
    [ProbeKind.POSE_MUTATION]: mutationProbe(ProbeKind.POSE_MUTATION, POSE_PROPERTY),

    [ProbeKind.FIXED_FLAG_MUTATION]: (ctx, id) => {
        const fixed = ctx.store.isFixed(id);
        // Never release a fixed object into the simulation, and never toggle a jointed movable one
        if (fixed) return AuthorityKind.REMOTE;
        if (ctx.store.getConnectedObjects(id).length > 0) return AuthorityKind.INDETERMINATE;
        const outcome = speculativeWrite(ctx.store, id, FIXED_FLAG_PROPERTY, ctx.diagnostics, ProbeKind.FIXED_FLAG_MUTATION);
        return outcome === 'stuck' ? AuthorityKind.LOCAL : AuthorityKind.REMOTE;
    },

    [ProbeKind.COLLISION_FLAG_MUTATION]: mutationProbe(ProbeKind.COLLISION_FLAG_MUTATION, COLLISION_FLAG_PROPERTY),
};

export function isValidTarget(store: IReplicatedObjectStore, id: ObjectId | null | undefined): id is ObjectId {
    return typeof id === 'string' && id.length > 0 && store.isPhysicalObject(id);
}

/**
 * Runs one probe. Invalid targets and store failures during the read phase
 * yield INDETERMINATE with a diagnostic; nothing propagates to the caller.
 */
export function runProbe(kind: ProbeKind, ctx: ProbeContext, id: ObjectId | null | undefined): AuthorityKind {
    if (!isValidTarget(ctx.store, id)) {
        ctx.diagnostics.emit({ type: 'invalidTarget', operation: kind, target: id ?? null });
        return AuthorityKind.INDETERMINATE;
    }
    try {
        return STRATEGIES[kind](ctx, id);
    } catch (err) {
        ctx.diagnostics.emit({
            type: 'storeFailure',
            operation: kind,
            objectId: id,
            error: describeError(err),
        });
        return AuthorityKind.INDETERMINATE;
    }
}

export interface ProbeVote {
    probe: ProbeKind;
    vote: AuthorityKind;
}

export function runAllProbes(ctx: ProbeContext, id: ObjectId): ProbeVote[] {
    return PROBE_ORDER.map(probe => ({ probe, vote: runProbe(probe, ctx, id) }));
}
