import type { DetailedAuthorityInfo } from '@shared/authority';
import { AuthorityKind, type InferenceResult, type ObjectId } from '@shared/types';
import { magnitude } from '@shared/math';
import { describeError } from './diagnostics';
import { isValidTarget, runAllProbes, type ProbeContext, type ProbeVote } from './probes';

export const INDETERMINATE_RESULT: InferenceResult = { authority: AuthorityKind.INDETERMINATE, confidence: 0 };

/**
 * Majority vote over LOCAL and REMOTE. A tie, including 0-0, is INDETERMINATE.
 * A lone decisive vote among indeterminate ones wins with confidence 1.
 */
export function fuseVotes(votes: readonly AuthorityKind[]): InferenceResult {
    let local = 0;
    let remote = 0;
    for (const vote of votes) {
        if (vote === AuthorityKind.LOCAL) local++;
        else if (vote === AuthorityKind.REMOTE) remote++;
    }

    const decisive = local + remote;
    if (decisive === 0 || local === remote) return { ...INDETERMINATE_RESULT };

    const winner = local > remote ? AuthorityKind.LOCAL : AuthorityKind.REMOTE;
    return { authority: winner, confidence: Math.max(local, remote) / decisive };
}

/** Fixed objects are never treated as locally authored, whatever the other signals say. */
function fuseFixed(votes: readonly AuthorityKind[]): InferenceResult {
    const decisive = votes.filter(v => v !== AuthorityKind.INDETERMINATE);
    const remote = decisive.filter(v => v === AuthorityKind.REMOTE).length;
    if (remote === 0) return { ...INDETERMINATE_RESULT };
    return { authority: AuthorityKind.REMOTE, confidence: remote / decisive.length };
}

export class FusionAggregator {
    private readonly ctx: ProbeContext;

    constructor(ctx: ProbeContext) {
        this.ctx = ctx;
    }

    public infer(id: ObjectId | null | undefined): InferenceResult {
        if (!isValidTarget(this.ctx.store, id)) {
            this.ctx.diagnostics.emit({ type: 'invalidTarget', operation: 'infer', target: id ?? null });
            return { ...INDETERMINATE_RESULT };
        }
        return this.aggregate(id, runAllProbes(this.ctx, id));
    }

    public isLocal(id: ObjectId | null | undefined, threshold: number): boolean {
        const result = this.infer(id);
        return result.authority === AuthorityKind.LOCAL && result.confidence >= threshold;
    }

    public isRemote(id: ObjectId | null | undefined, threshold: number): boolean {
        const result = this.infer(id);
        return result.authority === AuthorityKind.REMOTE && result.confidence >= threshold;
    }

    public detailedInfo(id: ObjectId | null | undefined): DetailedAuthorityInfo {
        const { store, diagnostics } = this.ctx;
        if (!isValidTarget(store, id)) {
            diagnostics.emit({ type: 'invalidTarget', operation: 'detailedInfo', target: id ?? null });
            return { valid: false, reason: 'Invalid object provided' };
        }

        const probeVotes = runAllProbes(this.ctx, id);
        const result = this.aggregate(id, probeVotes);
        const votes: Record<string, AuthorityKind> = {};
        for (const { probe, vote } of probeVotes) votes[probe] = vote;

        try {
            return {
                valid: true,
                objectId: id,
                name: store.getName(id),
                votes,
                authorityTag: store.getAuthorityTag(id),
                updateAge: store.getUpdateAge(id),
                isFixed: store.isFixed(id),
                canCollide: store.canCollide(id),
                mass: store.getMass(id),
                speed: magnitude(store.getVelocity(id)),
                connectedObjects: store.getConnectedObjects(id).length,
                authority: result.authority,
                confidence: result.confidence,
            };
        } catch (err) {
            diagnostics.emit({ type: 'storeFailure', operation: 'detailedInfo', objectId: id, error: describeError(err) });
            return { valid: false, reason: describeError(err) };
        }
    }

    private aggregate(id: ObjectId, probeVotes: readonly ProbeVote[]): InferenceResult {
        const votes = probeVotes.map(v => v.vote);
        let fixed = false;
        try {
            fixed = this.ctx.store.isFixed(id);
        } catch (err) {
            this.ctx.diagnostics.emit({ type: 'storeFailure', operation: 'infer', objectId: id, error: describeError(err) });
        }
        return fixed ? fuseFixed(votes) : fuseVotes(votes);
    }
}
