import type { AvatarAuthorityInfo } from '@shared/authority';
import { AuthorityKind, type ActorId, type InferenceResult, type ObjectId } from '@shared/types';
import {
    AVATAR_LIMB_CONFIDENCE_BONUS,
    AVATAR_MANIPULATE_THRESHOLD,
    AVATAR_ROOT_MIN_CONFIDENCE,
    AVATAR_ROOT_OVERRIDE_CONFIDENCE,
} from '@shared/constants';
import { describeError } from './diagnostics';
import { INDETERMINATE_RESULT, type FusionAggregator } from './fusion';
import { isValidTarget, type ProbeContext } from './probes';

export interface AvatarRuleOptions {
    rootPartName: string;
    limbPatterns: readonly string[];
    localThreshold: number;
}

interface AvatarMembership {
    owner: ActorId;
    partName: string;
}

/**
 * Avatar parts follow their own ownership patterns: another actor's avatar is never ours,
 * our root part is usually held back by the server, our limbs usually are ours.
 */
export class AvatarAuthorityRules {
    private readonly ctx: ProbeContext;
    private readonly fusion: FusionAggregator;
    private readonly options: AvatarRuleOptions;

    constructor(ctx: ProbeContext, fusion: FusionAggregator, options: AvatarRuleOptions) {
        this.ctx = ctx;
        this.fusion = fusion;
        this.options = options;
    }

    public infer(id: ObjectId | null | undefined): InferenceResult {
        if (!isValidTarget(this.ctx.store, id)) {
            this.ctx.diagnostics.emit({ type: 'invalidTarget', operation: 'inferAvatarAuthority', target: id ?? null });
            return { ...INDETERMINATE_RESULT };
        }
        const membership = this.membership(id);
        if (!membership) return this.fusion.infer(id);
        return this.applyRules(id, membership, null);
    }

    public canManipulateLocally(id: ObjectId | null | undefined): boolean {
        if (!isValidTarget(this.ctx.store, id)) {
            this.ctx.diagnostics.emit({ type: 'invalidTarget', operation: 'canManipulateLocally', target: id ?? null });
            return false;
        }
        const membership = this.membership(id);
        if (!membership) return this.fusion.isLocal(id, this.options.localThreshold);
        if (membership.owner !== this.ctx.localActorId) return false;

        const result = this.applyRules(id, membership, null);
        return result.authority === AuthorityKind.LOCAL && result.confidence > AVATAR_MANIPULATE_THRESHOLD;
    }

    public info(id: ObjectId | null | undefined): AvatarAuthorityInfo {
        const base = this.fusion.detailedInfo(id);
        if (!base.valid) return { ...base, avatar: null };

        const membership = this.membership(base.objectId);
        if (!membership) return { ...base, avatar: null };

        // Reuse the aggregate detailedInfo already fused instead of probing again
        const result = this.applyRules(base.objectId, membership, { authority: base.authority, confidence: base.confidence });
        return {
            ...base,
            authority: result.authority,
            confidence: result.confidence,
            avatar: {
                owner: membership.owner,
                isLocalAvatar: membership.owner === this.ctx.localActorId,
                partName: membership.partName,
                authority: result.authority,
                confidence: result.confidence,
            },
        };
    }

    private membership(id: ObjectId): AvatarMembership | null {
        try {
            const owner = this.ctx.store.getAvatarOwner(id);
            if (owner === null) return null;
            return { owner, partName: this.ctx.store.getName(id) };
        } catch (err) {
            this.ctx.diagnostics.emit({ type: 'storeFailure', operation: 'avatarMembership', objectId: id, error: describeError(err) });
            return null;
        }
    }

    private applyRules(id: ObjectId, membership: AvatarMembership, fused: InferenceResult | null): InferenceResult {
        if (membership.owner !== this.ctx.localActorId) {
            return { authority: AuthorityKind.REMOTE, confidence: 1 };
        }

        const base = fused ?? this.fusion.infer(id);
        const { partName } = membership;

        if (partName === this.options.rootPartName) {
            if (base.authority === AuthorityKind.LOCAL && base.confidence < AVATAR_ROOT_MIN_CONFIDENCE) {
                return { authority: AuthorityKind.REMOTE, confidence: AVATAR_ROOT_OVERRIDE_CONFIDENCE };
            }
            return base;
        }

        if (this.options.limbPatterns.some(pattern => partName.includes(pattern))) {
            if (base.authority === AuthorityKind.LOCAL) {
                return { authority: AuthorityKind.LOCAL, confidence: Math.min(1, base.confidence + AVATAR_LIMB_CONFIDENCE_BONUS) };
            }
        }
        return base;
    }
}
