import type {
    AssemblyReport,
    AuthorityKind,
    AuthorityScanOptions,
    InferenceResult,
    ObjectId,
    ScanSummary,
    ShadowRunResult,
    Vec3,
} from './types';
import type { TaskHandle } from './simulation';
import type { DiagnosticEvent } from './messages';

/** Per-probe votes plus the aggregate fused from those same votes. */
export type DetailedAuthorityInfo =
    | { valid: false; reason: string }
    | {
        valid: true;
        objectId: ObjectId;
        name: string;
        votes: Record<string, AuthorityKind>;
        authorityTag: string | null;
        updateAge: number;
        isFixed: boolean;
        canCollide: boolean;
        mass: number;
        speed: number;
        connectedObjects: number;
        authority: AuthorityKind;
        confidence: number;
    };

export interface AvatarDetails {
    owner: string;
    isLocalAvatar: boolean;
    partName: string;
    // Avatar rules replace the plain fused aggregate
    authority: AuthorityKind;
    confidence: number;
}

export type AvatarAuthorityInfo = DetailedAuthorityInfo & { avatar: AvatarDetails | null };

/** The observer-side authority inference surface. */
export interface AuthorityInference {
    infer(id: ObjectId | null | undefined): InferenceResult;
    isLocal(id: ObjectId | null | undefined, threshold?: number): boolean;
    isRemote(id: ObjectId | null | undefined, threshold?: number): boolean;
    detailedInfo(id: ObjectId | null | undefined): DetailedAuthorityInfo;

    fastCheck(id: ObjectId | null | undefined): AuthorityKind;
    batchProcess(ids: Iterable<ObjectId>): Map<ObjectId, AuthorityKind>;
    getObjectsWithAuthority(kind: AuthorityKind, options?: AuthorityScanOptions): ObjectId[];
    detailedCheck(id: ObjectId | null | undefined): InferenceResult;
    setCacheLifetime(seconds: number): void;
    clearCache(): void;

    isSafeToMutate(id: ObjectId | null | undefined): boolean;
    collectAssembly(id: ObjectId | null | undefined, recursive?: boolean): AssemblyReport;
    safeApplyForce(id: ObjectId | null | undefined, force: Vec3): boolean;
    safeApplyImpulse(id: ObjectId | null | undefined, impulse: Vec3): boolean;
    simulatePhysics(
        id: ObjectId | null | undefined,
        force: Vec3,
        duration: number,
        callback?: (result: ShadowRunResult) => void,
    ): TaskHandle<ShadowRunResult>;

    observeOverWindow(
        id: ObjectId | null | undefined,
        duration: number,
        // Required at run time; a call without one is rejected with a diagnostic
        callback?: (result: InferenceResult) => void,
    ): TaskHandle<InferenceResult>;

    inferAvatarAuthority(id: ObjectId | null | undefined): InferenceResult;
    canManipulateLocally(id: ObjectId | null | undefined): boolean;
    avatarInfo(id: ObjectId | null | undefined): AvatarAuthorityInfo;

    watch(
        id: ObjectId,
        onChange: (previous: AuthorityKind | null, current: AuthorityKind) => void,
    ): TaskHandle<void>;
    scan(ids?: Iterable<ObjectId>): ScanSummary;

    onDiagnostic(listener: (event: DiagnosticEvent) => void): () => void;
    desynchronizedObjects(): ObjectId[];
    clearDesyncFlag(id: ObjectId): void;
}
