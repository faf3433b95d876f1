
export type Vec3 = [number, number, number];
export type Quat = [number, number, number, number];

/** Stable handle of a simulated object. Two objects with identical physical state still have distinct ids. */
export type ObjectId = string;

/** Identity of a party that can hold authority (the observer, another peer, the server). */
export type ActorId = string;

export interface Pose {
	position: Vec3;
	orientation: Quat;
}

// Ordering matters only for display; Indeterminate never wins a vote.
export enum AuthorityKind {
	LOCAL = 'Local',
	REMOTE = 'Remote',
	INDETERMINATE = 'Indeterminate',
}

export interface InferenceResult {
	authority: AuthorityKind;
	// 0..1, exactly 0 iff authority is INDETERMINATE
	confidence: number;
}

/** Axis-aligned box used to restrict bulk scans. */
export interface Region {
	min: Vec3;
	max: Vec3;
}

export interface AuthorityScanOptions {
	region?: Region;
	skipFixed?: boolean;
	maxObjects?: number;
}

export interface AssemblyReport {
	closure: ObjectId[];
	allSafe: boolean;
	firstUnsafe: ObjectId | null;
}

export interface ShadowMemberResult {
	objectId: ObjectId;
	displacement: number;
	trajectory: Vec3[];
	finalVelocity: Vec3;
}

export type ShadowRunResult =
	| { success: true; duration: number; members: ShadowMemberResult[] }
	| {
		success: false;
		reason: string;
		assembly: ObjectId[];
		inference: InferenceResult;
	};

export interface ScanSummary {
	total: number;
	local: number;
	remote: number;
	indeterminate: number;
	localObjects: ObjectId[];
}
