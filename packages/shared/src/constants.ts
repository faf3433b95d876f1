/**
 * Update age (seconds) below which the latency probe attributes updates to the observer.
 */
export const LATENCY_THRESHOLD = 0.1;

// The fast path only trusts a much fresher update
export const FAST_LATENCY_THRESHOLD = 0.05;

export const DEFAULT_CONFIDENCE_THRESHOLD = 0.6;

// Mutation gating: neighbours confidently remote veto, the target needs a stricter local bar
export const NEIGHBOUR_REMOTE_THRESHOLD = 0.7;
export const MUTATION_LOCAL_THRESHOLD = 0.8;

export const CACHE_LIFETIME = 1.0; // seconds
export const CACHE_SWEEP_INTERVAL = 5.0; // seconds

export const DEFAULT_SCAN_LIMIT = 1000;

// Speculative write perturbations, small enough to be invisible for the single frame they live
export const VELOCITY_NUDGE: readonly [number, number, number] = [0.001, 0, 0];
export const POSE_NUDGE_RADIANS = 0.0001;

// Shadow runs apply a scaled-down impulse every tick
export const SHADOW_IMPULSE_SCALE = 0.1;

export const AVATAR_ROOT_PART_NAME = 'RootPart';
export const AVATAR_LIMB_PATTERNS: readonly string[] = ['Arm', 'Leg', 'Hand', 'Foot'];
export const AVATAR_ROOT_MIN_CONFIDENCE = 0.8;
export const AVATAR_ROOT_OVERRIDE_CONFIDENCE = 0.7;
export const AVATAR_LIMB_CONFIDENCE_BONUS = 0.15;
export const AVATAR_MANIPULATE_THRESHOLD = 0.7;

// Largest step a self-driven scheduler hands to its callbacks
export const MAX_TICK_DELTA = 1 / 20.0;
