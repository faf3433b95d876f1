import { z } from 'zod';
import {
  AVATAR_LIMB_PATTERNS,
  AVATAR_ROOT_PART_NAME,
  CACHE_LIFETIME,
  CACHE_SWEEP_INTERVAL,
  DEFAULT_CONFIDENCE_THRESHOLD,
  FAST_LATENCY_THRESHOLD,
  LATENCY_THRESHOLD,
  MUTATION_LOCAL_THRESHOLD,
  NEIGHBOUR_REMOTE_THRESHOLD,
  SHADOW_IMPULSE_SCALE,
} from '@shared/constants';

const Seconds = z.number().finite().nonnegative();
const Probability = z.number().min(0).max(1);

export const AvatarOptionsSchema = z.object({
  rootPartName: z.string().min(1).default(AVATAR_ROOT_PART_NAME),
  limbPatterns: z.array(z.string().min(1)).default([...AVATAR_LIMB_PATTERNS]),
});

export const EngineOptionsSchema = z.object({
  // The observer's identity, compared against authority tags and avatar owners
  localActorId: z.string().min(1),
  cacheLifetime: Seconds.default(CACHE_LIFETIME),
  sweepInterval: Seconds.default(CACHE_SWEEP_INTERVAL),
  latencyThreshold: Seconds.default(LATENCY_THRESHOLD),
  fastLatencyThreshold: Seconds.default(FAST_LATENCY_THRESHOLD),
  confidenceThreshold: Probability.default(DEFAULT_CONFIDENCE_THRESHOLD),
  neighbourRemoteThreshold: Probability.default(NEIGHBOUR_REMOTE_THRESHOLD),
  mutationLocalThreshold: Probability.default(MUTATION_LOCAL_THRESHOLD),
  shadowImpulseScale: z.number().finite().default(SHADOW_IMPULSE_SCALE),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('warn'),
  avatar: AvatarOptionsSchema.default({}),
});

export type EngineOptionsInput = z.input<typeof EngineOptionsSchema>;
export type EngineOptions = z.output<typeof EngineOptionsSchema>;

export class EngineConfigError extends Error {
  public readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    super(`Invalid engine options: ${issues.map(i => `${i.path.join('.') || '(root)'} ${i.message}`).join('; ')}`);
    this.name = 'EngineConfigError';
    this.issues = issues;
  }
}

export function createEngineOptions(input: EngineOptionsInput): EngineOptions {
  const parsed = EngineOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new EngineConfigError(parsed.error.issues);
  }
  return parsed.data;
}
