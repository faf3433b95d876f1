export { AuthorityEngine } from './engine';
export { FrameScheduler } from './scheduler';
export {
  AvatarOptionsSchema,
  EngineConfigError,
  EngineOptionsSchema,
  createEngineOptions,
  type EngineOptions,
  type EngineOptionsInput,
} from './config';
export { fuseVotes } from './authority/fusion';
export { judgeWindow } from './authority/samplingWindow';
export { PROBE_ORDER, ProbeKind } from './authority/probes';
export type { AuthorityChangeListener } from './authority/monitor';
