export {
  ReplicatedScene,
  SERVER_ACTOR_ID,
  type RejectMode,
  type RemoteUpdate,
  type ReplicatedSceneOptions,
  type SceneObjectSpec,
} from './replicatedScene';
