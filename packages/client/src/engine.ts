import type { AuthorityInference, AvatarAuthorityInfo, DetailedAuthorityInfo } from '@shared/authority';
import type { DiagnosticEvent } from '@shared/messages';
import type { IReplicatedObjectStore, ITickScheduler, TaskHandle } from '@shared/simulation';
import type {
  AssemblyReport,
  AuthorityKind,
  AuthorityScanOptions,
  InferenceResult,
  ObjectId,
  ScanSummary,
  ShadowRunResult,
  Vec3,
} from '@shared/types';
import { createLogger, type Logger } from '@shared/log';
import { AssemblyPropagator } from './authority/assembly';
import { AvatarAuthorityRules } from './authority/avatarRules';
import { DiagnosticsChannel } from './authority/diagnostics';
import { FastPathChecker } from './authority/fastPath';
import { FusionAggregator } from './authority/fusion';
import { AuthorityMonitor, type AuthorityChangeListener } from './authority/monitor';
import type { ProbeContext } from './authority/probes';
import { ResultCache } from './authority/resultCache';
import { SamplingWindowProbe } from './authority/samplingWindow';
import { ShadowSimulator } from './authority/shadowSimulation';
import { createEngineOptions, type EngineOptions, type EngineOptionsInput } from './config';

/**
 * Observer-side authority inference over a replicated object store.
 * Every call is synchronous except the windowed, shadow and watch tasks, which run on the scheduler.
 */
export class AuthorityEngine implements AuthorityInference {
  public readonly options: EngineOptions;
  private readonly log: Logger;
  private readonly diagnostics: DiagnosticsChannel;
  private readonly cache: ResultCache;
  private readonly fusion: FusionAggregator;
  private readonly fastPath: FastPathChecker;
  private readonly assembly: AssemblyPropagator;
  private readonly shadows: ShadowSimulator;
  private readonly sampler: SamplingWindowProbe;
  private readonly avatars: AvatarAuthorityRules;
  private readonly monitor: AuthorityMonitor;

  constructor(store: IReplicatedObjectStore, scheduler: ITickScheduler, options: EngineOptionsInput) {
    this.options = createEngineOptions(options);
    this.log = createLogger('AuthorityEngine', this.options.logLevel);
    this.diagnostics = new DiagnosticsChannel(this.log.child('diagnostics'));

    const ctx: ProbeContext = {
      store,
      diagnostics: this.diagnostics,
      localActorId: this.options.localActorId,
      latencyThreshold: this.options.latencyThreshold,
    };

    this.cache = new ResultCache({
      lifetime: this.options.cacheLifetime,
      sweepInterval: this.options.sweepInterval,
      now: () => scheduler.now(),
      isLive: (id) => store.isInLiveScene(id),
      diagnostics: this.diagnostics,
    });
    this.fusion = new FusionAggregator(ctx);
    this.assembly = new AssemblyPropagator(ctx, this.fusion, {
      neighbourRemote: this.options.neighbourRemoteThreshold,
      local: this.options.mutationLocalThreshold,
    });
    this.shadows = new ShadowSimulator(ctx, scheduler, this.assembly, this.fusion, this.options.shadowImpulseScale);
    const isShadow = (id: ObjectId): boolean => this.shadows.isShadow(id);
    this.fastPath = new FastPathChecker(ctx, this.cache, this.fusion, this.options.fastLatencyThreshold, isShadow);
    this.sampler = new SamplingWindowProbe(ctx, scheduler);
    this.avatars = new AvatarAuthorityRules(ctx, this.fusion, {
      rootPartName: this.options.avatar.rootPartName,
      limbPatterns: this.options.avatar.limbPatterns,
      localThreshold: this.options.confidenceThreshold,
    });
    this.monitor = new AuthorityMonitor(ctx, scheduler, this.fastPath, isShadow);

    this.log.info(`Engine ready for observer ${this.options.localActorId}`);
  }

  // --- Fusion ---

  public infer(id: ObjectId | null | undefined): InferenceResult {
    return this.fusion.infer(id);
  }

  public isLocal(id: ObjectId | null | undefined, threshold: number = this.options.confidenceThreshold): boolean {
    return this.fusion.isLocal(id, threshold);
  }

  public isRemote(id: ObjectId | null | undefined, threshold: number = this.options.confidenceThreshold): boolean {
    return this.fusion.isRemote(id, threshold);
  }

  public detailedInfo(id: ObjectId | null | undefined): DetailedAuthorityInfo {
    return this.fusion.detailedInfo(id);
  }

  // --- Fast path & cache ---

  public fastCheck(id: ObjectId | null | undefined): AuthorityKind {
    return this.fastPath.fastCheck(id);
  }

  public batchProcess(ids: Iterable<ObjectId>): Map<ObjectId, AuthorityKind> {
    return this.fastPath.batchProcess(ids);
  }

  public getObjectsWithAuthority(kind: AuthorityKind, options?: AuthorityScanOptions): ObjectId[] {
    return this.fastPath.getObjectsWithAuthority(kind, options);
  }

  public detailedCheck(id: ObjectId | null | undefined): InferenceResult {
    return this.fastPath.detailedCheck(id);
  }

  public setCacheLifetime(seconds: number): void {
    if (!Number.isFinite(seconds) || seconds < 0) {
      this.diagnostics.emit({ type: 'callRejected', operation: 'setCacheLifetime', reason: `invalid lifetime ${seconds}` });
      return;
    }
    this.cache.setLifetime(seconds);
  }

  public clearCache(): void {
    this.cache.clear();
  }

  // --- Assembly & mutation ---

  public isSafeToMutate(id: ObjectId | null | undefined): boolean {
    return this.assembly.isSafeToMutate(id);
  }

  public collectAssembly(id: ObjectId | null | undefined, recursive: boolean = true): AssemblyReport {
    return this.assembly.collectAssembly(id, recursive);
  }

  public safeApplyForce(id: ObjectId | null | undefined, force: Vec3): boolean {
    return this.assembly.safeApplyForce(id, force);
  }

  public safeApplyImpulse(id: ObjectId | null | undefined, impulse: Vec3): boolean {
    return this.assembly.safeApplyImpulse(id, impulse);
  }

  public simulatePhysics(
    id: ObjectId | null | undefined,
    force: Vec3,
    duration: number,
    callback?: (result: ShadowRunResult) => void,
  ): TaskHandle<ShadowRunResult> {
    return this.shadows.simulate(id, force, duration, callback);
  }

  // --- Tasks ---

  public observeOverWindow(
    id: ObjectId | null | undefined,
    duration: number,
    callback?: (result: InferenceResult) => void,
  ): TaskHandle<InferenceResult> {
    return this.sampler.observe(id, duration, callback);
  }

  public watch(id: ObjectId, onChange: AuthorityChangeListener): TaskHandle<void> {
    return this.monitor.watch(id, onChange);
  }

  public scan(ids?: Iterable<ObjectId>): ScanSummary {
    return this.monitor.scan(ids);
  }

  // --- Avatars ---

  public inferAvatarAuthority(id: ObjectId | null | undefined): InferenceResult {
    return this.avatars.infer(id);
  }

  public canManipulateLocally(id: ObjectId | null | undefined): boolean {
    return this.avatars.canManipulateLocally(id);
  }

  public avatarInfo(id: ObjectId | null | undefined): AvatarAuthorityInfo {
    return this.avatars.info(id);
  }

  // --- Diagnostics ---

  public onDiagnostic(listener: (event: DiagnosticEvent) => void): () => void {
    return this.diagnostics.subscribe(listener);
  }

  public desynchronizedObjects(): ObjectId[] {
    return this.diagnostics.desynchronizedObjects();
  }

  public clearDesyncFlag(id: ObjectId): void {
    this.diagnostics.clearDesyncFlag(id);
  }
}
