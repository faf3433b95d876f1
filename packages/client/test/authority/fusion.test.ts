import { describe, expect, it } from 'vitest';
import { AuthorityKind } from '@shared/types';
import { ReplicatedScene } from '@server/replicatedScene';
import { fuseVotes } from '@client/authority/fusion';
import { OBSERVER, createHarness, eventsOfType, spawnLocal, spawnRemote } from '../harness';

const { LOCAL, REMOTE, INDETERMINATE } = AuthorityKind;

describe('fuseVotes', () => {
  it('is indeterminate with no decisive votes', () => {
    expect(fuseVotes([])).toEqual({ authority: INDETERMINATE, confidence: 0 });
    expect(fuseVotes([INDETERMINATE, INDETERMINATE])).toEqual({ authority: INDETERMINATE, confidence: 0 });
  });

  it('treats a tie as indeterminate', () => {
    expect(fuseVotes([LOCAL, REMOTE, INDETERMINATE])).toEqual({ authority: INDETERMINATE, confidence: 0 });
  });

  it('scores the majority over decisive votes only', () => {
    expect(fuseVotes([LOCAL, LOCAL, LOCAL, REMOTE, REMOTE, INDETERMINATE])).toEqual({ authority: LOCAL, confidence: 0.6 });
    expect(fuseVotes([INDETERMINATE, REMOTE, INDETERMINATE])).toEqual({ authority: REMOTE, confidence: 1 });
  });
});

describe('FusionAggregator', () => {
  it('reports an owned, tagged, recently touched object as local on every probe', () => {
    const { scene, engine } = createHarness();
    spawnLocal(scene, 'crate');

    const info = engine.detailedInfo('crate');
    expect(info.valid).toBe(true);
    if (!info.valid) return;
    expect(info.votes).toEqual({
      authorityTag: LOCAL,
      updateLatency: LOCAL,
      velocityMutation: LOCAL,
      poseMutation: LOCAL,
      fixedFlagMutation: LOCAL,
      collisionFlagMutation: LOCAL,
    });
    expect(info.authority).toBe(LOCAL);
    expect(info.confidence).toBe(1);
    expect(info.authorityTag).toBe(OBSERVER);
    expect(info.connectedObjects).toBe(0);
  });

  it('leaves every probed property as it found it', () => {
    const { scene, engine } = createHarness();
    spawnLocal(scene, 'crate', { velocity: [1, 2, 3], position: [4, 5, 6] });

    engine.infer('crate');

    expect(scene.getVelocity('crate')).toEqual([1, 2, 3]);
    expect(scene.getPose('crate')).toEqual({ position: [4, 5, 6], orientation: [0, 0, 0, 1] });
    expect(scene.isFixed('crate')).toBe(false);
    expect(scene.canCollide('crate')).toBe(true);
  });

  it('reports a server-owned object as remote', () => {
    const { scene, engine } = createHarness();
    spawnRemote(scene, 'door');

    expect(engine.infer('door')).toEqual({ authority: REMOTE, confidence: 1 });
    expect(engine.isRemote('door')).toBe(true);
    expect(engine.isLocal('door')).toBe(false);
  });

  it('returns identical results for consecutive calls', () => {
    const { scene, engine } = createHarness();
    spawnLocal(scene, 'crate', { authorityTag: 'server' });

    const first = engine.infer('crate');
    expect(engine.infer('crate')).toEqual(first);
  });

  it('records rejected writes as mutation diagnostics', () => {
    const scene = new ReplicatedScene({ observerId: OBSERVER, rejectMode: 'throw', logLevel: 'silent' });
    const { engine, events } = createHarness({ scene });
    spawnRemote(scene, 'door');

    expect(engine.infer('door')).toEqual({ authority: REMOTE, confidence: 1 });
    expect(eventsOfType(events, 'mutationRejected').map(e => [e.probe, e.error])).toEqual([
      ['velocityMutation', 'setVelocity rejected: door is owned by server'],
      ['poseMutation', 'setPose rejected: door is owned by server'],
      ['fixedFlagMutation', 'setFixed rejected: door is owned by server'],
      ['collisionFlagMutation', 'setCanCollide rejected: door is owned by server'],
    ]);
    expect(eventsOfType(events, 'revertFailed')).toEqual([]);
  });

  it('does not toggle the fixed flag of a jointed object', () => {
    const { scene, engine } = createHarness();
    spawnLocal(scene, 'hull');
    spawnLocal(scene, 'mast');
    scene.weld('hull', 'mast');

    const info = engine.detailedInfo('hull');
    if (!info.valid) throw new Error('expected a valid record');
    expect(info.votes.fixedFlagMutation).toBe(INDETERMINATE);
    expect(info.authority).toBe(LOCAL);
    expect(info.confidence).toBe(1);
    expect(info.connectedObjects).toBe(1);
  });

  describe('fixed objects', () => {
    it('are remote with confidence from the decisive probes', () => {
      const { scene, engine } = createHarness();
      spawnRemote(scene, 'wall', { fixed: true });

      const info = engine.detailedInfo('wall');
      if (!info.valid) throw new Error('expected a valid record');
      expect(info.votes).toEqual({
        authorityTag: REMOTE,
        updateLatency: REMOTE,
        velocityMutation: INDETERMINATE,
        poseMutation: INDETERMINATE,
        fixedFlagMutation: REMOTE,
        collisionFlagMutation: INDETERMINATE,
      });
      expect(info.authority).toBe(REMOTE);
      expect(info.confidence).toBe(1);
    });

    it('stay remote even when the other signals point at the observer', () => {
      const { scene, engine } = createHarness();
      spawnLocal(scene, 'pillar', { fixed: true });

      const result = engine.infer('pillar');
      expect(result.authority).toBe(REMOTE);
      expect(result.confidence).toBeCloseTo(1 / 3);
      expect(scene.isFixed('pillar')).toBe(true);
    });
  });

  describe('invalid targets', () => {
    it('yields indeterminate with a diagnostic', () => {
      const { scene, engine, events } = createHarness();
      scene.spawn({ id: 'folder', physical: false });

      expect(engine.infer(null)).toEqual({ authority: INDETERMINATE, confidence: 0 });
      expect(engine.infer('ghost')).toEqual({ authority: INDETERMINATE, confidence: 0 });
      expect(engine.infer('folder')).toEqual({ authority: INDETERMINATE, confidence: 0 });
      expect(eventsOfType(events, 'invalidTarget').map(e => e.target)).toEqual([null, 'ghost', 'folder']);
    });

    it('reports an invalid record from detailedInfo', () => {
      const { engine } = createHarness();
      expect(engine.detailedInfo(undefined)).toEqual({ valid: false, reason: 'Invalid object provided' });
    });
  });

  it('turns a failing store read into an indeterminate vote', () => {
    class StalledScene extends ReplicatedScene {
      getUpdateAge(): number {
        throw new Error('replication stalled');
      }
    }
    const scene = new StalledScene({ observerId: OBSERVER, logLevel: 'silent' });
    const { engine, events } = createHarness({ scene });
    spawnLocal(scene, 'crate');

    expect(engine.infer('crate')).toEqual({ authority: LOCAL, confidence: 1 });
    expect(eventsOfType(events, 'storeFailure')).toEqual([
      { type: 'storeFailure', operation: 'updateLatency', objectId: 'crate', error: 'replication stalled' },
    ]);
  });
});
