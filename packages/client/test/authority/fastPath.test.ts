import { describe, expect, it } from 'vitest';
import { AuthorityKind } from '@shared/types';
import { OBSERVER, createHarness, eventsOfType, spawnLocal, spawnRemote } from '../harness';

const { LOCAL, REMOTE, INDETERMINATE } = AuthorityKind;

describe('fastCheck', () => {
  it('serves the cached verdict within its lifetime and re-evaluates after', () => {
    const { scene, engine, tick } = createHarness();
    spawnLocal(scene, 'crate');

    expect(engine.fastCheck('crate')).toBe(LOCAL);
    scene.setAuthority('crate', 'server');
    expect(engine.fastCheck('crate')).toBe(LOCAL);

    tick(1);
    expect(engine.fastCheck('crate')).toBe(REMOTE);
  });

  it('decides fixed objects as remote before reading the tag', () => {
    const { scene, engine } = createHarness();
    spawnLocal(scene, 'pillar', { fixed: true });
    expect(engine.fastCheck('pillar')).toBe(REMOTE);
  });

  it('trusts a very fresh update when the tag is unset', () => {
    const { scene, engine } = createHarness();
    spawnRemote(scene, 'ball', { updateAge: 0.01 });
    expect(engine.fastCheck('ball')).toBe(LOCAL);
  });

  it('falls back to the velocity probe', () => {
    const { scene, engine } = createHarness();
    spawnRemote(scene, 'door');
    spawnLocal(scene, 'untagged', { authorityTag: null, updateAge: 1 });

    expect(engine.fastCheck('door')).toBe(REMOTE);
    expect(engine.fastCheck('untagged')).toBe(LOCAL);
  });

  it('never caches an invalid target', () => {
    const { scene, engine, events } = createHarness();

    expect(engine.fastCheck('ghost')).toBe(INDETERMINATE);
    spawnLocal(scene, 'ghost');
    expect(engine.fastCheck('ghost')).toBe(LOCAL);
    expect(eventsOfType(events, 'invalidTarget')).toEqual([
      { type: 'invalidTarget', operation: 'fastCheck', target: 'ghost' },
    ]);
  });

  it('drops the entry of an object that left the live scene', () => {
    const { scene, engine } = createHarness();
    spawnLocal(scene, 'crate', { updateAge: 1 });

    expect(engine.fastCheck('crate')).toBe(LOCAL);
    scene.detach('crate');
    scene.setAuthority('crate', 'server');
    expect(engine.fastCheck('crate')).toBe(REMOTE);
  });
});

describe('cache control', () => {
  it('clearCache forces re-evaluation', () => {
    const { scene, engine } = createHarness();
    spawnLocal(scene, 'crate', { updateAge: 1 });

    engine.fastCheck('crate');
    scene.setAuthority('crate', 'server');
    engine.clearCache();
    expect(engine.fastCheck('crate')).toBe(REMOTE);
  });

  it('a zero lifetime disables caching', () => {
    const { scene, engine } = createHarness();
    spawnLocal(scene, 'crate', { updateAge: 1 });
    engine.setCacheLifetime(0);

    expect(engine.fastCheck('crate')).toBe(LOCAL);
    scene.setAuthority('crate', 'server');
    expect(engine.fastCheck('crate')).toBe(REMOTE);
  });

  it('rejects a negative or non-finite lifetime', () => {
    const { scene, engine, events } = createHarness();
    spawnLocal(scene, 'crate');
    engine.setCacheLifetime(-1);
    engine.setCacheLifetime(Number.NaN);

    expect(eventsOfType(events, 'callRejected')).toEqual([
      { type: 'callRejected', operation: 'setCacheLifetime', reason: 'invalid lifetime -1' },
      { type: 'callRejected', operation: 'setCacheLifetime', reason: 'invalid lifetime NaN' },
    ]);
    engine.fastCheck('crate');
    scene.setAuthority('crate', 'server');
    expect(engine.fastCheck('crate')).toBe(LOCAL);
  });

  it('sweeps stale entries on a write once the sweep interval has passed', () => {
    const { scene, engine, events, tick } = createHarness();
    spawnLocal(scene, 'a');
    spawnLocal(scene, 'b');

    engine.fastCheck('a');
    tick(6);
    engine.fastCheck('b');

    expect(eventsOfType(events, 'cacheSwept')).toEqual([{ type: 'cacheSwept', removed: 1, remaining: 1 }]);
  });

  it('detailedCheck runs full fusion and warms the cache', () => {
    const { scene, engine } = createHarness();
    spawnRemote(scene, 'door');

    expect(engine.detailedCheck('door')).toEqual({ authority: REMOTE, confidence: 1 });
    scene.setAuthority('door', OBSERVER);
    expect(engine.fastCheck('door')).toBe(REMOTE);
  });
});

describe('bulk queries', () => {
  it('batchProcess maps every id to its verdict', () => {
    const { scene, engine } = createHarness();
    spawnLocal(scene, 'crate');
    spawnRemote(scene, 'door');

    expect(engine.batchProcess(['crate', 'door', 'ghost'])).toEqual(
      new Map([
        ['crate', LOCAL],
        ['door', REMOTE],
        ['ghost', INDETERMINATE],
      ]),
    );
  });

  describe('getObjectsWithAuthority', () => {
    const populate = () => {
      const harness = createHarness();
      const { scene } = harness;
      spawnLocal(scene, 'crate', { position: [0, 0, 0] });
      spawnLocal(scene, 'box', { position: [10, 0, 0] });
      spawnLocal(scene, 'wall', { fixed: true });
      spawnRemote(scene, 'door');
      scene.spawn({ id: 'folder', physical: false });
      return harness;
    };

    it('filters by authority', () => {
      const { engine } = populate();
      expect(engine.getObjectsWithAuthority(LOCAL)).toEqual(['crate', 'box']);
      expect(engine.getObjectsWithAuthority(REMOTE)).toEqual(['wall', 'door']);
    });

    it('restricts to a region and skips fixed objects on request', () => {
      const { engine } = populate();
      expect(engine.getObjectsWithAuthority(LOCAL, { region: { min: [-1, -1, -1], max: [1, 1, 1] } })).toEqual(['crate']);
      expect(engine.getObjectsWithAuthority(REMOTE, { skipFixed: true })).toEqual(['door']);
    });

    it('stops once maxObjects objects have been scanned', () => {
      const { engine } = populate();
      expect(engine.getObjectsWithAuthority(LOCAL, { maxObjects: 1 })).toEqual(['crate']);
      expect(engine.getObjectsWithAuthority(REMOTE, { maxObjects: 2 })).toEqual([]);
    });
  });
});
