import { describe, expect, it } from 'vitest';
import { ReplicatedScene } from '@server/replicatedScene';

const OBSERVER = 'player-1';

const newScene = (rejectMode: 'ignore' | 'throw' = 'ignore'): ReplicatedScene =>
  new ReplicatedScene({ observerId: OBSERVER, rejectMode, logLevel: 'silent' });

describe('ReplicatedScene', () => {
  describe('ownership', () => {
    it('derives the authority tag from the owner', () => {
      const scene = newScene();
      scene.spawn({ id: 'door' });
      scene.spawn({ id: 'crate', owner: OBSERVER });
      scene.spawn({ id: 'decoy', owner: OBSERVER, authorityTag: 'player-2' });

      expect(scene.getAuthorityTag('door')).toBeNull();
      expect(scene.getAuthorityTag('crate')).toBe(OBSERVER);
      expect(scene.getAuthorityTag('decoy')).toBe('player-2');
    });

    it('silently drops writes to objects the observer does not own', () => {
      const scene = newScene();
      scene.spawn({ id: 'door' });

      scene.setVelocity('door', [1, 0, 0]);
      scene.setCanCollide('door', false);
      expect(scene.getVelocity('door')).toEqual([0, 0, 0]);
      expect(scene.canCollide('door')).toBe(true);
    });

    it('throws on foreign writes in throw mode', () => {
      const scene = newScene('throw');
      scene.spawn({ id: 'door' });
      expect(() => scene.setFixed('door', true)).toThrow('setFixed rejected: door is owned by server');
    });

    it('accepts writes once ownership moves to the observer', () => {
      const scene = newScene();
      scene.spawn({ id: 'door' });
      scene.setAuthority('door', OBSERVER);

      scene.setVelocity('door', [1, 0, 0]);
      expect(scene.getVelocity('door')).toEqual([1, 0, 0]);
      expect(scene.getAuthorityTag('door')).toBe(OBSERVER);
    });
  });

  describe('step', () => {
    it('integrates forces over the step', () => {
      const scene = newScene();
      scene.spawn({ id: 'crate', owner: OBSERVER, mass: 2 });

      scene.applyForce('crate', [4, 0, 0]);
      scene.step(0.5);

      expect(scene.getVelocity('crate')).toEqual([1, 0, 0]);
      expect(scene.getPose('crate').position).toEqual([0.5, 0, 0]);
      scene.step(0.5);
      expect(scene.getPose('crate').position).toEqual([1, 0, 0]);
    });

    it('keeps fixed objects in place', () => {
      const scene = newScene();
      scene.spawn({ id: 'wall', fixed: true, velocity: [1, 0, 0] });
      scene.step(1);
      expect(scene.getPose('wall').position).toEqual([0, 0, 0]);
    });

    it('ages updates and refreshes them for moving foreign objects', () => {
      const scene = newScene();
      scene.spawn({ id: 'rock', updateAge: 0 });
      scene.spawn({ id: 'cart', velocity: [1, 0, 0] });
      scene.spawn({ id: 'kart', owner: OBSERVER, velocity: [1, 0, 0], updateAge: 0 });

      scene.step(0.25);

      expect(scene.getUpdateAge('rock')).toBe(0.25);
      expect(scene.getUpdateAge('cart')).toBe(0);
      expect(scene.getUpdateAge('kart')).toBe(0.25);
    });

    it('resets the update age on a pushed remote update', () => {
      const scene = newScene();
      scene.spawn({ id: 'door' });

      scene.pushRemoteUpdate('door', { position: [0, 1, 0] });

      expect(scene.getUpdateAge('door')).toBe(0);
      expect(scene.getPose('door').position).toEqual([0, 1, 0]);
    });
  });

  describe('welds and lifecycle', () => {
    it('welds symmetrically and unwelds on removal', () => {
      const scene = newScene();
      scene.spawn({ id: 'a' });
      scene.spawn({ id: 'b' });
      scene.spawn({ id: 'c' });
      scene.weld('a', 'b');
      scene.weld('a', 'c');

      expect(scene.getConnectedObjects('a')).toEqual(['b', 'c']);
      expect(scene.getConnectedObjects('b')).toEqual(['a']);

      scene.remove('b');
      expect(scene.getConnectedObjects('a')).toEqual(['c']);
      expect(scene.isPhysicalObject('b')).toBe(false);
    });

    it('clones as an unwelded copy the observer owns', () => {
      const scene = newScene();
      scene.spawn({ id: 'door', position: [1, 2, 3], avatarOwner: 'player-2' });
      scene.spawn({ id: 'frame' });
      scene.weld('door', 'frame');

      const clone = scene.cloneObject('door');

      expect(clone).toBe('door#shadow1');
      expect(scene.getPose(clone).position).toEqual([1, 2, 3]);
      expect(scene.getAuthorityTag(clone)).toBe(OBSERVER);
      expect(scene.getConnectedObjects(clone)).toEqual([]);
      expect(scene.getAvatarOwner(clone)).toBeNull();

      scene.destroyObject(clone);
      expect(scene.has(clone)).toBe(false);
    });

    it('distinguishes physical, live and unknown objects', () => {
      const scene = newScene();
      scene.spawn({ id: 'folder', physical: false });
      scene.spawn({ id: 'crate' });
      scene.detach('crate');

      expect(scene.isPhysicalObject('folder')).toBe(false);
      expect(scene.isPhysicalObject('crate')).toBe(true);
      expect(scene.isInLiveScene('crate')).toBe(false);
      expect(scene.isInLiveScene('ghost')).toBe(false);
      expect(() => scene.getVelocity('ghost')).toThrow('Unknown object ghost');
    });

    it('refuses duplicate ids', () => {
      const scene = newScene();
      scene.spawn({ id: 'crate' });
      expect(() => scene.spawn({ id: 'crate' })).toThrow('Object crate already exists');
    });
  });
});
