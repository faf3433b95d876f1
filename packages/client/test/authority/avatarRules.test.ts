import { describe, expect, it } from 'vitest';
import { AuthorityKind } from '@shared/types';
import type { ReplicatedScene } from '@server/replicatedScene';
import { OBSERVER, OTHER_PLAYER, createHarness, spawnLocal } from '../harness';

// Owned by the observer but with stale tag and latency: plain fusion gives local at 4/6
function spawnOwnPart(scene: ReplicatedScene, id: string, name: string): void {
  scene.spawn({ id, name, owner: OBSERVER, authorityTag: null, avatarOwner: OBSERVER });
}

describe('avatar rules', () => {
  it('treats another actor\'s avatar as remote', () => {
    const { scene, engine } = createHarness();
    scene.spawn({ id: 'their-arm', name: 'LeftArm', owner: OTHER_PLAYER, avatarOwner: OTHER_PLAYER });

    expect(engine.inferAvatarAuthority('their-arm')).toEqual({ authority: AuthorityKind.REMOTE, confidence: 1 });
    expect(engine.canManipulateLocally('their-arm')).toBe(false);
  });

  it('overrides a weakly local root part to remote', () => {
    const { scene, engine } = createHarness();
    spawnOwnPart(scene, 'root', 'RootPart');

    expect(engine.infer('root').confidence).toBeCloseTo(2 / 3);
    expect(engine.inferAvatarAuthority('root')).toEqual({ authority: AuthorityKind.REMOTE, confidence: 0.7 });
    expect(engine.canManipulateLocally('root')).toBe(false);
  });

  it('keeps a strongly local root part', () => {
    const { scene, engine } = createHarness();
    spawnLocal(scene, 'root', { name: 'RootPart', avatarOwner: OBSERVER });

    expect(engine.inferAvatarAuthority('root')).toEqual({ authority: AuthorityKind.LOCAL, confidence: 1 });
  });

  it('raises the confidence of own limbs', () => {
    const { scene, engine } = createHarness();
    spawnOwnPart(scene, 'left-arm', 'LeftArm');

    const result = engine.inferAvatarAuthority('left-arm');
    expect(result.authority).toBe(AuthorityKind.LOCAL);
    expect(result.confidence).toBeCloseTo(2 / 3 + 0.15);
    expect(engine.canManipulateLocally('left-arm')).toBe(true);
  });

  it('caps the limb bonus at 1', () => {
    const { scene, engine } = createHarness();
    spawnLocal(scene, 'foot', { name: 'RightFoot', avatarOwner: OBSERVER });

    expect(engine.inferAvatarAuthority('foot')).toEqual({ authority: AuthorityKind.LOCAL, confidence: 1 });
  });

  it('uses plain fusion for other own parts', () => {
    const { scene, engine } = createHarness();
    spawnOwnPart(scene, 'torso', 'Torso');

    expect(engine.inferAvatarAuthority('torso')).toEqual(engine.infer('torso'));
    expect(engine.canManipulateLocally('torso')).toBe(false);
  });

  it('honours configured part names', () => {
    const { scene, engine } = createHarness({ engine: { avatar: { rootPartName: 'Pelvis', limbPatterns: ['Wing'] } } });
    spawnOwnPart(scene, 'pelvis', 'Pelvis');
    spawnOwnPart(scene, 'arm', 'LeftArm');

    expect(engine.inferAvatarAuthority('pelvis')).toEqual({ authority: AuthorityKind.REMOTE, confidence: 0.7 });
    expect(engine.inferAvatarAuthority('arm').confidence).toBeCloseTo(2 / 3);
  });

  it('falls back to isLocal for objects outside any avatar', () => {
    const { scene, engine } = createHarness();
    spawnLocal(scene, 'crate');

    expect(engine.canManipulateLocally('crate')).toBe(true);
    expect(engine.canManipulateLocally(null)).toBe(false);
  });
});

describe('avatarInfo', () => {
  it('extends the detailed record with the avatar verdict', () => {
    const { scene, engine } = createHarness();
    spawnOwnPart(scene, 'left-arm', 'LeftArm');

    const info = engine.avatarInfo('left-arm');
    if (!info.valid || !info.avatar) throw new Error('expected an avatar record');
    expect(info.name).toBe('LeftArm');
    expect(info.avatar.owner).toBe(OBSERVER);
    expect(info.avatar.isLocalAvatar).toBe(true);
    expect(info.avatar.partName).toBe('LeftArm');
    expect(info.avatar.authority).toBe(AuthorityKind.LOCAL);
    expect(info.avatar.confidence).toBeCloseTo(2 / 3 + 0.15);
    expect(info.confidence).toBe(info.avatar.confidence);
  });

  it('has no avatar section for other objects', () => {
    const { scene, engine } = createHarness();
    spawnLocal(scene, 'crate');

    expect(engine.avatarInfo('crate')).toMatchObject({ valid: true, avatar: null });
    expect(engine.avatarInfo(null)).toEqual({ valid: false, reason: 'Invalid object provided', avatar: null });
  });
});
