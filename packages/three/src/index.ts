import { Object3D } from 'three';
import { SlotPool } from '@slotpool/core';

export { InstancedSlotSynchronizer } from './synchronizer.js';

/** Put an object back at the origin with identity rotation and unit scale. */
export function resetObject3D(object: Object3D): void {
  object.position.set(0, 0, 0);
  object.quaternion.identity();
  object.scale.set(1, 1, 1);
  object.visible = true;
}

/**
 * Create a pool of `capacity` Object3D instances. Freed slots are reset in
 * place with `resetObject3D`, so no Object3D is allocated after construction.
 */
export function createObject3DPool(capacity: number): SlotPool<Object3D> {
  return new SlotPool<Object3D>(capacity, {
    create: () => new Object3D(),
    reset: resetObject3D,
  });
}
