import type { InstancedMesh, Object3D } from 'three';
import type { SlotPool } from '@slotpool/core';

/**
 * Mirrors the active slots of an `Object3D` pool into a THREE.InstancedMesh.
 *
 * Each `sync()` walks the pool in slot order, refreshes every active
 * object's local matrix (when its `matrixAutoUpdate` is set) and packs the
 * matrices into consecutive instances. `mesh.count` is set to the number of
 * active slots, so freed slots simply stop being drawn.
 *
 * Instances are packed, so an instance id is not a slot index; use
 * `slotAt()` to map a raycast `instanceId` back to the pool.
 */
export class InstancedSlotSynchronizer<T extends Object3D, A extends unknown[] = []> {
  private readonly pool: SlotPool<T, A>;
  private readonly mesh: InstancedMesh;
  /** Slot index per written instance, valid up to `mesh.count`. */
  private readonly instanceSlots: Int32Array;
  private _disposed: boolean = false;

  /** @throws RangeError when the mesh has fewer instances than the pool has slots. */
  constructor(pool: SlotPool<T, A>, mesh: InstancedMesh) {
    const instances = mesh.instanceMatrix.count;
    if (instances < pool.size) {
      throw new RangeError(
        `InstancedSlotSynchronizer: mesh holds ${instances} instances but the pool has ${pool.size} slots`,
      );
    }
    this.pool = pool;
    this.mesh = mesh;
    this.instanceSlots = new Int32Array(pool.size);
    mesh.count = 0;
  }

  /**
   * Write every active slot into the mesh. Returns the number of instances
   * written. No-op returning 0 after `dispose()`.
   */
  sync(): number {
    if (this._disposed) return 0;
    let written = 0;
    for (let i = 0; i < this.pool.size; i++) {
      if (!this.pool.isInUse(i)) continue;
      const object = this.pool.at(i);
      if (object.matrixAutoUpdate) object.updateMatrix();
      this.mesh.setMatrixAt(written, object.matrix);
      this.instanceSlots[written] = i;
      written += 1;
    }
    this.mesh.count = written;
    this.mesh.instanceMatrix.needsUpdate = true;
    return written;
  }

  /** Slot index drawn as `instanceId` by the last `sync()`, or -1. */
  slotAt(instanceId: number): number {
    if (!Number.isInteger(instanceId) || instanceId < 0 || instanceId >= this.mesh.count) return -1;
    return this.instanceSlots[instanceId];
  }

  /**
   * Hide every instance and stop syncing. The pool and mesh stay owned by the
   * caller.
   */
  dispose(): void {
    if (this._disposed) return;
    this._disposed = true;
    this.mesh.count = 0;
  }
}
