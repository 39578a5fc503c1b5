/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Scene registry - live meshes, line sets and text labels with their GPU
 * resources, plus the adds still in flight.
 *
 * Adds are asynchronous (pipeline creation, label upload) while removes are
 * synchronous. Pending adds are tracked by id: removing or clearing an id
 * whose add has not settled cancels it, and the resources it produces are
 * released instead of registered.
 */

import {
  boundsToSphere,
  createEmptyBounds,
  expandBounds,
  type AABB,
  type BillboardPayload,
  type LinePayload,
  type MeshPayload,
  type RGBA,
  type Sphere,
} from '@partview/geometry';
import type { SceneKey, SceneObjectKind } from './types.js';
import {
  createBillboardResources,
  createLineResources,
  createMeshResources,
  destroyResources,
  pipelineRequestFor,
  type BillboardResources,
  type GpuScope,
  type LineResources,
  type MeshResources,
  type ObjectResources,
} from './resources.js';
import { SceneError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('Scene');

interface PendingAdd {
  cancelled: boolean;
}

class Collection<R extends ObjectResources> {
  readonly live: R[] = [];
  readonly pending = new Map<string, PendingAdd>();

  constructor(readonly kind: SceneObjectKind) {}

  /** Index of a live object by id or insertion position, -1 if none */
  indexOf(key: SceneKey): number {
    if (typeof key === 'number') {
      return Number.isInteger(key) && key >= 0 && key < this.live.length ? key : -1;
    }
    return this.live.findIndex((r) => r.id === key);
  }

  has(id: string): boolean {
    return this.pending.has(id) || this.live.some((r) => r.id === id);
  }
}

export interface SceneRegistryOptions {
  /** Called after an add is registered and after any remove or clear that changed the scene */
  onChange?: (kind: SceneObjectKind) => void;
}

export class SceneRegistry {
  private scope: GpuScope;
  private meshes = new Collection<MeshResources>('mesh');
  private lines = new Collection<LineResources>('lines');
  private billboards = new Collection<BillboardResources>('text');
  private onChange: ((kind: SceneObjectKind) => void) | undefined;

  constructor(scope: GpuScope, options: SceneRegistryOptions = {}) {
    this.scope = scope;
    this.onChange = options.onChange;
  }

  // ==========================================================================
  // Meshes
  // ==========================================================================

  addMesh(payload: MeshPayload): Promise<void> {
    return this.track(this.meshes, payload.id, () => createMeshResources(this.scope, payload));
  }

  removeMesh(key: SceneKey): void {
    this.remove(this.meshes, key, 'removeMesh');
  }

  /**
   * Rewrite a single-colored mesh's color uniform. Crossing the opacity
   * boundary swaps the pipeline; the returned promise settles once the new
   * one is attached.
   */
  changeMeshColor(key: SceneKey, color: RGBA): Promise<void> {
    const index = this.meshes.indexOf(key);
    const mesh = index >= 0 ? this.meshes.live[index] : undefined;
    if (!mesh) {
      log.warn(`No mesh for key ${JSON.stringify(key)}`, { operation: 'changeMeshColor' });
      return Promise.resolve();
    }
    if (!mesh.singleColor) {
      log.warn('Mesh uses vertex colors, color change ignored', {
        operation: 'changeMeshColor',
        objectId: mesh.id,
      });
      return Promise.resolve();
    }

    this.scope.device.queue.writeBuffer(mesh.colorUniform, 0, new Float32Array(color));
    const transparent = color[3] < 1;
    if (transparent === mesh.transparent) return Promise.resolve();

    mesh.transparent = transparent;
    return this.scope.factory.assign(mesh, pipelineRequestFor(mesh));
  }

  clearAllMeshes(): void {
    this.clearCollection(this.meshes);
  }

  getMeshes(): readonly MeshResources[] {
    return this.meshes.live;
  }

  // ==========================================================================
  // Lines
  // ==========================================================================

  addLines(payload: LinePayload): Promise<void> {
    return this.track(this.lines, payload.id, () => createLineResources(this.scope, payload));
  }

  removeLines(key: SceneKey): void {
    this.remove(this.lines, key, 'removeLines');
  }

  clearAllLines(): void {
    this.clearCollection(this.lines);
  }

  getLines(): readonly LineResources[] {
    return this.lines.live;
  }

  // ==========================================================================
  // Text billboards
  // ==========================================================================

  addTextBillboard(payload: BillboardPayload): Promise<void> {
    return this.track(this.billboards, payload.id, () => createBillboardResources(this.scope, payload));
  }

  removeTextBillboard(key: SceneKey): void {
    this.remove(this.billboards, key, 'removeTextBillboard');
  }

  clearAllTextBillboards(): void {
    this.clearCollection(this.billboards);
  }

  getBillboards(): readonly BillboardResources[] {
    return this.billboards.live;
  }

  // ==========================================================================
  // Whole scene
  // ==========================================================================

  /** Number of adds that have not settled yet */
  getPendingCount(): number {
    return this.meshes.pending.size + this.lines.pending.size + this.billboards.pending.size;
  }

  isEmpty(): boolean {
    return this.meshes.live.length === 0 && this.lines.live.length === 0 && this.billboards.live.length === 0;
  }

  /** Box around every live object */
  getBounds(): AABB {
    const bounds = createEmptyBounds();
    for (const r of this.allLive()) {
      const { min, max } = r.bounds;
      expandBounds(bounds, [min.x, min.y, min.z, max.x, max.y, max.z]);
    }
    return bounds;
  }

  /** Sphere around every live object; a unit sphere at the origin when empty */
  getBoundingSphere(): Sphere {
    return boundsToSphere(this.getBounds());
  }

  /**
   * Request every live object's pipeline again, after the pipeline cache
   * was dropped.
   */
  async rebuildPipelines(): Promise<void> {
    const factory = this.scope.factory;
    await Promise.all(this.allLive().map((r) => factory.assign(r, pipelineRequestFor(r))));
  }

  clear(): void {
    this.clearCollection(this.meshes);
    this.clearCollection(this.lines);
    this.clearCollection(this.billboards);
  }

  dispose(): void {
    this.onChange = undefined;
    this.clear();
  }

  private allLive(): ObjectResources[] {
    return [...this.meshes.live, ...this.lines.live, ...this.billboards.live];
  }

  private track<R extends ObjectResources>(
    collection: Collection<R>,
    id: string,
    create: () => Promise<R>
  ): Promise<void> {
    if (collection.has(id)) {
      throw new SceneError(`A ${collection.kind} object with id "${id}" already exists`, id);
    }

    const ticket: PendingAdd = { cancelled: false };
    collection.pending.set(id, ticket);
    const sampleCount = this.scope.factory.getSampleCount();

    let creating: Promise<R>;
    try {
      creating = create();
    } catch (error) {
      collection.pending.delete(id);
      throw error;
    }
    return this.settle(collection, id, ticket, creating, sampleCount);
  }

  private async settle<R extends ObjectResources>(
    collection: Collection<R>,
    id: string,
    ticket: PendingAdd,
    creating: Promise<R>,
    sampleCount: number
  ): Promise<void> {
    let resources: R;
    try {
      resources = await creating;
    } catch (error) {
      this.dropTicket(collection, id, ticket);
      throw error;
    }
    this.dropTicket(collection, id, ticket);

    if (ticket.cancelled) {
      destroyResources(resources);
      log.debug('Add cancelled before it settled', undefined, { operation: 'add', objectId: id, objectKind: collection.kind });
      return;
    }

    collection.live.push(resources);
    // Pipeline was built for a sample count that has since changed
    if (this.scope.factory.getSampleCount() !== sampleCount) {
      void this.scope.factory.assign(resources, pipelineRequestFor(resources));
    }
    log.info('Added', { operation: 'add', objectId: id, objectKind: collection.kind });
    this.onChange?.(collection.kind);
  }

  private dropTicket<R extends ObjectResources>(collection: Collection<R>, id: string, ticket: PendingAdd): void {
    // A remove may have cancelled this add and a new add reused the id
    if (collection.pending.get(id) === ticket) collection.pending.delete(id);
  }

  private clearCollection<R extends ObjectResources>(collection: Collection<R>): void {
    for (const ticket of collection.pending.values()) ticket.cancelled = true;
    collection.pending.clear();

    if (collection.live.length === 0) return;
    for (const r of collection.live) destroyResources(r);
    collection.live.length = 0;
    this.onChange?.(collection.kind);
  }

  private remove<R extends ObjectResources>(collection: Collection<R>, key: SceneKey, operation: string): void {
    const index = collection.indexOf(key);
    if (index >= 0) {
      const [removed] = collection.live.splice(index, 1);
      destroyResources(removed);
      this.onChange?.(collection.kind);
      return;
    }

    const ticket = typeof key === 'string' ? collection.pending.get(key) : undefined;
    if (typeof key === 'string' && ticket) {
      ticket.cancelled = true;
      collection.pending.delete(key);
      log.debug('Cancelled pending add', undefined, { operation, objectId: key });
      return;
    }

    log.warn(`No ${collection.kind} object for key ${JSON.stringify(key)}`, { operation });
  }
}
