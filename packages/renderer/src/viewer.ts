/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Viewer - ties the options store, orbit camera, render context and
 * renderer together for a host component.
 *
 * The host forwards input to `camera`, canvas size changes to `resize`, and
 * scene data to the add/remove methods. Callbacks report device state,
 * resizes and frame timing back.
 */

import {
  boundsToSphere,
  createEmptyBounds,
  exportSceneObject,
  type LineSetObject,
  type MeshObject,
  type RGBA,
  type SceneObject,
  type Sphere,
  type TextBillboardObject,
} from '@partview/geometry';
import type { Ray, SceneKey } from './types.js';
import { RenderContext, type CanvasLike } from './device.js';
import { Renderer } from './renderer.js';
import { OrbitCamera } from './camera.js';
import { FrameTimer } from './frame-timer.js';
import {
  createOptionsStore,
  subscribeOptions,
  type OptionsStore,
  type UpdateTrigger,
  type ViewerOptions,
} from './options.js';
import { toRenderSettings } from './settings.js';
import type { TextRasterizer } from './text-rasterizer.js';
import { SCENE_CONSTANTS } from './constants.js';
import { createLogger } from './logger.js';

const log = createLogger('Viewer');

export interface ViewerCallbacks {
  onDeviceReady?: () => void;
  onDeviceError?: (message: string) => void;
  onCanvasResized?: (width: number, height: number) => void;
  /** Average frame time over the rolling window, once per second */
  onFrameTime?: (averageMs: number) => void;
}

export interface FrameScheduler {
  request(callback: (time: number) => void): number;
  cancel(handle: number): void;
}

const animationFrameScheduler: FrameScheduler = {
  request: (callback) => requestAnimationFrame(callback),
  cancel: (handle) => cancelAnimationFrame(handle),
};

export interface ViewerConfig {
  options?: Partial<ViewerOptions>;
  callbacks?: ViewerCallbacks;
  rasterizer?: TextRasterizer;
  /** Defaults to requestAnimationFrame */
  scheduler?: FrameScheduler;
  /** WebGPU entry point; defaults to navigator.gpu */
  gpu?: GPU;
  /** Clock for frame timing (ms); defaults to performance.now */
  now?: () => number;
}

/**
 * Whether an automatic update fires for a scene change
 */
export function shouldAutoUpdate(trigger: UpdateTrigger, sphereChanged: boolean): boolean {
  switch (trigger) {
    case 'never':
      return false;
    case 'onDataChange':
      return true;
    case 'sphereChange':
      return sphereChanged;
  }
}

/**
 * Grid size covering a sphere with `buffer` radii to spare, rounded up to
 * whole grid cells
 */
export function autoGridSize(sphere: Sphere, gridSpacing: number, buffer: number): number {
  const cells = Math.ceil(((1 + buffer) * sphere.radius) / gridSpacing);
  return Math.max(gridSpacing, cells * gridSpacing);
}

export function sameSphere(a: Sphere, b: Sphere, epsilon: number = SCENE_CONSTANTS.SPHERE_EPSILON): boolean {
  return (
    Math.abs(a.radius - b.radius) <= epsilon &&
    Math.abs(a.center.x - b.center.x) <= epsilon &&
    Math.abs(a.center.y - b.center.y) <= epsilon &&
    Math.abs(a.center.z - b.center.z) <= epsilon
  );
}

export class Viewer {
  readonly store: OptionsStore;
  readonly camera: OrbitCamera;

  private context = new RenderContext();
  private renderer: Renderer | null = null;
  private canvas: CanvasLike | null = null;
  private callbacks: ViewerCallbacks;
  private rasterizer: TextRasterizer | undefined;
  private scheduler: FrameScheduler;
  private gpu: GPU | undefined;
  private now: () => number;
  private frameTimer: FrameTimer;
  private frameHandle: number | null = null;
  private unsubscribe: (() => void) | null = null;
  private lastSphere: Sphere | null = null;

  constructor(config: ViewerConfig = {}) {
    this.store = createOptionsStore(config.options);
    this.camera = new OrbitCamera(this.store);
    this.callbacks = config.callbacks ?? {};
    this.rasterizer = config.rasterizer;
    this.scheduler = config.scheduler ?? animationFrameScheduler;
    this.gpu = config.gpu;
    this.now = config.now ?? (() => performance.now());
    this.frameTimer = new FrameTimer((ms) => this.callbacks.onFrameTime?.(ms));
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Bring up WebGPU on the canvas. Reports through onDeviceReady or
   * onDeviceError and resolves to whether the viewer is usable.
   */
  async init(canvas: CanvasLike): Promise<boolean> {
    if (this.renderer) {
      log.warn('Already initialized', { operation: 'init' });
      return true;
    }
    this.canvas = canvas;

    try {
      await this.context.init(canvas, this.gpu ?? globalThis.navigator?.gpu);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error('WebGPU initialization failed', error, { operation: 'init' });
      this.callbacks.onDeviceError?.(message);
      return false;
    }

    const renderer = new Renderer(this.context, toRenderSettings(this.getOptions()), {
      rasterizer: this.rasterizer,
      onChange: () => this.handleSceneChange(),
    });
    this.renderer = renderer;
    this.unsubscribe = subscribeOptions(this.store, (changed, next) => {
      if (changed.includes('zIsUp')) {
        this.camera.swapCameraUp();
      }
      void renderer.applySettings(toRenderSettings(next));
    });

    await renderer.whenReady();
    log.info('Device ready', { operation: 'init' });
    this.callbacks.onDeviceReady?.();
    return true;
  }

  isInitialized(): boolean {
    return this.renderer !== null;
  }

  /** Start the render loop */
  start(): void {
    if (this.frameHandle !== null) return;
    this.frameHandle = this.scheduler.request(this.tick);
  }

  stop(): void {
    if (this.frameHandle === null) return;
    this.scheduler.cancel(this.frameHandle);
    this.frameHandle = null;
  }

  isRunning(): boolean {
    return this.frameHandle !== null;
  }

  private readonly tick = (): void => {
    this.frameHandle = this.scheduler.request(this.tick);
    this.renderFrame();
  };

  /**
   * Render one frame with the current camera. Returns false when nothing
   * was drawn.
   */
  renderFrame(): boolean {
    const renderer = this.renderer;
    const canvas = this.canvas;
    if (!renderer || !canvas || canvas.width <= 0 || canvas.height <= 0) return false;

    const start = this.now();
    const projection = this.camera.createProjectionMatrix(canvas.width, canvas.height);
    const drawn = renderer.render(projection, this.camera.getViewMatrix());
    const end = this.now();
    this.frameTimer.record(end - start, end);
    return drawn;
  }

  /**
   * New canvas size in device pixels. Zero sizes are ignored.
   */
  resize(width: number, height: number): void {
    if (width <= 0 || height <= 0) return;
    if (this.canvas) {
      this.canvas.width = width;
      this.canvas.height = height;
    }
    this.renderer?.resize(width, height);
    this.callbacks.onCanvasResized?.(width, height);
  }

  dispose(): void {
    this.stop();
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.renderer?.dispose();
    this.renderer = null;
    this.context.dispose();
    this.canvas = null;
    this.lastSphere = null;
    this.frameTimer.reset();
  }

  // ==========================================================================
  // Options and camera
  // ==========================================================================

  getOptions(): ViewerOptions {
    return this.store.getState().options;
  }

  setOptions(partial: Partial<ViewerOptions>): void {
    this.store.getState().setOptions(partial);
  }

  /**
   * Frame a sphere, by default the one around the scene
   */
  resetCamera(sphere: Sphere = this.getBoundingSphere()): void {
    this.camera.reset(sphere);
  }

  getBoundingSphere(): Sphere {
    return this.renderer?.scene.getBoundingSphere() ?? boundsToSphere(createEmptyBounds());
  }

  /** Ray through a canvas pixel */
  createRay(x: number, y: number): Ray | null {
    if (!this.canvas || this.canvas.width <= 0 || this.canvas.height <= 0) return null;
    return this.camera.createRayFromScreenPoint(x, y, this.canvas.width, this.canvas.height);
  }

  // ==========================================================================
  // Scene
  // ==========================================================================

  /**
   * Add any scene object. Encoding errors and duplicate ids throw before
   * anything is allocated; the promise settles when the object is drawable.
   */
  add(object: SceneObject): Promise<void> {
    const scene = this.requireRenderer('add').scene;
    const exported = exportSceneObject(object);
    switch (exported.kind) {
      case 'mesh':
        return scene.addMesh(exported.payload);
      case 'lines':
        return scene.addLines(exported.payload);
      case 'text':
        return scene.addTextBillboard(exported.payload);
    }
  }

  addMesh(mesh: MeshObject): Promise<void> {
    return this.add(mesh);
  }

  removeMesh(key: SceneKey): void {
    this.requireRenderer('removeMesh').scene.removeMesh(key);
  }

  changeMeshColor(key: SceneKey, color: RGBA): Promise<void> {
    return this.requireRenderer('changeMeshColor').scene.changeMeshColor(key, color);
  }

  clearAllMeshes(): void {
    this.requireRenderer('clearAllMeshes').scene.clearAllMeshes();
  }

  addLines(lines: LineSetObject): Promise<void> {
    return this.add(lines);
  }

  removeLines(key: SceneKey): void {
    this.requireRenderer('removeLines').scene.removeLines(key);
  }

  clearAllLines(): void {
    this.requireRenderer('clearAllLines').scene.clearAllLines();
  }

  addTextBillboard(billboard: TextBillboardObject): Promise<void> {
    return this.add(billboard);
  }

  removeTextBillboard(key: SceneKey): void {
    this.requireRenderer('removeTextBillboard').scene.removeTextBillboard(key);
  }

  clearAllTextBillboards(): void {
    this.requireRenderer('clearAllTextBillboards').scene.clearAllTextBillboards();
  }

  private requireRenderer(operation: string): Renderer {
    if (!this.renderer) {
      throw new Error(`Viewer not initialized (${operation})`);
    }
    return this.renderer;
  }

  private handleSceneChange(): void {
    const sphere = this.getBoundingSphere();
    const sphereChanged = this.lastSphere === null || !sameSphere(this.lastSphere, sphere);
    this.lastSphere = sphere;

    const options = this.getOptions();
    if (shouldAutoUpdate(options.autoResetCamera, sphereChanged)) {
      this.camera.reset(sphere);
    }
    if (shouldAutoUpdate(options.autoUpdateGrid, sphereChanged)) {
      this.setOptions({ gridSize: autoGridSize(sphere, options.gridSpacing, options.autoGridBuffer) });
    }
  }
}
