/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Frame renderer
 *
 * One render pass per frame: opaque meshes and an opaque grid first with
 * depth writes, then everything transparent sorted farthest first with
 * depth writes off. Objects whose pipeline is not ready are skipped.
 */

import type { Mat4, RenderSettings, Vec3 } from './types.js';
import type { RenderContext } from './device.js';
import { PipelineFactory } from './pipeline.js';
import { SceneRegistry, type SceneRegistryOptions } from './scene.js';
import { drawResources, type GpuScope, type ObjectResources } from './resources.js';
import { AxesLayer, GridLayer } from './grid.js';
import { RenderTargets } from './render-targets.js';
import { CanvasTextRasterizer, type TextRasterizer } from './text-rasterizer.js';
import { createUniformBuffer } from './buffers.js';
import { isGridTransparent, planSettingsUpdate } from './settings.js';
import { ERROR_CONSTANTS, PIPELINE_CONSTANTS } from './constants.js';
import { createLogger } from './logger.js';

const log = createLogger('Renderer');

export interface RendererOptions extends SceneRegistryOptions {
  rasterizer?: TextRasterizer;
}

export interface TransparentDraw {
  /** Larger is farther; drawn first */
  depth: number;
  draw: (pass: GPURenderPassEncoder) => void;
}

/**
 * Distance in front of the camera: the negated view-space z of `point`
 */
export function viewDepth(view: Mat4, point: Vec3): number {
  const m = view.m;
  return -(m[2] * point.x + m[6] * point.y + m[10] * point.z + m[14]);
}

/**
 * Squared camera-to-origin distance, the sort key of origin-anchored
 * layers (grid and axes)
 */
export function originDistanceSq(view: Mat4): number {
  const m = view.m;
  return m[12] * m[12] + m[13] * m[13] + m[14] * m[14];
}

/** Sort in place, farthest first */
export function sortBackToFront<T extends { depth: number }>(draws: T[]): T[] {
  return draws.sort((a, b) => b.depth - a.depth);
}

/**
 * Light uniform contents: direction, ambient, specular power (32 bytes)
 */
export function createLightUniforms(settings: RenderSettings): Float32Array {
  const data = new Float32Array(PIPELINE_CONSTANTS.LIGHT_UNIFORM_SIZE / 4);
  data.set(settings.lightDir, 0);
  data[3] = settings.ambient;
  data[4] = settings.specularPower;
  return data;
}

export class Renderer {
  readonly scene: SceneRegistry;

  private context: RenderContext;
  private device: GPUDevice;
  private factory: PipelineFactory;
  private targets: RenderTargets;
  private grid: GridLayer;
  private axes: AxesLayer;
  private frameBuffer: GPUBuffer;
  private frameBindGroup: GPUBindGroup;
  private lightBuffer: GPUBuffer;
  private frameData = new Float32Array(PIPELINE_CONSTANTS.FRAME_UNIFORM_SIZE / 4);
  private settings: RenderSettings;
  private initialPipelines: Promise<void>;

  // Error rate limiting (log at most once per second)
  private lastRenderErrorTime = Number.NEGATIVE_INFINITY;

  constructor(context: RenderContext, settings: RenderSettings, options: RendererOptions = {}) {
    this.context = context;
    this.device = context.getDevice();
    this.settings = settings;
    this.factory = new PipelineFactory(context, settings.sampleCount);
    this.targets = new RenderTargets(this.device, context.getColorFormat(), settings.sampleCount);

    this.frameBuffer = createUniformBuffer(this.device, PIPELINE_CONSTANTS.FRAME_UNIFORM_SIZE, 'Frame Uniforms');
    this.frameBindGroup = this.device.createBindGroup({
      label: 'Frame BG',
      layout: this.factory.frameLayout,
      entries: [{ binding: 0, resource: { buffer: this.frameBuffer } }],
    });
    this.lightBuffer = createUniformBuffer(this.device, PIPELINE_CONSTANTS.LIGHT_UNIFORM_SIZE, 'Light Uniforms');

    this.grid = new GridLayer(this.device, this.factory);
    this.axes = new AxesLayer(this.device, this.factory);

    const scope: GpuScope = {
      device: this.device,
      factory: this.factory,
      lightBuffer: this.lightBuffer,
      rasterizer: options.rasterizer ?? new CanvasTextRasterizer(),
    };
    this.scene = new SceneRegistry(scope, { onChange: options.onChange });

    this.initialPipelines = Promise.all([this.axes.requestPipeline(), this.applyPlan(null, settings)]).then(
      () => undefined
    );
  }

  /** Resolves once the grid and axes pipelines requested at construction are in place */
  whenReady(): Promise<void> {
    return this.initialPipelines;
  }

  getSettings(): RenderSettings {
    return this.settings;
  }

  /**
   * Apply new settings, redoing only what the change requires. Resolves
   * when every pipeline it requested is in place.
   */
  applySettings(next: RenderSettings): Promise<void> {
    const prev = this.settings;
    this.settings = next;
    return this.applyPlan(prev, next);
  }

  private applyPlan(prev: RenderSettings | null, next: RenderSettings): Promise<void> {
    const plan = planSettingsUpdate(prev, next);
    const pending: Promise<void>[] = [];

    const samplesChanged = plan.rebuildTargets && this.factory.setSampleCount(next.sampleCount);
    if (plan.rebuildTargets) {
      const canvas = this.context.getCanvas();
      this.targets.allocate(canvas.width, canvas.height, next.sampleCount);
    }
    if (samplesChanged) {
      pending.push(this.axes.requestPipeline(), this.scene.rebuildPipelines());
    }
    if (samplesChanged || plan.rebuildGridPipeline) {
      pending.push(this.grid.requestPipeline(isGridTransparent(next)));
    }

    if (plan.regenerateGrid) {
      this.grid.regenerate(next.gridSize, next.zIsUp);
    }
    if (plan.regenerateAxes) {
      // Axes span the grid
      this.axes.regenerate(next.gridSize, next.coordinateThickness);
    }
    if (plan.updateGridUniforms) {
      this.grid.writeUniforms(next);
    }
    if (plan.updateLight) {
      this.device.queue.writeBuffer(this.lightBuffer, 0, createLightUniforms(next));
    }

    log.debug('Settings applied', plan, { operation: 'applySettings' });
    return Promise.all(pending).then(() => undefined);
  }

  /**
   * Reallocate the render targets for a new canvas size
   */
  resize(width: number, height: number): void {
    this.targets.allocate(width, height, this.factory.getSampleCount());
  }

  /**
   * Draw one frame. Returns false when the frame was skipped (no render
   * targets) or failed; failures are logged at most once per second.
   */
  render(projection: Mat4, view: Mat4): boolean {
    try {
      const canvas = this.context.getCanvas();
      if (!this.targets.isAllocated() || this.targets.needsResize(canvas.width, canvas.height)) {
        this.targets.allocate(canvas.width, canvas.height, this.factory.getSampleCount());
      }
      if (!this.targets.isAllocated()) return false;

      const output = this.context
        .getContext()
        .getCurrentTexture()
        .createView({ format: this.context.getColorFormat() });
      const descriptor = this.targets.describePass(output, this.settings.clearColor);
      if (!descriptor) return false;

      this.frameData.set(projection.m, 0);
      this.frameData.set(view.m, 16);
      this.device.queue.writeBuffer(this.frameBuffer, 0, this.frameData);

      const encoder = this.device.createCommandEncoder({ label: 'Frame' });
      const pass = encoder.beginRenderPass(descriptor);

      this.drawOpaque(pass);
      for (const item of this.collectTransparent(view)) {
        item.draw(pass);
      }

      pass.end();
      this.device.queue.submit([encoder.finish()]);
      return true;
    } catch (error) {
      const now = performance.now();
      if (now - this.lastRenderErrorTime > ERROR_CONSTANTS.RENDER_ERROR_THROTTLE_MS) {
        this.lastRenderErrorTime = now;
        log.error('Render error', error, { operation: 'render' });
      }
      return false;
    }
  }

  private drawOpaque(pass: GPURenderPassEncoder): void {
    for (const mesh of this.scene.getMeshes()) {
      if (!mesh.transparent) drawResources(pass, this.frameBindGroup, mesh);
    }
    if (!this.grid.transparent) {
      this.grid.draw(pass, this.frameBindGroup);
    }
  }

  /**
   * Transparent draws for a view, sorted farthest first. Objects whose
   * pipeline is not ready are left out.
   */
  collectTransparent(view: Mat4): TransparentDraw[] {
    const draws: TransparentDraw[] = [];
    const frameBindGroup = this.frameBindGroup;
    const originDepth = originDistanceSq(view);

    if (this.grid.transparent && this.grid.isReady()) {
      draws.push({ depth: originDepth, draw: (pass) => this.grid.draw(pass, frameBindGroup) });
    }
    if (this.axes.isVisible() && this.axes.pipeline) {
      draws.push({ depth: originDepth, draw: (pass) => this.axes.draw(pass, frameBindGroup) });
    }

    const add = (resources: ObjectResources) => {
      if (!resources.pipeline) return;
      draws.push({
        depth: viewDepth(view, resources.anchor),
        draw: (pass) => drawResources(pass, frameBindGroup, resources),
      });
    };
    for (const mesh of this.scene.getMeshes()) {
      if (mesh.transparent) add(mesh);
    }
    this.scene.getLines().forEach(add);
    this.scene.getBillboards().forEach(add);

    return sortBackToFront(draws);
  }

  dispose(): void {
    this.scene.dispose();
    this.grid.destroy();
    this.axes.destroy();
    this.targets.release();
    this.frameBuffer.destroy();
    this.lightBuffer.destroy();
  }
}
