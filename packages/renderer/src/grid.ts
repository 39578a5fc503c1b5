/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Reference grid and coordinate axes. Both are anchored at the origin and
 * owned by the renderer rather than the scene.
 */

import { generateAxisGeometry } from '@partview/geometry';
import type { RenderSettings } from './types.js';
import type { PipelineFactory, PipelineSlot } from './pipeline.js';
import { createBuffer, createUniformBuffer } from './buffers.js';
import { GRID_CONSTANTS, PIPELINE_CONSTANTS } from './constants.js';
import { gridSpacingFactor } from './settings.js';

export const GRID_INDICES = new Uint32Array([0, 1, 2, 1, 2, 3]);

/**
 * Grid quad, interleaved position + uv. Lies on z = PLANE_OFFSET for z-up
 * scenes and on y = PLANE_OFFSET otherwise.
 */
export function createGridVertices(gridSize: number, zIsUp: boolean): Float32Array {
  const g = gridSize;
  const o = GRID_CONSTANTS.PLANE_OFFSET;
  const uv = GRID_CONSTANTS.UV_EXTENT;
  const corner = (a: number, b: number): [number, number, number] => (zIsUp ? [a, b, o] : [a, o, b]);
  return new Float32Array([
    ...corner(-g, -g), 0, 0,
    ...corner(g, -g), uv, 0,
    ...corner(-g, g), 0, uv,
    ...corner(g, g), uv, uv,
  ]);
}

/**
 * Grid uniform contents: lineColor, baseColor, lineWidth, spacing (48 bytes)
 */
export function createGridUniforms(settings: RenderSettings): Float32Array {
  const data = new Float32Array(PIPELINE_CONSTANTS.GRID_UNIFORM_SIZE / 4);
  data.set(settings.lineColor, 0);
  data.set(settings.baseColor, 4);
  data[8] = settings.lineWidthX;
  data[9] = settings.lineWidthY;
  data[10] = gridSpacingFactor(settings.gridSize, settings.gridSpacing);
  return data;
}

export class GridLayer implements PipelineSlot {
  pipeline: GPURenderPipeline | null = null;
  pipelineVersion = 0;
  transparent = false;

  private device: GPUDevice;
  private factory: PipelineFactory;
  private vertexBuffer: GPUBuffer | null = null;
  private indexBuffer: GPUBuffer;
  private uniformBuffer: GPUBuffer;
  private bindGroup: GPUBindGroup;

  constructor(device: GPUDevice, factory: PipelineFactory) {
    this.device = device;
    this.factory = factory;
    this.indexBuffer = createBuffer(device, GRID_INDICES, GPUBufferUsage.INDEX, 'Grid Indices');
    this.uniformBuffer = createUniformBuffer(device, PIPELINE_CONSTANTS.GRID_UNIFORM_SIZE, 'Grid Uniforms');
    this.bindGroup = device.createBindGroup({
      label: 'Grid BG',
      layout: factory.gridLayout,
      entries: [{ binding: 0, resource: { buffer: this.uniformBuffer } }],
    });
  }

  /** Pick the opaque or transparent pipeline; resolves once it is in place */
  requestPipeline(transparent: boolean): Promise<void> {
    this.transparent = transparent;
    return this.factory.assign(this, { kind: 'grid', transparent });
  }

  regenerate(gridSize: number, zIsUp: boolean): void {
    this.vertexBuffer?.destroy();
    this.vertexBuffer = createBuffer(
      this.device,
      createGridVertices(gridSize, zIsUp),
      GPUBufferUsage.VERTEX,
      'Grid Vertices'
    );
  }

  writeUniforms(settings: RenderSettings): void {
    this.device.queue.writeBuffer(this.uniformBuffer, 0, createGridUniforms(settings));
  }

  isReady(): boolean {
    return this.pipeline !== null && this.vertexBuffer !== null;
  }

  draw(pass: GPURenderPassEncoder, frameBindGroup: GPUBindGroup): void {
    if (!this.pipeline || !this.vertexBuffer) return;
    pass.setPipeline(this.pipeline);
    pass.setBindGroup(0, frameBindGroup);
    pass.setBindGroup(1, this.bindGroup);
    pass.setVertexBuffer(0, this.vertexBuffer);
    pass.setIndexBuffer(this.indexBuffer, 'uint32');
    pass.drawIndexed(GRID_INDICES.length);
  }

  destroy(): void {
    this.pipelineVersion++;
    this.pipeline = null;
    this.vertexBuffer?.destroy();
    this.vertexBuffer = null;
    this.indexBuffer.destroy();
    this.uniformBuffer.destroy();
  }
}

/**
 * Coordinate axes drawn with the line pipeline. Thickness 0 removes them.
 */
export class AxesLayer implements PipelineSlot {
  pipeline: GPURenderPipeline | null = null;
  pipelineVersion = 0;

  private device: GPUDevice;
  private factory: PipelineFactory;
  private buffers: GPUBuffer[] = [];
  private indexBuffer: GPUBuffer | null = null;
  private indexCount = 0;

  constructor(device: GPUDevice, factory: PipelineFactory) {
    this.device = device;
    this.factory = factory;
  }

  requestPipeline(): Promise<void> {
    return this.factory.assign(this, { kind: 'lines', transparent: true });
  }

  regenerate(extent: number, thickness: number): void {
    this.releaseBuffers();
    if (thickness <= 0) return;

    const axes = generateAxisGeometry(extent, thickness);
    const usage = GPUBufferUsage.VERTEX;
    this.buffers = [
      createBuffer(this.device, axes.vertices, usage, 'Axes Positions'),
      createBuffer(this.device, axes.colors, usage, 'Axes Colors'),
      createBuffer(this.device, axes.thickness, usage, 'Axes Thickness'),
      createBuffer(this.device, axes.uvs, usage, 'Axes UVs'),
      createBuffer(this.device, axes.endPositions, usage, 'Axes End Positions'),
      createBuffer(this.device, axes.fades, usage, 'Axes Fades'),
    ];
    this.indexBuffer = createBuffer(this.device, axes.indices, GPUBufferUsage.INDEX, 'Axes Indices');
    this.indexCount = axes.indices.length;
  }

  isVisible(): boolean {
    return this.indexBuffer !== null;
  }

  draw(pass: GPURenderPassEncoder, frameBindGroup: GPUBindGroup): void {
    if (!this.pipeline || !this.indexBuffer) return;
    pass.setPipeline(this.pipeline);
    pass.setBindGroup(0, frameBindGroup);
    this.buffers.forEach((buffer, slot) => pass.setVertexBuffer(slot, buffer));
    pass.setIndexBuffer(this.indexBuffer, 'uint16');
    pass.drawIndexed(this.indexCount);
  }

  private releaseBuffers(): void {
    for (const buffer of this.buffers) buffer.destroy();
    this.buffers = [];
    this.indexBuffer?.destroy();
    this.indexBuffer = null;
    this.indexCount = 0;
  }

  destroy(): void {
    this.pipelineVersion++;
    this.pipeline = null;
    this.releaseBuffers();
  }
}
