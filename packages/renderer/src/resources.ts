/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Per-object GPU resources
 *
 * Each live scene object owns one set of buffers (plus a texture for text
 * labels) and draws with one cached pipeline.
 */

import {
  boundsToSphere,
  computeBounds,
  type AABB,
  type BillboardPayload,
  type LinePayload,
  type MeshPayload,
  type RGBA,
  type Vec3,
} from '@partview/geometry';
import type { PipelineFactory, PipelineRequest, PipelineSlot } from './pipeline.js';
import type { TextRasterizer } from './text-rasterizer.js';
import { createBuffer, createUniformBuffer } from './buffers.js';
import { BILLBOARD_CONSTANTS, PIPELINE_CONSTANTS } from './constants.js';

/** What object creation needs from the renderer */
export interface GpuScope {
  device: GPUDevice;
  factory: PipelineFactory;
  lightBuffer: GPUBuffer;
  rasterizer: TextRasterizer;
}

interface BaseResources extends PipelineSlot {
  id: string;
  bounds: AABB;
  /** Point whose view depth orders transparent draws */
  anchor: Vec3;
}

export interface MeshResources extends BaseResources {
  kind: 'mesh';
  singleColor: boolean;
  transparent: boolean;
  vertexBuffer: GPUBuffer;
  /** Per-vertex colors; null for single-colored meshes */
  vertexColorBuffer: GPUBuffer | null;
  colorUniform: GPUBuffer;
  indexBuffer: GPUBuffer;
  indexCount: number;
  bindGroup: GPUBindGroup;
}

export interface LineResources extends BaseResources {
  kind: 'lines';
  /** position, color, thickness, uv, end position, fade */
  vertexBuffers: GPUBuffer[];
  indexBuffer: GPUBuffer;
  indexCount: number;
}

export interface BillboardResources extends BaseResources {
  kind: 'text';
  vertexBuffer: GPUBuffer;
  indexBuffer: GPUBuffer;
  texture: GPUTexture;
  bindGroup: GPUBindGroup;
}

export type ObjectResources = MeshResources | LineResources | BillboardResources;

export const BILLBOARD_INDICES = new Uint16Array([0, 1, 2, 1, 3, 2]);

const WHITE: RGBA = [1, 1, 1, 1];

export function hasTransparentAlpha(colors: Float32Array): boolean {
  for (let i = 3; i < colors.length; i += 4) {
    if (colors[i] < 1) return true;
  }
  return false;
}

export function pipelineRequestFor(resources: ObjectResources): PipelineRequest {
  switch (resources.kind) {
    case 'mesh':
      return {
        kind: resources.singleColor ? 'mesh-uniform' : 'mesh-vertex-color',
        transparent: resources.transparent,
      };
    case 'lines':
      return { kind: 'lines', transparent: true };
    case 'text':
      return { kind: 'billboard', transparent: true };
  }
}

/**
 * Quad vertices for a label: four copies of the anchor with corner UVs and
 * the half size in world units (position, uv, halfSize per vertex).
 */
export function createBillboardVertices(position: Vec3, textureWidth: number, textureHeight: number): Float32Array {
  const halfHeight = BILLBOARD_CONSTANTS.WORLD_HALF_HEIGHT;
  const halfWidth = textureHeight > 0 ? (halfHeight * textureWidth) / textureHeight : halfHeight;
  const { x, y, z } = position;
  const corner = (u: number, v: number) => [x, y, z, u, v, halfWidth, halfHeight];
  return new Float32Array([...corner(0, 1), ...corner(1, 1), ...corner(0, 0), ...corner(1, 0)]);
}

async function withPipeline<R extends ObjectResources>(factory: PipelineFactory, resources: R): Promise<R> {
  try {
    resources.pipeline = await factory.get(pipelineRequestFor(resources));
    return resources;
  } catch (error) {
    destroyResources(resources);
    throw error;
  }
}

export function createMeshResources(scope: GpuScope, payload: MeshPayload): Promise<MeshResources> {
  const { device, factory, lightBuffer } = scope;
  const label = `Mesh "${payload.id}"`;

  const vertexBuffer = createBuffer(device, payload.vertices, GPUBufferUsage.VERTEX, `${label} Positions`);
  const indexBuffer = createBuffer(device, payload.indices, GPUBufferUsage.INDEX, `${label} Indices`);
  const colorUniform = createUniformBuffer(device, PIPELINE_CONSTANTS.MESH_COLOR_SIZE, `${label} Color`);

  let vertexColorBuffer: GPUBuffer | null = null;
  let transparent: boolean;
  if (payload.singleColor) {
    const color = payload.colors.length >= 4 ? payload.colors.subarray(0, 4) : new Float32Array(WHITE);
    device.queue.writeBuffer(colorUniform, 0, color);
    transparent = color[3] < 1;
  } else {
    device.queue.writeBuffer(colorUniform, 0, new Float32Array(WHITE));
    vertexColorBuffer = createBuffer(device, payload.colors, GPUBufferUsage.VERTEX, `${label} Colors`);
    transparent = hasTransparentAlpha(payload.colors);
  }

  const bindGroup = device.createBindGroup({
    label: `${label} BG`,
    layout: factory.meshLayout,
    entries: [
      { binding: 0, resource: { buffer: lightBuffer } },
      { binding: 1, resource: { buffer: colorUniform } },
    ],
  });

  const bounds = computeBounds(payload.vertices);
  return withPipeline<MeshResources>(factory, {
    kind: 'mesh',
    id: payload.id,
    bounds,
    anchor: boundsToSphere(bounds).center,
    pipeline: null,
    pipelineVersion: 0,
    singleColor: payload.singleColor,
    transparent,
    vertexBuffer,
    vertexColorBuffer,
    colorUniform,
    indexBuffer,
    indexCount: payload.indices.length,
    bindGroup,
  });
}

export function createLineResources(scope: GpuScope, payload: LinePayload): Promise<LineResources> {
  const { device, factory } = scope;
  const label = `Lines "${payload.id}"`;
  const usage = GPUBufferUsage.VERTEX;

  const vertexBuffers = [
    createBuffer(device, payload.vertices, usage, `${label} Positions`),
    createBuffer(device, payload.colors, usage, `${label} Colors`),
    createBuffer(device, payload.thickness, usage, `${label} Thickness`),
    createBuffer(device, payload.uvs, usage, `${label} UVs`),
    createBuffer(device, payload.endPositions, usage, `${label} End Positions`),
    createBuffer(device, payload.fades, usage, `${label} Fades`),
  ];
  const indexBuffer = createBuffer(device, payload.indices, GPUBufferUsage.INDEX, `${label} Indices`);

  const bounds = computeBounds(payload.vertices, payload.endPositions);
  return withPipeline<LineResources>(factory, {
    kind: 'lines',
    id: payload.id,
    bounds,
    anchor: boundsToSphere(bounds).center,
    pipeline: null,
    pipelineVersion: 0,
    vertexBuffers,
    indexBuffer,
    indexCount: payload.indices.length,
  });
}

export async function createBillboardResources(
  scope: GpuScope,
  payload: BillboardPayload
): Promise<BillboardResources> {
  const { device, factory, rasterizer } = scope;
  const label = `Label "${payload.id}"`;
  const [x, y, z] = payload.position;
  const anchor = { x, y, z };

  const { texture, width, height } = await rasterizer.rasterize(device, payload);

  const vertexBuffer = createBuffer(
    device,
    createBillboardVertices(anchor, width, height),
    GPUBufferUsage.VERTEX,
    `${label} Vertices`
  );
  const indexBuffer = createBuffer(device, BILLBOARD_INDICES, GPUBufferUsage.INDEX, `${label} Indices`);
  const sampler = device.createSampler({
    magFilter: 'linear',
    minFilter: 'linear',
    addressModeU: 'clamp-to-edge',
    addressModeV: 'clamp-to-edge',
  });
  const bindGroup = device.createBindGroup({
    label: `${label} BG`,
    layout: factory.billboardLayout,
    entries: [
      { binding: 0, resource: sampler },
      { binding: 1, resource: texture.createView() },
    ],
  });

  return withPipeline<BillboardResources>(factory, {
    kind: 'text',
    id: payload.id,
    bounds: { min: { ...anchor }, max: { ...anchor } },
    anchor,
    pipeline: null,
    pipelineVersion: 0,
    vertexBuffer,
    indexBuffer,
    texture,
    bindGroup,
  });
}

/**
 * Release everything an object owns. Bumps the pipeline version so a
 * pipeline still in flight is never attached.
 */
export function destroyResources(resources: ObjectResources): void {
  resources.pipelineVersion++;
  resources.pipeline = null;
  switch (resources.kind) {
    case 'mesh':
      resources.vertexBuffer.destroy();
      resources.vertexColorBuffer?.destroy();
      resources.colorUniform.destroy();
      resources.indexBuffer.destroy();
      break;
    case 'lines':
      for (const buffer of resources.vertexBuffers) buffer.destroy();
      resources.indexBuffer.destroy();
      break;
    case 'text':
      resources.vertexBuffer.destroy();
      resources.indexBuffer.destroy();
      resources.texture.destroy();
      break;
  }
}

/**
 * Record the draw. Objects without a pipeline yet are skipped.
 */
export function drawResources(
  pass: GPURenderPassEncoder,
  frameBindGroup: GPUBindGroup,
  resources: ObjectResources
): void {
  if (!resources.pipeline) return;
  pass.setPipeline(resources.pipeline);
  pass.setBindGroup(0, frameBindGroup);

  switch (resources.kind) {
    case 'mesh':
      pass.setBindGroup(1, resources.bindGroup);
      pass.setVertexBuffer(0, resources.vertexBuffer);
      if (resources.vertexColorBuffer) pass.setVertexBuffer(1, resources.vertexColorBuffer);
      pass.setIndexBuffer(resources.indexBuffer, 'uint16');
      pass.drawIndexed(resources.indexCount);
      break;
    case 'lines':
      resources.vertexBuffers.forEach((buffer, slot) => pass.setVertexBuffer(slot, buffer));
      pass.setIndexBuffer(resources.indexBuffer, 'uint16');
      pass.drawIndexed(resources.indexCount);
      break;
    case 'text':
      pass.setBindGroup(1, resources.bindGroup);
      pass.setVertexBuffer(0, resources.vertexBuffer);
      pass.setIndexBuffer(resources.indexBuffer, 'uint16');
      pass.drawIndexed(BILLBOARD_INDICES.length);
      break;
  }
}
