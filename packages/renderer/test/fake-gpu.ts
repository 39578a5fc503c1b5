/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * In-process WebGPU stand-in. Records what the renderer creates, writes and
 * draws; pipelines can be held back to exercise the asynchronous paths.
 */

import { RenderContext, type CanvasLike } from '../src/device.js';
import type { TextLabel, TextRasterizer, TextTexture } from '../src/text-rasterizer.js';

export interface Call {
  method: string;
  args: unknown[];
}

export class FakeBuffer {
  destroyed = false;
  readonly data: ArrayBuffer;

  constructor(
    readonly label: string | undefined,
    readonly size: number,
    readonly usage: number
  ) {
    this.data = new ArrayBuffer(size);
  }

  getMappedRange(): ArrayBuffer {
    return this.data;
  }

  unmap(): void {
    // Nothing mapped to release
  }

  destroy(): void {
    this.destroyed = true;
  }
}

export class FakeTexture {
  destroyed = false;
  readonly views: { texture: FakeTexture; format: GPUTextureFormat | undefined }[] = [];

  constructor(readonly descriptor: GPUTextureDescriptor) {}

  get label(): string | undefined {
    return this.descriptor.label;
  }

  createView(descriptor?: GPUTextureViewDescriptor): { texture: FakeTexture; format: GPUTextureFormat | undefined } {
    const view = { texture: this, format: descriptor?.format };
    this.views.push(view);
    return view;
  }

  destroy(): void {
    this.destroyed = true;
  }
}

export class FakePipeline {
  constructor(readonly label: string) {}
}

export class FakePass {
  readonly calls: Call[] = [];
  ended = false;

  constructor(readonly descriptor: GPURenderPassDescriptor) {}

  setPipeline(pipeline: FakePipeline): void {
    this.calls.push({ method: 'setPipeline', args: [pipeline] });
  }

  setBindGroup(index: number, group: unknown): void {
    this.calls.push({ method: 'setBindGroup', args: [index, group] });
  }

  setVertexBuffer(slot: number, buffer: FakeBuffer): void {
    this.calls.push({ method: 'setVertexBuffer', args: [slot, buffer] });
  }

  setIndexBuffer(buffer: FakeBuffer, format: GPUIndexFormat): void {
    this.calls.push({ method: 'setIndexBuffer', args: [buffer, format] });
  }

  drawIndexed(indexCount: number): void {
    this.calls.push({ method: 'drawIndexed', args: [indexCount] });
  }

  end(): void {
    this.ended = true;
  }
}

/**
 * Label of the slot-0 vertex buffer behind each draw, in draw order
 */
export function drawnLabels(pass: FakePass): string[] {
  const drawn: string[] = [];
  let current = '';
  for (const call of pass.calls) {
    const [slot, buffer] = call.args;
    if (call.method === 'setVertexBuffer' && slot === 0 && buffer instanceof FakeBuffer) {
      current = buffer.label ?? '';
    } else if (call.method === 'drawIndexed') {
      drawn.push(current);
    }
  }
  return drawn;
}

interface Deferred {
  resolve: () => void;
  reject: (error: unknown) => void;
}

export interface BufferWrite {
  buffer: FakeBuffer;
  data: Float32Array;
}

export class FakeDevice {
  readonly buffers: FakeBuffer[] = [];
  readonly textures: FakeTexture[] = [];
  readonly pipelineDescriptors: GPURenderPipelineDescriptor[] = [];
  readonly shaderModules: string[] = [];
  readonly passes: FakePass[] = [];
  readonly writes: BufferWrite[] = [];
  submitted = 0;
  destroyed = false;

  /** Hold pipeline creation until resolvePipelines/rejectPipelines */
  deferPipelines = false;
  /** Reject every pipeline creation with this error */
  pipelineError: Error | null = null;

  private deferred: Deferred[] = [];
  private loseWith: (info: { reason: GPUDeviceLostReason; message: string }) => void = () => undefined;
  readonly lost = new Promise<{ reason: GPUDeviceLostReason; message: string }>((resolve) => {
    this.loseWith = resolve;
  });

  readonly queue = {
    writeBuffer: (buffer: FakeBuffer, _offset: number, data: Float32Array) => {
      this.writes.push({ buffer, data: Float32Array.from(data) });
    },
    submit: (commandBuffers: unknown[]) => {
      this.submitted += commandBuffers.length;
    },
    copyExternalImageToTexture: () => undefined,
  };

  createBuffer(descriptor: GPUBufferDescriptor): FakeBuffer {
    const buffer = new FakeBuffer(descriptor.label, descriptor.size, descriptor.usage);
    this.buffers.push(buffer);
    return buffer;
  }

  createTexture(descriptor: GPUTextureDescriptor): FakeTexture {
    const texture = new FakeTexture(descriptor);
    this.textures.push(texture);
    return texture;
  }

  createBindGroupLayout(descriptor: GPUBindGroupLayoutDescriptor) {
    return { label: descriptor.label, entries: descriptor.entries };
  }

  createBindGroup(descriptor: GPUBindGroupDescriptor) {
    return { label: descriptor.label, entries: descriptor.entries };
  }

  createPipelineLayout(descriptor: GPUPipelineLayoutDescriptor) {
    return { bindGroupLayouts: descriptor.bindGroupLayouts };
  }

  createShaderModule(descriptor: GPUShaderModuleDescriptor) {
    this.shaderModules.push(descriptor.label ?? '');
    return { label: descriptor.label };
  }

  createSampler(descriptor?: GPUSamplerDescriptor) {
    return { descriptor };
  }

  createRenderPipelineAsync(descriptor: GPURenderPipelineDescriptor): Promise<FakePipeline> {
    this.pipelineDescriptors.push(descriptor);
    const pipeline = new FakePipeline(descriptor.label ?? '');
    if (this.pipelineError) return Promise.reject(this.pipelineError);
    if (!this.deferPipelines) return Promise.resolve(pipeline);
    return new Promise((resolve, reject) => {
      this.deferred.push({ resolve: () => resolve(pipeline), reject });
    });
  }

  resolvePipelines(): void {
    const pending = this.deferred;
    this.deferred = [];
    for (const d of pending) d.resolve();
  }

  rejectPipelines(error: Error): void {
    const pending = this.deferred;
    this.deferred = [];
    for (const d of pending) d.reject(error);
  }

  pendingPipelineCount(): number {
    return this.deferred.length;
  }

  createCommandEncoder() {
    return {
      beginRenderPass: (descriptor: GPURenderPassDescriptor) => {
        const pass = new FakePass(descriptor);
        this.passes.push(pass);
        return pass;
      },
      finish: () => ({}),
    };
  }

  lose(reason: GPUDeviceLostReason, message: string): void {
    this.loseWith({ reason, message });
  }

  destroy(): void {
    this.destroyed = true;
  }

  asGPUDevice(): GPUDevice {
    return this as unknown as GPUDevice;
  }

  lastPass(): FakePass | undefined {
    return this.passes[this.passes.length - 1];
  }

  /** Writes made to the buffer with this label, oldest first */
  writesTo(label: string): Float32Array[] {
    return this.writes.filter((w) => w.buffer.label === label).map((w) => w.data);
  }
}

export class FakeCanvasContext {
  configuration: GPUCanvasConfiguration | null = null;
  unconfigured = false;
  readonly texture = new FakeTexture({
    label: 'Swap Chain',
    size: [1, 1],
    format: 'bgra8unorm',
    usage: 0x10,
  });

  configure(configuration: GPUCanvasConfiguration): void {
    this.configuration = configuration;
  }

  unconfigure(): void {
    this.unconfigured = true;
  }

  getCurrentTexture(): FakeTexture {
    return this.texture;
  }
}

export class FakeCanvas implements CanvasLike {
  readonly context: FakeCanvasContext | null;

  constructor(
    public width = 800,
    public height = 600,
    hasContext = true
  ) {
    this.context = hasContext ? new FakeCanvasContext() : null;
  }

  getContext(_contextId: 'webgpu'): GPUCanvasContext | null {
    return this.context ? (this.context as unknown as GPUCanvasContext) : null;
  }
}

export interface FakeGpuOptions {
  /** requestAdapter resolves to null */
  noAdapter?: boolean;
  adapterError?: Error;
  deviceError?: Error;
  format?: GPUTextureFormat;
}

export function createFakeGpu(device: FakeDevice, options: FakeGpuOptions = {}): GPU {
  const adapter = {
    requestDevice: () => (options.deviceError ? Promise.reject(options.deviceError) : Promise.resolve(device)),
  };
  const gpu = {
    requestAdapter: () => {
      if (options.adapterError) return Promise.reject(options.adapterError);
      return Promise.resolve(options.noAdapter ? null : adapter);
    },
    getPreferredCanvasFormat: () => options.format ?? 'bgra8unorm',
  };
  return gpu as unknown as GPU;
}

/**
 * Rasterizer producing fixed-size blank textures without a DOM
 */
export class FakeRasterizer implements TextRasterizer {
  readonly labels: string[] = [];

  constructor(
    readonly width = 64,
    readonly height = 32
  ) {}

  async rasterize(device: GPUDevice, label: TextLabel): Promise<TextTexture> {
    this.labels.push(label.text);
    const texture = device.createTexture({
      label: `Label "${label.text}" Texture`,
      size: [this.width, this.height],
      format: 'rgba8unorm',
      usage: GPUTextureUsage.TEXTURE_BINDING | GPUTextureUsage.COPY_DST,
    });
    return { texture, width: this.width, height: this.height };
  }
}

export interface TestContext {
  device: FakeDevice;
  canvas: FakeCanvas;
  context: RenderContext;
}

export async function createTestContext(width = 800, height = 600): Promise<TestContext> {
  const device = new FakeDevice();
  const canvas = new FakeCanvas(width, height);
  const context = new RenderContext();
  await context.init(canvas, createFakeGpu(device));
  return { device, canvas, context };
}

/** Let pending promise callbacks run */
export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
