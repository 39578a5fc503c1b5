/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * WebGPU render context - adapter, device, canvas context and format,
 * owned by one viewer and handed to every component that touches the GPU.
 */

import { DeviceInitError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('RenderContext');

/** The parts of a canvas the context needs; HTMLCanvasElement and OffscreenCanvas both fit */
export interface CanvasLike {
  width: number;
  height: number;
  getContext(contextId: 'webgpu'): GPUCanvasContext | null;
}

export class RenderContext {
  private adapter: GPUAdapter | null = null;
  private device: GPUDevice | null = null;
  private context: GPUCanvasContext | null = null;
  private format: GPUTextureFormat = 'bgra8unorm';
  private canvas: CanvasLike | null = null;

  /**
   * Initialize WebGPU device and canvas context
   */
  async init(canvas: CanvasLike, gpu: GPU | undefined = globalThis.navigator?.gpu): Promise<void> {
    if (!gpu) {
      throw new DeviceInitError('WebGPU not available');
    }

    try {
      this.adapter = await gpu.requestAdapter();
    } catch (error) {
      throw new DeviceInitError('Failed to get GPU adapter', error);
    }
    if (!this.adapter) {
      throw new DeviceInitError('Failed to get GPU adapter');
    }

    try {
      this.device = await this.adapter.requestDevice();
    } catch (error) {
      throw new DeviceInitError('Failed to create GPU device', error);
    }
    this.format = gpu.getPreferredCanvasFormat();
    this.canvas = canvas;

    this.context = canvas.getContext('webgpu');
    if (!this.context) {
      this.device.destroy();
      this.device = null;
      throw new DeviceInitError('Failed to get WebGPU context');
    }

    this.configureContext();
    this.device.lost.then((info) => {
      if (info.reason !== 'destroyed') {
        log.error('GPU device lost', info.message, { operation: 'device.lost' });
      }
    }, (error: unknown) => log.caught('Device lost promise rejected', error));
    log.info(`Initialized with format ${this.format}`, { operation: 'init' });
  }

  /**
   * Configure the canvas context. Render passes draw through the sRGB view.
   */
  configureContext(): void {
    if (!this.context || !this.device) return;

    this.context.configure({
      device: this.device,
      format: this.format,
      alphaMode: 'opaque',
      viewFormats: [this.getColorFormat()],
      usage: GPUTextureUsage.RENDER_ATTACHMENT,
    });
  }

  getDevice(): GPUDevice {
    if (!this.device) {
      throw new Error('Device not initialized');
    }
    return this.device;
  }

  getContext(): GPUCanvasContext {
    if (!this.context) {
      throw new Error('Context not initialized');
    }
    return this.context;
  }

  getCanvas(): CanvasLike {
    if (!this.canvas) {
      throw new Error('Canvas not initialized');
    }
    return this.canvas;
  }

  getFormat(): GPUTextureFormat {
    return this.format;
  }

  /**
   * Format of the color targets pipelines write to
   */
  getColorFormat(): GPUTextureFormat {
    return this.format.endsWith('-srgb') ? this.format : toSrgb(this.format);
  }

  isInitialized(): boolean {
    return this.device !== null && this.context !== null;
  }

  dispose(): void {
    this.context?.unconfigure();
    this.device?.destroy();
    this.device = null;
    this.context = null;
    this.adapter = null;
    this.canvas = null;
  }
}

function toSrgb(format: GPUTextureFormat): GPUTextureFormat {
  switch (format) {
    case 'bgra8unorm':
      return 'bgra8unorm-srgb';
    case 'rgba8unorm':
      return 'rgba8unorm-srgb';
    default:
      return format;
  }
}
