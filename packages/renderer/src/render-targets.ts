/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * MSAA color and depth targets sized to the canvas. With one sample the
 * pass renders straight into the swap chain texture.
 */

import type { RGBA } from '@partview/geometry';
import { PIPELINE_CONSTANTS } from './constants.js';

export class RenderTargets {
  private device: GPUDevice;
  private colorFormat: GPUTextureFormat;
  private msaaTexture: GPUTexture | null = null;
  private depthTexture: GPUTexture | null = null;
  private msaaView: GPUTextureView | null = null;
  private depthView: GPUTextureView | null = null;
  private width = 0;
  private height = 0;
  private sampleCount: number;

  constructor(device: GPUDevice, colorFormat: GPUTextureFormat, sampleCount: number) {
    this.device = device;
    this.colorFormat = colorFormat;
    this.sampleCount = sampleCount;
  }

  /**
   * (Re)allocate for a size and sample count. A zero-size canvas leaves the
   * targets released and frames are skipped.
   */
  allocate(width: number, height: number, sampleCount: number = this.sampleCount): void {
    this.release();
    this.sampleCount = sampleCount;
    if (width <= 0 || height <= 0) return;

    const size = { width, height };
    if (sampleCount > 1) {
      this.msaaTexture = this.device.createTexture({
        label: 'MSAA Color',
        size,
        sampleCount,
        format: this.colorFormat,
        usage: GPUTextureUsage.RENDER_ATTACHMENT,
      });
      this.msaaView = this.msaaTexture.createView();
    }

    this.depthTexture = this.device.createTexture({
      label: 'Depth',
      size,
      sampleCount,
      format: PIPELINE_CONSTANTS.DEPTH_FORMAT,
      usage: GPUTextureUsage.RENDER_ATTACHMENT,
    });
    this.depthView = this.depthTexture.createView();
    this.width = width;
    this.height = height;
  }

  isAllocated(): boolean {
    return this.depthView !== null;
  }

  needsResize(width: number, height: number): boolean {
    return this.width !== width || this.height !== height;
  }

  getSampleCount(): number {
    return this.sampleCount;
  }

  /**
   * Pass descriptor targeting `outputView` (the swap chain view), or null
   * when nothing is allocated.
   */
  describePass(outputView: GPUTextureView, clearColor: RGBA): GPURenderPassDescriptor | null {
    if (!this.depthView) return null;
    const [r, g, b, a] = clearColor;
    const useMSAA = this.msaaView !== null;

    return {
      colorAttachments: [
        {
          view: this.msaaView ?? outputView,
          resolveTarget: useMSAA ? outputView : undefined,
          clearValue: { r, g, b, a },
          loadOp: 'clear',
          // Discard MSAA buffer after resolve
          storeOp: useMSAA ? 'discard' : 'store',
        },
      ],
      depthStencilAttachment: {
        view: this.depthView,
        depthClearValue: PIPELINE_CONSTANTS.DEPTH_CLEAR_VALUE,
        depthLoadOp: 'clear',
        depthStoreOp: 'discard',
      },
    };
  }

  release(): void {
    this.msaaTexture?.destroy();
    this.depthTexture?.destroy();
    this.msaaTexture = null;
    this.depthTexture = null;
    this.msaaView = null;
    this.depthView = null;
    this.width = 0;
    this.height = 0;
  }
}
