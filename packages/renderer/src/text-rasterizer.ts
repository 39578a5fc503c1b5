/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Text label rasterization into GPU textures
 */

import { rgbaToCss, type RGBA } from '@partview/geometry';
import { BILLBOARD_CONSTANTS } from './constants.js';

export interface TextLabel {
  text: string;
  backgroundColor: RGBA;
  textColor: RGBA;
}

export interface TextTexture {
  texture: GPUTexture;
  width: number;
  height: number;
}

/**
 * Turns a label into a sampled texture. Injected into the scene so labels
 * can be produced without a DOM.
 */
export interface TextRasterizer {
  rasterize(device: GPUDevice, label: TextLabel): Promise<TextTexture>;
}

interface LabelSurface {
  canvas: OffscreenCanvas | HTMLCanvasElement;
  ctx: OffscreenCanvasRenderingContext2D | CanvasRenderingContext2D | null;
}

// OffscreenCanvas where available, so workers need no document
function createLabelSurface(): LabelSurface {
  if (typeof OffscreenCanvas !== 'undefined') {
    const canvas = new OffscreenCanvas(1, 1);
    return { canvas, ctx: canvas.getContext('2d') };
  }
  const canvas = document.createElement('canvas');
  return { canvas, ctx: canvas.getContext('2d') };
}

/**
 * Draws the label on a 2D canvas and copies it to the GPU through an
 * ImageBitmap.
 */
export class CanvasTextRasterizer implements TextRasterizer {
  async rasterize(device: GPUDevice, label: TextLabel): Promise<TextTexture> {
    const { canvas, ctx } = createLabelSurface();
    if (!ctx) {
      throw new Error('2D canvas context unavailable');
    }

    ctx.font = BILLBOARD_CONSTANTS.FONT;
    const width = Math.ceil(ctx.measureText(label.text).width) + BILLBOARD_CONSTANTS.PADDING;
    const height = BILLBOARD_CONSTANTS.HEIGHT;
    // Resizing resets the context state
    canvas.width = width;
    canvas.height = height;

    ctx.fillStyle = rgbaToCss(label.backgroundColor);
    ctx.fillRect(0, 0, width, height);

    ctx.fillStyle = rgbaToCss(label.textColor);
    ctx.font = BILLBOARD_CONSTANTS.FONT;
    ctx.textAlign = 'center';
    ctx.textBaseline = 'middle';
    ctx.fillText(label.text, width / 2, height / 2);

    const bitmap = await createImageBitmap(canvas);
    const texture = device.createTexture({
      label: `Label "${label.text}"`,
      size: [width, height],
      format: BILLBOARD_CONSTANTS.TEXTURE_FORMAT,
      usage: GPUTextureUsage.TEXTURE_BINDING | GPUTextureUsage.COPY_DST | GPUTextureUsage.RENDER_ATTACHMENT,
    });
    try {
      device.queue.copyExternalImageToTexture(
        { source: bitmap, flipY: true },
        { texture, premultipliedAlpha: false },
        [width, height]
      );
    } catch (error) {
      texture.destroy();
      throw error;
    } finally {
      bitmap.close();
    }

    return { texture, width, height };
  }
}
