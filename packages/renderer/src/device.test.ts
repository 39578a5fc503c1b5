/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect, vi, afterEach } from 'vitest';

import { RenderContext } from './device.js';
import { DeviceInitError } from './errors.js';
import { createFakeGpu, FakeCanvas, FakeDevice, flush } from '../test/fake-gpu.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('RenderContext', () => {
  describe('init', () => {
    it('should fail without a WebGPU entry point', async () => {
      const context = new RenderContext();
      const init = context.init(new FakeCanvas(), undefined);
      await expect(init).rejects.toBeInstanceOf(DeviceInitError);
      await expect(init).rejects.toThrow('WebGPU not available');
    });

    it('should fail when no adapter is offered', async () => {
      const gpu = createFakeGpu(new FakeDevice(), { noAdapter: true });
      await expect(new RenderContext().init(new FakeCanvas(), gpu)).rejects.toThrow('Failed to get GPU adapter');
    });

    it('should fail when the adapter request throws', async () => {
      const gpu = createFakeGpu(new FakeDevice(), { adapterError: new Error('blocked') });
      await expect(new RenderContext().init(new FakeCanvas(), gpu)).rejects.toThrow('Failed to get GPU adapter');
    });

    it('should fail when the device request throws', async () => {
      const gpu = createFakeGpu(new FakeDevice(), { deviceError: new Error('limits') });
      await expect(new RenderContext().init(new FakeCanvas(), gpu)).rejects.toThrow('Failed to create GPU device');
    });

    it('should release the device when the canvas has no WebGPU context', async () => {
      const device = new FakeDevice();
      const context = new RenderContext();
      await expect(context.init(new FakeCanvas(800, 600, false), createFakeGpu(device))).rejects.toThrow(
        'Failed to get WebGPU context'
      );
      expect(device.destroyed).toBe(true);
      expect(context.isInitialized()).toBe(false);
    });
  });

  it('should configure the canvas with an sRGB view format', async () => {
    const device = new FakeDevice();
    const canvas = new FakeCanvas();
    const context = new RenderContext();
    await context.init(canvas, createFakeGpu(device));

    expect(context.isInitialized()).toBe(true);
    expect(context.getFormat()).toBe('bgra8unorm');
    expect(context.getColorFormat()).toBe('bgra8unorm-srgb');
    expect(canvas.context?.configuration?.format).toBe('bgra8unorm');
    expect(canvas.context?.configuration?.viewFormats).toEqual(['bgra8unorm-srgb']);
    expect(canvas.context?.configuration?.alphaMode).toBe('opaque');
  });

  it('should keep a format that is already sRGB', async () => {
    const context = new RenderContext();
    await context.init(new FakeCanvas(), createFakeGpu(new FakeDevice(), { format: 'rgba8unorm-srgb' }));
    expect(context.getColorFormat()).toBe('rgba8unorm-srgb');
  });

  it('should map rgba8unorm to its sRGB variant', async () => {
    const context = new RenderContext();
    await context.init(new FakeCanvas(), createFakeGpu(new FakeDevice(), { format: 'rgba8unorm' }));
    expect(context.getColorFormat()).toBe('rgba8unorm-srgb');
  });

  it('should log an unexpected device loss', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const device = new FakeDevice();
    await new RenderContext().init(new FakeCanvas(), createFakeGpu(device));

    device.lose('unknown', 'driver reset');
    await flush();

    expect(error).toHaveBeenCalledWith('[RenderContext] device.lost GPU device lost:', 'driver reset');
  });

  it('should stay quiet when the device was destroyed on purpose', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const device = new FakeDevice();
    await new RenderContext().init(new FakeCanvas(), createFakeGpu(device));

    device.lose('destroyed', '');
    await flush();

    expect(error).not.toHaveBeenCalled();
  });

  it('should unconfigure and destroy on dispose', async () => {
    const device = new FakeDevice();
    const canvas = new FakeCanvas();
    const context = new RenderContext();
    await context.init(canvas, createFakeGpu(device));

    context.dispose();

    expect(canvas.context?.unconfigured).toBe(true);
    expect(device.destroyed).toBe(true);
    expect(context.isInitialized()).toBe(false);
    expect(() => context.getDevice()).toThrow('Device not initialized');
  });
});
