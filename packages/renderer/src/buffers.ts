/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * GPU buffer helpers
 */

export type BufferSource = Float32Array | Uint16Array | Uint32Array;

/** Round a byte length up to the next multiple of 4 */
export function alignTo4(byteLength: number): number {
  return (byteLength + 3) & ~3;
}

/**
 * Create a buffer filled with `data`. Mapped-at-creation buffers need a size
 * that is a multiple of 4, so odd-length 16-bit index lists get padded.
 */
export function createBuffer(
  device: GPUDevice,
  data: BufferSource,
  usage: GPUBufferUsageFlags,
  label?: string
): GPUBuffer {
  const buffer = device.createBuffer({
    label,
    size: Math.max(4, alignTo4(data.byteLength)),
    usage,
    mappedAtCreation: true,
  });
  new Uint8Array(buffer.getMappedRange()).set(new Uint8Array(data.buffer, data.byteOffset, data.byteLength));
  buffer.unmap();
  return buffer;
}

export function createUniformBuffer(device: GPUDevice, size: number, label?: string): GPUBuffer {
  return device.createBuffer({
    label,
    size,
    usage: GPUBufferUsage.UNIFORM | GPUBufferUsage.COPY_DST,
  });
}
