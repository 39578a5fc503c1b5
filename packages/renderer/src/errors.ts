/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * WebGPU could not be brought up: no `navigator.gpu`, no adapter, no device
 * or no canvas context.
 */
export class DeviceInitError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'DeviceInitError';
  }
}

/**
 * A scene call broke a precondition, such as adding an id that is
 * already live or pending.
 */
export class SceneError extends Error {
  constructor(
    message: string,
    public readonly objectId?: string
  ) {
    super(message);
    this.name = 'SceneError';
  }
}
