/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Raised when input geometry cannot be turned into GPU buffers
 * (too few vertices, color count mismatch, index overflow).
 */
export class GeometryError extends Error {
  constructor(
    message: string,
    public readonly objectId?: string
  ) {
    super(objectId ? `${message} (object "${objectId}")` : message);
    this.name = 'GeometryError';
  }
}
