/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @partview/geometry - scene object types and CPU-side geometry
 */

export { GeometryError } from './errors.js';
export { generateStadiumGeometry, STADIUM_CONSTANTS } from './stadium.js';
export { generateAxisGeometry } from './axes.js';
export { encodeMesh } from './mesh-encoder.js';
export { exportSceneObject } from './scene-object.js';
export {
  createEmptyBounds,
  isEmptyBounds,
  expandBounds,
  computeBounds,
  computeBoundsCenter,
  boundsToSphere,
  computeBoundingSphere,
  EMPTY_SPHERE_RADIUS,
} from './bounds.js';
export { hexToRgba, rgbaToCss } from './color.js';
export * from './types.js';
