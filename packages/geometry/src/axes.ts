/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { StadiumBuilder } from './stadium.js';
import type { LineGeometry, RGBA, Vec3Tuple } from './types.js';

interface HalfAxis {
  direction: Vec3Tuple;
  color: RGBA;
  fade: number;
}

const HALF_AXES: HalfAxis[] = [
  { direction: [1, 0, 0], color: [1, 0, 0, 1], fade: 0 },
  { direction: [-1, 0, 0], color: [0.5, 0, 0, 1], fade: 1 },
  { direction: [0, 1, 0], color: [0, 1, 0, 1], fade: 0 },
  { direction: [0, -1, 0], color: [0, 0.5, 0, 1], fade: 1 },
  { direction: [0, 0, 1], color: [0, 0, 1, 1], fade: 0 },
  { direction: [0, 0, -1], color: [0, 0, 0.5, 1], fade: 1 },
];

/**
 * Coordinate axes through the origin: one body quad per half axis.
 * Positive halves are opaque, negative halves darker and faded.
 */
export function generateAxisGeometry(extent: number, thickness: number): LineGeometry {
  const builder = new StadiumBuilder();
  const origin: Vec3Tuple = [0, 0, 0];

  for (const half of HALF_AXES) {
    const [dx, dy, dz] = half.direction;
    builder.addSegment(origin, [dx * extent, dy * extent, dz * extent], half.color, thickness, half.fade, false);
  }

  return builder.build();
}
