/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { GeometryError } from './errors.js';
import type { RGBA } from './types.js';

const HEX_COLOR = /^#?([0-9a-f]{6})$/i;

/**
 * Parse `#rrggbb` into RGBA floats with the given alpha
 */
export function hexToRgba(hex: string, alpha = 1): RGBA {
  const match = HEX_COLOR.exec(hex.trim());
  if (!match) {
    throw new GeometryError(`Invalid color "${hex}", expected #rrggbb`);
  }
  const value = parseInt(match[1], 16);
  return [
    ((value >> 16) & 0xff) / 255,
    ((value >> 8) & 0xff) / 255,
    (value & 0xff) / 255,
    Math.min(1, Math.max(0, alpha)),
  ];
}

/** CSS `rgba()` string for canvas drawing */
export function rgbaToCss(color: RGBA): string {
  const [r, g, b, a] = color;
  return `rgba(${Math.round(r * 255)}, ${Math.round(g * 255)}, ${Math.round(b * 255)}, ${a})`;
}
