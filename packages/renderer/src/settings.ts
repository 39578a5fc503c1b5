/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Render settings - the renderer-facing view of ViewerOptions and the
 * classification of what a change between two of them requires.
 */

import { hexToRgba, type RGBA } from '@partview/geometry';
import type { ViewerOptions } from './options.js';
import type { RenderSettings, SettingsUpdatePlan } from './types.js';

/**
 * Direction the light travels, from polar/azimuth angles in the z-up frame.
 * Y-up scenes take the components in (z, x, y) order.
 */
export function lightDirection(polar: number, azimuth: number, zIsUp: boolean): [number, number, number] {
  const x = -Math.sin(polar) * Math.cos(azimuth);
  const y = -Math.sin(polar) * Math.sin(azimuth);
  const z = -Math.cos(polar);
  return zIsUp ? [x, y, z] : [z, x, y];
}

export function toRenderSettings(options: ViewerOptions): RenderSettings {
  return {
    zIsUp: options.zIsUp,
    sampleCount: options.sampleCount,
    coordinateThickness: options.coordinateThickness,
    lightDir: lightDirection(options.lightPolarAngle, options.lightAzimuthAngle, options.zIsUp),
    ambient: options.ambientLight,
    specularPower: options.specularPower,
    baseColor: hexToRgba(options.baseColor, options.baseTransparency),
    lineColor: hexToRgba(options.lineColor, options.lineTransparency),
    lineWidthX: options.lineWidthX,
    lineWidthY: options.lineWidthY,
    gridSize: options.gridSize,
    gridSpacing: options.gridSpacing,
    clearColor: hexToRgba(options.clearColor, 1),
  };
}

export function isGridTransparent(settings: RenderSettings): boolean {
  return settings.baseColor[3] < 1;
}

const sameColor = (a: RGBA, b: RGBA) => a.every((v, i) => v === b[i]);
const sameVec = (a: readonly number[], b: readonly number[]) => a.every((v, i) => v === b[i]);

/**
 * What has to be redone on the GPU to go from `prev` to `next`.
 * Without `prev` (first application) everything is redone.
 */
export function planSettingsUpdate(prev: RenderSettings | null, next: RenderSettings): SettingsUpdatePlan {
  if (!prev) {
    return {
      rebuildGridPipeline: true,
      regenerateGrid: true,
      regenerateAxes: true,
      updateGridUniforms: true,
      updateLight: true,
      rebuildTargets: true,
    };
  }

  const gridSizeChanged = prev.gridSize !== next.gridSize;
  const regenerateGrid = gridSizeChanged || prev.gridSpacing !== next.gridSpacing || prev.zIsUp !== next.zIsUp;
  const gridLook =
    !sameColor(prev.baseColor, next.baseColor) ||
    !sameColor(prev.lineColor, next.lineColor) ||
    prev.lineWidthX !== next.lineWidthX ||
    prev.lineWidthY !== next.lineWidthY;

  return {
    rebuildGridPipeline: isGridTransparent(prev) !== isGridTransparent(next),
    regenerateGrid,
    regenerateAxes: gridSizeChanged || prev.coordinateThickness !== next.coordinateThickness,
    // Spacing uniform depends on grid size
    updateGridUniforms: gridLook || regenerateGrid,
    updateLight:
      !sameVec(prev.lightDir, next.lightDir) ||
      prev.ambient !== next.ambient ||
      prev.specularPower !== next.specularPower,
    rebuildTargets: prev.sampleCount !== next.sampleCount,
  };
}

/**
 * Spacing uniform for the grid shader; the grid quad spans 100 UV units.
 */
export function gridSpacingFactor(gridSize: number, gridSpacing: number): number {
  const scale = 100 / gridSize;
  return 1 / (scale * gridSpacing);
}
