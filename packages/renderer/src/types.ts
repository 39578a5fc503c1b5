/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Renderer types for partview
 */

import type { RGBA, Vec3 } from '@partview/geometry';

export type { Vec3 };

export interface Mat4 {
  m: Float32Array; // 16 elements, column-major
}

export interface Ray {
  origin: Vec3;
  direction: Vec3;
}

export interface OrbitState {
  azimuthAngle: number;
  polarAngle: number;
  distance: number;
  target: Vec3;
}

export interface CameraMatrices {
  camera: Mat4;
  view: Mat4;
  position: Vec3;
}

export type CardinalView = '+X' | '-X' | '+Y' | '-Y' | '+Z' | '-Z';

/**
 * Renderer-facing configuration derived from the viewer options
 */
export interface RenderSettings {
  zIsUp: boolean;
  sampleCount: number;
  coordinateThickness: number;
  lightDir: [number, number, number];
  ambient: number;
  specularPower: number;
  baseColor: RGBA;
  lineColor: RGBA;
  lineWidthX: number;
  lineWidthY: number;
  gridSize: number;
  gridSpacing: number;
  clearColor: RGBA;
}

/**
 * What a settings change requires of the GPU side
 */
export interface SettingsUpdatePlan {
  rebuildGridPipeline: boolean;
  regenerateGrid: boolean;
  regenerateAxes: boolean;
  updateGridUniforms: boolean;
  updateLight: boolean;
  /** Sample count changed: render targets and every pipeline */
  rebuildTargets: boolean;
}

export type SceneObjectKind = 'mesh' | 'lines' | 'text';

/** An object id, or its position in insertion order */
export type SceneKey = string | number;
