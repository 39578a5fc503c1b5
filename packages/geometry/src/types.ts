/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Geometry types for partview
 */

export interface Vec3 {
  x: number;
  y: number;
  z: number;
}

export type Vec3Tuple = [number, number, number];
export type RGBA = [number, number, number, number]; // 0-1 floats
export type Triangle = [number, number, number];

export interface AABB {
  min: Vec3;
  max: Vec3;
}

export interface Sphere {
  center: Vec3;
  radius: number;
}

/** How a mesh is colored. */
export type MeshColoring = 'uniform' | 'perVertex' | 'perTriangle';

// ═══════════════════════════════════════════════════════════════════════════
// SCENE OBJECTS
// Closed variant set - dispatch on `kind`
// ═══════════════════════════════════════════════════════════════════════════

export interface MeshObject {
  kind: 'mesh';
  id: string;
  vertices: Vec3Tuple[];
  indices: Triangle[];
  /**
   * uniform: first color only; perVertex: one per vertex;
   * perTriangle: one per entry of `indices`
   */
  colors: RGBA[];
  coloring: MeshColoring;
}

export interface LineSetObject {
  kind: 'lines';
  id: string;
  vertices: Vec3Tuple[];
  /** One color per segment; missing entries render white */
  colors: RGBA[];
  /** One thickness per segment; segments with thickness <= 0 are skipped */
  thicknesses: number[];
  /**
   * One fade factor per segment. 0 = opaque, 1 = linear fade from the
   * centerline to the edge
   */
  fades: number[];
}

export interface TextBillboardObject {
  kind: 'text';
  id: string;
  text: string;
  position: Vec3Tuple;
  backgroundColor: RGBA;
  textColor: RGBA;
}

export type SceneObject = MeshObject | LineSetObject | TextBillboardObject;

// ═══════════════════════════════════════════════════════════════════════════
// GPU-READY PAYLOADS
// ═══════════════════════════════════════════════════════════════════════════

export interface MeshPayload {
  id: string;
  vertices: Float32Array;  // [x,y,z, x,y,z, ...]
  colors: Float32Array;    // [r,g,b,a, ...]
  indices: Uint16Array;
  singleColor: boolean;
}

/**
 * Billboard-strip geometry. Every vertex carries its segment's start point
 * (`vertices`) and end point (`endPositions`); the vertex shader places it
 * using the UV.
 */
export interface LineGeometry {
  vertices: Float32Array;      // vec3 per vertex
  colors: Float32Array;        // vec4 per vertex
  thickness: Float32Array;     // f32 per vertex
  uvs: Float32Array;           // vec2 per vertex
  endPositions: Float32Array;  // vec3 per vertex
  fades: Float32Array;         // f32 per vertex
  indices: Uint16Array;
}

export interface LinePayload extends LineGeometry {
  id: string;
}

export interface BillboardPayload {
  id: string;
  text: string;
  position: Vec3Tuple;
  backgroundColor: RGBA;
  textColor: RGBA;
}

export type ScenePayload =
  | { kind: 'mesh'; payload: MeshPayload }
  | { kind: 'lines'; payload: LinePayload }
  | { kind: 'text'; payload: BillboardPayload };
