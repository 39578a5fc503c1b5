/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Stadium builder - turns polyline segments into camera-facing strips
 * (a body quad plus a semicircular cap at each end).
 *
 * Vertices are not placed here. Each one carries the segment's start and end
 * point, and its UV tells the vertex shader where it sits:
 *   u = 0..1 along the segment (caps reach to -0.5 / 1.5)
 *   v = -0.5..0.5 across it, scaled by thickness
 */

import { GeometryError } from './errors.js';
import type { LineGeometry, RGBA, Vec3Tuple } from './types.js';

export const STADIUM_CONSTANTS = {
  /** Fan triangles per semicircular cap */
  CAP_STEPS: 12,
  /** 4 body + 2 × (center + 13 perimeter) */
  VERTICES_PER_SEGMENT: 32,
  /** 2 body + 2 × 12 fan triangles */
  INDICES_PER_SEGMENT: 78,
  MAX_VERTICES: 0xffff,
} as const;

const WHITE: RGBA = [1, 1, 1, 1];

export class StadiumBuilder {
  private readonly positions: number[] = [];
  private readonly ends: number[] = [];
  private readonly colors: number[] = [];
  private readonly thickness: number[] = [];
  private readonly uvs: number[] = [];
  private readonly fades: number[] = [];
  private readonly indices: number[] = [];
  private vertexCount = 0;

  private start: Vec3Tuple = [0, 0, 0];
  private end: Vec3Tuple = [0, 0, 0];
  private color: RGBA = WHITE;
  private width = 0;
  private fade = 0;

  addSegment(
    start: Vec3Tuple,
    end: Vec3Tuple,
    color: RGBA,
    width: number,
    fade: number,
    caps = true
  ): void {
    this.start = start;
    this.end = end;
    this.color = color;
    this.width = width;
    this.fade = fade;

    this.addBody();
    if (!caps) return;
    // Start cap bulges backwards (u < 0), end cap forwards (u > 1)
    this.addCap(0, Math.PI / 2);
    this.addCap(1, -Math.PI / 2);
  }

  build(): LineGeometry {
    return {
      vertices: new Float32Array(this.positions),
      colors: new Float32Array(this.colors),
      thickness: new Float32Array(this.thickness),
      uvs: new Float32Array(this.uvs),
      endPositions: new Float32Array(this.ends),
      fades: new Float32Array(this.fades),
      indices: new Uint16Array(this.indices),
    };
  }

  private addVertex(u: number, v: number): number {
    this.positions.push(this.start[0], this.start[1], this.start[2]);
    this.ends.push(this.end[0], this.end[1], this.end[2]);
    this.colors.push(this.color[0], this.color[1], this.color[2], this.color[3]);
    this.thickness.push(this.width);
    this.uvs.push(u, v);
    this.fades.push(this.fade);
    return this.vertexCount++;
  }

  private addBody(): void {
    const b = this.addVertex(0, -0.5);
    this.addVertex(0, 0.5);
    this.addVertex(1, -0.5);
    this.addVertex(1, 0.5);
    this.indices.push(b, b + 1, b + 2, b + 1, b + 3, b + 2);
  }

  /**
   * Half-disc fan around (centerU, 0), sweeping 180° from `startAngle`.
   * Integer steps keep the last perimeter vertex exactly on the axis.
   */
  private addCap(centerU: number, startAngle: number): void {
    const steps = STADIUM_CONSTANTS.CAP_STEPS;
    const center = this.addVertex(centerU, 0);
    for (let k = 0; k <= steps; k++) {
      const a = startAngle + (Math.PI * k) / steps;
      this.addVertex(centerU + Math.cos(a) * 0.5, Math.sin(a) * 0.5);
    }
    for (let k = 0; k < steps; k++) {
      this.indices.push(center, center + 1 + k, center + 2 + k);
    }
  }
}

/**
 * Build billboard-strip geometry for a polyline. Segment i joins vertex i and
 * i + 1 and reads thickness, color and fade at index i.
 */
export function generateStadiumGeometry(
  vertices: Vec3Tuple[],
  thicknesses: number[],
  colors: RGBA[] = [],
  fades: number[] = []
): LineGeometry {
  if (vertices.length < 2) {
    throw new GeometryError(`Line needs at least 2 vertices, got ${vertices.length}`);
  }

  const segmentCount = vertices.length - 1;
  let drawn = 0;
  for (let i = 0; i < segmentCount; i++) {
    if ((thicknesses[i] ?? 0) > 0) drawn++;
  }
  if (drawn * STADIUM_CONSTANTS.VERTICES_PER_SEGMENT > STADIUM_CONSTANTS.MAX_VERTICES) {
    throw new GeometryError(
      `Line produces ${drawn * STADIUM_CONSTANTS.VERTICES_PER_SEGMENT} vertices, more than 16-bit indices address`
    );
  }

  const builder = new StadiumBuilder();
  for (let i = 0; i < segmentCount; i++) {
    const width = thicknesses[i] ?? 0;
    if (width <= 0) continue;
    const fade = Math.min(1, Math.max(0, fades[i] ?? 0));
    builder.addSegment(vertices[i], vertices[i + 1], colors[i] ?? WHITE, width, fade);
  }
  return builder.build();
}
