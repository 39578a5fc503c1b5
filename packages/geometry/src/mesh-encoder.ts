/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Mesh encoder - flattens a mesh object into GPU-ready typed arrays
 */

import { GeometryError } from './errors.js';
import type { MeshObject, MeshPayload, RGBA } from './types.js';

const MAX_VERTICES = 0xffff;
const WHITE: RGBA = [1, 1, 1, 1];

export function encodeMesh(mesh: MeshObject): MeshPayload {
  switch (mesh.coloring) {
    case 'perTriangle':
      return encodePerTriangle(mesh);
    case 'perVertex':
      if (mesh.colors.length !== mesh.vertices.length) {
        throw new GeometryError(
          `Expected ${mesh.vertices.length} vertex colors, got ${mesh.colors.length}`,
          mesh.id
        );
      }
      return encodeIndexed(mesh, flattenColors(mesh.colors), false);
    case 'uniform':
      return encodeIndexed(mesh, new Float32Array(mesh.colors[0] ?? WHITE), true);
  }
}

/**
 * Triangles are un-shared so every corner can carry its triangle's color:
 * positions are re-indexed 0..3n-1 and each color written three times.
 */
function encodePerTriangle(mesh: MeshObject): MeshPayload {
  const triangleCount = mesh.indices.length;
  if (mesh.colors.length !== triangleCount) {
    throw new GeometryError(
      `Expected ${triangleCount} triangle colors, got ${mesh.colors.length}`,
      mesh.id
    );
  }
  checkVertexCount(triangleCount * 3, mesh.id);

  const vertices = new Float32Array(triangleCount * 9);
  const colors = new Float32Array(triangleCount * 12);
  const indices = new Uint16Array(triangleCount * 3);

  for (let t = 0; t < triangleCount; t++) {
    const color = mesh.colors[t];
    for (let c = 0; c < 3; c++) {
      const corner = t * 3 + c;
      const source = mesh.vertices[mesh.indices[t][c]];
      if (!source) {
        throw new GeometryError(`Triangle ${t} references missing vertex ${mesh.indices[t][c]}`, mesh.id);
      }
      vertices.set(source, corner * 3);
      colors.set(color, corner * 4);
      indices[corner] = corner;
    }
  }

  return { id: mesh.id, vertices, colors, indices, singleColor: false };
}

function encodeIndexed(mesh: MeshObject, colors: Float32Array, singleColor: boolean): MeshPayload {
  checkVertexCount(mesh.vertices.length, mesh.id);

  const vertices = new Float32Array(mesh.vertices.length * 3);
  mesh.vertices.forEach((v, i) => vertices.set(v, i * 3));

  const indices = new Uint16Array(mesh.indices.length * 3);
  mesh.indices.forEach((tri, i) => indices.set(tri, i * 3));

  return { id: mesh.id, vertices, colors, indices, singleColor };
}

function flattenColors(colors: RGBA[]): Float32Array {
  const out = new Float32Array(colors.length * 4);
  colors.forEach((c, i) => out.set(c, i * 4));
  return out;
}

function checkVertexCount(count: number, id: string): void {
  if (count > MAX_VERTICES) {
    throw new GeometryError(`Mesh has ${count} vertices, more than 16-bit indices address`, id);
  }
}
