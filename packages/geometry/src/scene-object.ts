/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { encodeMesh } from './mesh-encoder.js';
import { generateStadiumGeometry } from './stadium.js';
import type { SceneObject, ScenePayload } from './types.js';

/**
 * Convert a scene object into the payload its GPU resources are built from
 */
export function exportSceneObject(obj: SceneObject): ScenePayload {
  switch (obj.kind) {
    case 'mesh':
      return { kind: 'mesh', payload: encodeMesh(obj) };
    case 'lines': {
      const geometry = generateStadiumGeometry(obj.vertices, obj.thicknesses, obj.colors, obj.fades);
      return { kind: 'lines', payload: { id: obj.id, ...geometry } };
    }
    case 'text':
      return {
        kind: 'text',
        payload: {
          id: obj.id,
          text: obj.text,
          position: obj.position,
          backgroundColor: obj.backgroundColor,
          textColor: obj.textColor,
        },
      };
  }
}
