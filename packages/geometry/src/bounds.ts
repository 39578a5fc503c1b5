/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Bounds helpers - sort anchors and camera fit spheres
 */

import type { AABB, Sphere, Vec3 } from './types.js';

/** Radius used when there is nothing to fit */
export const EMPTY_SPHERE_RADIUS = 1;

export function createEmptyBounds(): AABB {
    return {
        min: { x: Infinity, y: Infinity, z: Infinity },
        max: { x: -Infinity, y: -Infinity, z: -Infinity },
    };
}

export function isEmptyBounds(bounds: AABB): boolean {
    return bounds.min.x > bounds.max.x;
}

/**
 * Grow `bounds` by every finite xyz triple in `positions`
 */
export function expandBounds(bounds: AABB, positions: ArrayLike<number>): AABB {
    for (let i = 0; i + 2 < positions.length; i += 3) {
        const x = positions[i];
        const y = positions[i + 1];
        const z = positions[i + 2];
        if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(z)) continue;

        bounds.min.x = Math.min(bounds.min.x, x);
        bounds.min.y = Math.min(bounds.min.y, y);
        bounds.min.z = Math.min(bounds.min.z, z);
        bounds.max.x = Math.max(bounds.max.x, x);
        bounds.max.y = Math.max(bounds.max.y, y);
        bounds.max.z = Math.max(bounds.max.z, z);
    }
    return bounds;
}

export function computeBounds(...positionArrays: ArrayLike<number>[]): AABB {
    const bounds = createEmptyBounds();
    for (const positions of positionArrays) {
        expandBounds(bounds, positions);
    }
    return bounds;
}

/**
 * Center of the bounding box of `positions`; origin when empty
 */
export function computeBoundsCenter(positions: ArrayLike<number>): Vec3 {
    const bounds = computeBounds(positions);
    if (isEmptyBounds(bounds)) return { x: 0, y: 0, z: 0 };
    return {
        x: (bounds.min.x + bounds.max.x) / 2,
        y: (bounds.min.y + bounds.max.y) / 2,
        z: (bounds.min.z + bounds.max.z) / 2,
    };
}

/**
 * Sphere around the box: box center, half the diagonal as radius.
 * An empty box gives a unit sphere at the origin.
 */
export function boundsToSphere(bounds: AABB): Sphere {
    if (isEmptyBounds(bounds)) {
        return { center: { x: 0, y: 0, z: 0 }, radius: EMPTY_SPHERE_RADIUS };
    }
    const dx = bounds.max.x - bounds.min.x;
    const dy = bounds.max.y - bounds.min.y;
    const dz = bounds.max.z - bounds.min.z;
    return {
        center: {
            x: (bounds.min.x + bounds.max.x) / 2,
            y: (bounds.min.y + bounds.max.y) / 2,
            z: (bounds.min.z + bounds.max.z) / 2,
        },
        radius: Math.sqrt(dx * dx + dy * dy + dz * dz) / 2,
    };
}

export function computeBoundingSphere(...positionArrays: ArrayLike<number>[]): Sphere {
    return boundsToSphere(computeBounds(...positionArrays));
}
