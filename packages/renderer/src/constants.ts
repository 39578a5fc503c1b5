/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Renderer constants - extracted magic numbers for maintainability
 */

// ============================================================================
// Camera Constants
// ============================================================================

export const CAMERA_CONSTANTS = {
  // Default orbit
  DEFAULT_AZIMUTH: Math.PI / 4, // 45 degrees
  DEFAULT_POLAR: Math.PI / 6, // 30 degrees
  DEFAULT_DISTANCE: 50,
  DEFAULT_TARGET: { x: 0, y: 0, z: 0 } as const,

  // Panning
  /** Keyboard pan runs this much faster than mouse pan */
  KEYBOARD_PAN_FACTOR: 5,

  // Fit to sphere
  /** Far plane sits this many buffered radii behind the camera distance */
  FAR_RADIUS_MULTIPLIER: 50,
  /** Near plane as a fraction of the buffered radius */
  NEAR_RADIUS_FACTOR: 0.001,
  MIN_NEAR: 0.0001,
} as const;

// ============================================================================
// Error Handling Constants
// ============================================================================

export const ERROR_CONSTANTS = {
  /** Rate limit for render error logging (ms) */
  RENDER_ERROR_THROTTLE_MS: 1000,
} as const;

// ============================================================================
// Pipeline Constants
// ============================================================================

export const PIPELINE_CONSTANTS = {
  // Buffer layout (bytes) - must match WGSL shader expectations
  /** projection + view */
  FRAME_UNIFORM_SIZE: 128,
  /** lightDir vec3 + ambient + specularPower, padded */
  LIGHT_UNIFORM_SIZE: 32,
  MESH_COLOR_SIZE: 16,
  /** lineColor + baseColor + lineWidth vec2 + spacing, padded */
  GRID_UNIFORM_SIZE: 48,

  // MSAA
  /** Default MSAA sample count */
  DEFAULT_SAMPLE_COUNT: 4,

  // Depth buffer
  DEPTH_FORMAT: 'depth24plus' as const,
  DEPTH_CLEAR_VALUE: 1.0,
} as const;

// ============================================================================
// Grid Constants
// ============================================================================

export const GRID_CONSTANTS = {
  /** Grid sits just below the ground plane to avoid fighting with geometry */
  PLANE_OFFSET: -0.01,
  /** UV span of the grid quad; the shader recenters it */
  UV_EXTENT: 100,
} as const;

// ============================================================================
// Billboard Constants
// ============================================================================

export const BILLBOARD_CONSTANTS = {
  FONT: 'bold 24px sans-serif',
  PADDING: 20,
  HEIGHT: 30,
  /** Label half height in world units; the width follows the texture aspect */
  WORLD_HALF_HEIGHT: 1,
  TEXTURE_FORMAT: 'rgba8unorm' as const,
  /** Fragments more transparent than this are discarded */
  ALPHA_CUTOFF: 0.1,
} as const;

// ============================================================================
// Frame Timing Constants
// ============================================================================

export const FRAME_CONSTANTS = {
  /** Rolling window of frame times */
  WINDOW_SIZE: 20,
  /** How often the average is reported (ms) */
  REPORT_INTERVAL_MS: 1000,
} as const;

// ============================================================================
// Scene Automation Constants
// ============================================================================

export const SCENE_CONSTANTS = {
  /** Bounding spheres closer than this (center and radius) count as unchanged */
  SPHERE_EPSILON: 1e-6,
} as const;
