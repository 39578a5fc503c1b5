/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Viewer options store
 *
 * One flat record held in a zustand vanilla store. Every `setOptions` call is
 * a single update cycle; listeners compare the previous and next snapshot with
 * `diffOptions` instead of wiring per-field change events.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import { createLogger } from './logger.js';

const log = createLogger('Options');

export type UpdateTrigger = 'never' | 'onDataChange' | 'sphereChange';

export interface ViewerOptions {
  // Camera constraints
  constrainPolar: boolean;
  minPolar: number;
  maxPolar: number;
  constrainAzimuth: boolean;
  minAzimuth: number;
  maxAzimuth: number;
  constrainDistance: boolean;
  minDistance: number;
  maxDistance: number;

  // Projection
  isPerspective: boolean;
  /** Vertical field of view in degrees */
  fov: number;
  /** Orthographic half height */
  orthoSize: number;
  zNear: number;
  zFar: number;
  zIsUp: boolean;
  sampleCount: number;

  // Input sensitivity
  orbitSensitivity: number;
  zoomSensitivity: number;
  panSensitivity: number;
  panSpeedMultiplier: number;

  // Lighting
  lightPolarAngle: number;
  lightAzimuthAngle: number;
  ambientLight: number;
  specularPower: number;

  // Grid / appearance
  clearColor: string;
  lineColor: string;
  /** Grid line opacity */
  lineTransparency: number;
  baseColor: string;
  /** Grid plane opacity; below 1 the grid draws in the transparent pass */
  baseTransparency: number;
  lineWidthX: number;
  lineWidthY: number;
  gridSize: number;
  gridSpacing: number;
  /** 0 hides the axes */
  coordinateThickness: number;
  isDarkTheme: boolean;

  // Automation
  autoCameraSphereBuffer: number;
  autoGridBuffer: number;
  autoResetCamera: UpdateTrigger;
  autoUpdateGrid: UpdateTrigger;
}

export const DEFAULT_LIGHT_OPTIONS: Readonly<ViewerOptions> = {
  constrainPolar: true,
  minPolar: -Math.PI * 0.49,
  maxPolar: Math.PI * 0.49,
  constrainAzimuth: false,
  minAzimuth: 0,
  maxAzimuth: 0,
  constrainDistance: true,
  minDistance: 0.5,
  maxDistance: 9999,

  isPerspective: true,
  fov: 20,
  orthoSize: 5,
  zNear: 0.001,
  zFar: 999,
  zIsUp: true,
  sampleCount: 4,

  orbitSensitivity: 0.01,
  zoomSensitivity: 0.005,
  panSensitivity: 0.005,
  panSpeedMultiplier: 3,

  lightPolarAngle: 0.13 * Math.PI,
  lightAzimuthAngle: 0.33 * Math.PI,
  ambientLight: 0.3,
  specularPower: 32,

  clearColor: '#f2f2ff',
  lineColor: '#d2d2d2',
  lineTransparency: 0.8,
  baseColor: '#000000',
  baseTransparency: 0,
  lineWidthX: 0.1,
  lineWidthY: 0.1,
  gridSize: 100,
  gridSpacing: 5,
  coordinateThickness: 1,
  isDarkTheme: false,

  autoCameraSphereBuffer: 0.2,
  autoGridBuffer: 3,
  autoResetCamera: 'sphereChange',
  autoUpdateGrid: 'sphereChange',
};

export const DEFAULT_DARK_OPTIONS: Readonly<ViewerOptions> = {
  ...DEFAULT_LIGHT_OPTIONS,
  clearColor: '#202020',
  isDarkTheme: true,
};

// ============================================================================
// Normalization
// ============================================================================

const HEX_COLOR = /^#[0-9a-f]{6}$/i;
const COLOR_KEYS = ['clearColor', 'lineColor', 'baseColor'] as const;

const OPTION_KEYS: Record<keyof ViewerOptions, true> = {
  constrainPolar: true, minPolar: true, maxPolar: true,
  constrainAzimuth: true, minAzimuth: true, maxAzimuth: true,
  constrainDistance: true, minDistance: true, maxDistance: true,
  isPerspective: true, fov: true, orthoSize: true, zNear: true, zFar: true, zIsUp: true, sampleCount: true,
  orbitSensitivity: true, zoomSensitivity: true, panSensitivity: true, panSpeedMultiplier: true,
  lightPolarAngle: true, lightAzimuthAngle: true, ambientLight: true, specularPower: true,
  clearColor: true, lineColor: true, lineTransparency: true, baseColor: true, baseTransparency: true,
  lineWidthX: true, lineWidthY: true, gridSize: true, gridSpacing: true, coordinateThickness: true,
  isDarkTheme: true,
  autoCameraSphereBuffer: true, autoGridBuffer: true, autoResetCamera: true, autoUpdateGrid: true,
};

function isOptionKey(key: string): key is keyof ViewerOptions {
  return Object.prototype.hasOwnProperty.call(OPTION_KEYS, key);
}

function optionKeys(options: ViewerOptions): (keyof ViewerOptions)[] {
  return Object.keys(options).filter(isOptionKey);
}

function restore<K extends keyof ViewerOptions>(target: ViewerOptions, source: ViewerOptions, key: K): void {
  target[key] = source[key];
}

const clamp = (v: number, min: number, max: number) => Math.min(max, Math.max(min, v));

/**
 * Clamp every bounded field. Malformed colors and non-finite numbers keep
 * the value from `previous`.
 */
export function normalizeOptions(next: ViewerOptions, previous: ViewerOptions = DEFAULT_LIGHT_OPTIONS): ViewerOptions {
  const out: ViewerOptions = { ...next };

  for (const key of optionKeys(out)) {
    const value = out[key];
    if (typeof value === 'number' && !Number.isFinite(value)) {
      log.warn(`Ignoring non-finite value for ${key}`, { operation: 'setOptions' });
      restore(out, previous, key);
    }
  }
  for (const key of COLOR_KEYS) {
    if (!HEX_COLOR.test(out[key])) {
      log.warn(`Ignoring malformed color "${out[key]}" for ${key}`, { operation: 'setOptions' });
      out[key] = previous[key];
    }
  }

  out.fov = clamp(out.fov, 1, 120);
  out.orthoSize = Math.max(out.orthoSize, 0.1);
  out.lineWidthX = clamp(out.lineWidthX, 0, 1);
  out.lineWidthY = clamp(out.lineWidthY, 0, 1);
  out.lineTransparency = clamp(out.lineTransparency, 0, 1);
  out.baseTransparency = clamp(out.baseTransparency, 0, 1);
  out.ambientLight = clamp(out.ambientLight, 0, 1);
  out.lightPolarAngle = clamp(out.lightPolarAngle, 0, Math.PI);
  out.lightAzimuthAngle = clamp(out.lightAzimuthAngle, 0, 2 * Math.PI);
  out.coordinateThickness = Math.max(out.coordinateThickness, 0);
  out.gridSize = out.gridSize > 0 ? out.gridSize : previous.gridSize;
  out.gridSpacing = out.gridSpacing > 0 ? out.gridSpacing : previous.gridSpacing;
  // WebGPU render targets take 1 or 4 samples
  out.sampleCount = out.sampleCount > 1 ? 4 : 1;

  return out;
}

// ============================================================================
// Snapshot diff
// ============================================================================

export const OPTIONS_EPSILON = 1e-9;

/**
 * Keys whose value changed between two snapshots. Numbers within
 * OPTIONS_EPSILON of each other count as unchanged.
 */
export function diffOptions(prev: ViewerOptions, next: ViewerOptions): (keyof ViewerOptions)[] {
  const changed: (keyof ViewerOptions)[] = [];
  for (const key of optionKeys(next)) {
    const a = prev[key];
    const b = next[key];
    if (typeof a === 'number' && typeof b === 'number') {
      if (Math.abs(a - b) > OPTIONS_EPSILON) changed.push(key);
    } else if (a !== b) {
      changed.push(key);
    }
  }
  return changed;
}

// ============================================================================
// Store
// ============================================================================

export interface OptionsState {
  options: ViewerOptions;

  // Actions
  setOptions: (partial: Partial<ViewerOptions>) => void;
  resetToDefault: (isDarkTheme: boolean) => void;
}

export type OptionsStore = StoreApi<OptionsState>;

export function createOptionsStore(initial: Partial<ViewerOptions> = {}): OptionsStore {
  return createStore<OptionsState>()((set, get) => ({
    options: normalizeOptions({ ...DEFAULT_LIGHT_OPTIONS, ...initial }),

    setOptions: (partial) => {
      const current = get().options;
      const next = normalizeOptions({ ...current, ...partial }, current);
      if (diffOptions(current, next).length === 0) return;
      set({ options: next });
    },

    resetToDefault: (isDarkTheme) => {
      const preset = isDarkTheme ? DEFAULT_DARK_OPTIONS : DEFAULT_LIGHT_OPTIONS;
      set({ options: { ...preset } });
    },
  }));
}

/**
 * Call `listener` once per update cycle with the keys that changed.
 * Returns the unsubscribe function.
 */
export function subscribeOptions(
  store: OptionsStore,
  listener: (changed: (keyof ViewerOptions)[], next: ViewerOptions, prev: ViewerOptions) => void
): () => void {
  return store.subscribe((state, prevState) => {
    if (state.options === prevState.options) return;
    const changed = diffOptions(prevState.options, state.options);
    if (changed.length > 0) listener(changed, state.options, prevState.options);
  });
}
