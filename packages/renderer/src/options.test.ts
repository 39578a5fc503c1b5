/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

import { describe, it, expect, vi, afterEach } from 'vitest';

import {
  createOptionsStore,
  diffOptions,
  normalizeOptions,
  subscribeOptions,
  DEFAULT_DARK_OPTIONS,
  DEFAULT_LIGHT_OPTIONS,
  OPTIONS_EPSILON,
  type ViewerOptions,
} from './options.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('normalizeOptions', () => {
  it('should clamp bounded fields', () => {
    const out = normalizeOptions({
      ...DEFAULT_LIGHT_OPTIONS,
      fov: 500,
      lineWidthX: -1,
      lineWidthY: 3,
      baseTransparency: 2,
      ambientLight: -0.5,
      coordinateThickness: -4,
    });
    expect(out.fov).toBe(120);
    expect(out.lineWidthX).toBe(0);
    expect(out.lineWidthY).toBe(1);
    expect(out.baseTransparency).toBe(1);
    expect(out.ambientLight).toBe(0);
    expect(out.coordinateThickness).toBe(0);
  });

  it('should snap the sample count to 1 or 4', () => {
    expect(normalizeOptions({ ...DEFAULT_LIGHT_OPTIONS, sampleCount: 1 }).sampleCount).toBe(1);
    expect(normalizeOptions({ ...DEFAULT_LIGHT_OPTIONS, sampleCount: 2 }).sampleCount).toBe(4);
    expect(normalizeOptions({ ...DEFAULT_LIGHT_OPTIONS, sampleCount: 0 }).sampleCount).toBe(1);
  });

  it('should keep the previous value for malformed colors', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const previous: ViewerOptions = { ...DEFAULT_LIGHT_OPTIONS, lineColor: '#123456' };
    const out = normalizeOptions({ ...previous, lineColor: 'red' }, previous);
    expect(out.lineColor).toBe('#123456');
    expect(warn).toHaveBeenCalledWith('[Options] setOptions Ignoring malformed color "red" for lineColor');
  });

  it('should keep the previous value for non-finite numbers', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const out = normalizeOptions({ ...DEFAULT_LIGHT_OPTIONS, gridSize: Number.NaN });
    expect(out.gridSize).toBe(DEFAULT_LIGHT_OPTIONS.gridSize);
  });

  it('should reject non-positive grid sizes', () => {
    const previous: ViewerOptions = { ...DEFAULT_LIGHT_OPTIONS, gridSize: 40 };
    expect(normalizeOptions({ ...previous, gridSize: 0 }, previous).gridSize).toBe(40);
  });
});

describe('diffOptions', () => {
  it('should list only the changed keys', () => {
    const next: ViewerOptions = { ...DEFAULT_LIGHT_OPTIONS, fov: 30, clearColor: '#000000' };
    expect(diffOptions(DEFAULT_LIGHT_OPTIONS, next)).toEqual(['fov', 'clearColor']);
  });

  it('should ignore numeric changes within the tolerance', () => {
    const next: ViewerOptions = { ...DEFAULT_LIGHT_OPTIONS, fov: DEFAULT_LIGHT_OPTIONS.fov + OPTIONS_EPSILON / 2 };
    expect(diffOptions(DEFAULT_LIGHT_OPTIONS, next)).toEqual([]);
  });

  it('should report flags and triggers', () => {
    const next: ViewerOptions = { ...DEFAULT_LIGHT_OPTIONS, zIsUp: false, autoResetCamera: 'never' };
    expect(diffOptions(DEFAULT_LIGHT_OPTIONS, next)).toEqual(['zIsUp', 'autoResetCamera']);
  });
});

describe('options store', () => {
  it('should start from the light defaults merged with overrides', () => {
    const store = createOptionsStore({ gridSize: 20 });
    expect(store.getState().options).toEqual({ ...DEFAULT_LIGHT_OPTIONS, gridSize: 20 });
  });

  it('should notify once per update with the changed keys', () => {
    const store = createOptionsStore();
    const listener = vi.fn();
    subscribeOptions(store, listener);

    store.getState().setOptions({ gridSize: 50, gridSpacing: 2 });

    expect(listener).toHaveBeenCalledTimes(1);
    const [changed, next, prev] = listener.mock.calls[0];
    expect(changed).toEqual(['gridSize', 'gridSpacing']);
    expect(next.gridSize).toBe(50);
    expect(prev.gridSize).toBe(100);
  });

  it('should not notify when nothing changed', () => {
    const store = createOptionsStore();
    const listener = vi.fn();
    subscribeOptions(store, listener);

    store.getState().setOptions({ gridSize: 100 });
    store.getState().setOptions({});

    expect(listener).not.toHaveBeenCalled();
  });

  it('should stop notifying after unsubscribe', () => {
    const store = createOptionsStore();
    const listener = vi.fn();
    const unsubscribe = subscribeOptions(store, listener);
    unsubscribe();

    store.getState().setOptions({ fov: 45 });
    expect(listener).not.toHaveBeenCalled();
  });

  it('should reset to the dark preset', () => {
    const store = createOptionsStore({ gridSize: 20 });
    store.getState().resetToDefault(true);
    expect(store.getState().options).toEqual(DEFAULT_DARK_OPTIONS);
    expect(store.getState().options.clearColor).toBe('#202020');
  });
});
