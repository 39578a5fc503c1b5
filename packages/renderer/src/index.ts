/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * @partview/renderer - WebGPU part viewer
 */

export { Viewer, autoGridSize, sameSphere, shouldAutoUpdate } from './viewer.js';
export type { ViewerCallbacks, ViewerConfig, FrameScheduler } from './viewer.js';
export { RenderContext } from './device.js';
export type { CanvasLike } from './device.js';
export { Renderer, viewDepth, originDistanceSq, sortBackToFront, createLightUniforms } from './renderer.js';
export type { RendererOptions, TransparentDraw } from './renderer.js';
export { SceneRegistry } from './scene.js';
export type { SceneRegistryOptions } from './scene.js';
export { PipelineFactory, pipelineKey } from './pipeline.js';
export type { PipelineKind, PipelineRequest, PipelineSlot } from './pipeline.js';
export { OrbitCamera, wrapAngle, orbitOffset, computeCameraMatrices } from './camera.js';
export {
  createOptionsStore,
  subscribeOptions,
  diffOptions,
  normalizeOptions,
  DEFAULT_LIGHT_OPTIONS,
  DEFAULT_DARK_OPTIONS,
} from './options.js';
export type { ViewerOptions, UpdateTrigger, OptionsState, OptionsStore } from './options.js';
export { toRenderSettings, planSettingsUpdate, lightDirection, isGridTransparent } from './settings.js';
export { CanvasTextRasterizer } from './text-rasterizer.js';
export type { TextRasterizer, TextLabel, TextTexture } from './text-rasterizer.js';
export { FrameTimer } from './frame-timer.js';
export { MathUtils } from './math.js';
export { DeviceInitError, SceneError } from './errors.js';
export { createLogger } from './logger.js';
export type { Logger, LogContext } from './logger.js';
export * from './types.js';
