/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Orbit camera
 *
 * State is azimuth/polar/distance around a target. The camera matrix is
 * built from rotations in the active up-axis convention and cached until the
 * next mutation; the view matrix is its inverse.
 */

import type { Sphere } from '@partview/geometry';
import type { CameraMatrices, CardinalView, Mat4, OrbitState, Ray, Vec3 } from './types.js';
import type { OptionsStore, ViewerOptions } from './options.js';
import { MathUtils } from './math.js';
import { CAMERA_CONSTANTS } from './constants.js';

/**
 * Wrap an angle to [-π, π)
 */
export function wrapAngle(angle: number): number {
  if (!Number.isFinite(angle)) return 0;
  const tau = 2 * Math.PI;
  let a = angle;
  while (a < -Math.PI) a += tau;
  while (a >= Math.PI) a -= tau;
  return a;
}

/**
 * Camera position relative to the target
 */
export function orbitOffset(azimuth: number, polar: number, distance: number, zIsUp: boolean): Vec3 {
  const cp = Math.cos(polar);
  const sp = Math.sin(polar);
  const ca = Math.cos(azimuth);
  const sa = Math.sin(azimuth);
  return zIsUp
    ? { x: distance * cp * ca, y: -distance * cp * sa, z: distance * sp }
    : { x: -distance * cp * sa, y: distance * sp, z: distance * cp * ca };
}

/**
 * Camera (camera-to-world), view (world-to-camera) and position for an orbit
 * state. The camera looks down its local -Z axis.
 */
export function computeCameraMatrices(state: OrbitState, zIsUp: boolean): CameraMatrices {
  const { azimuthAngle: az, polarAngle: polar, distance, target } = state;

  const rotation = zIsUp
    ? MathUtils.chain(
        MathUtils.rotationZ(-az),
        MathUtils.rotationY(Math.PI / 2 - polar),
        MathUtils.rotationZ(Math.PI / 2)
      )
    : MathUtils.chain(MathUtils.rotationY(-az), MathUtils.rotationX(-polar));

  const camera = MathUtils.chain(
    MathUtils.translation(target.x, target.y, target.z),
    rotation,
    MathUtils.translation(0, 0, distance)
  );
  const view = MathUtils.invert(camera) ?? MathUtils.identity();
  const position = MathUtils.add(target, orbitOffset(az, polar, distance, zIsUp));

  return { camera, view, position };
}

/** [azimuth, polar] that put the camera on the named side of the target */
const CARDINAL_ANGLES_Y_UP: Record<CardinalView, [number, number]> = {
  '+X': [Math.PI / 2, 0],
  '-X': [-Math.PI / 2, 0],
  '+Y': [0, Math.PI / 2],
  '-Y': [0, -Math.PI / 2],
  '+Z': [0, 0],
  '-Z': [Math.PI, 0],
};

const CARDINAL_ANGLES_Z_UP: Record<CardinalView, [number, number]> = {
  '+X': [Math.PI / 2, 0],
  '-X': [-Math.PI / 2, 0],
  '+Y': [0, 0],
  '-Y': [Math.PI, 0],
  '+Z': [0, Math.PI / 2],
  '-Z': [0, -Math.PI / 2],
};

export class OrbitCamera {
  private azimuth = 0;
  private polar = 0;
  private dist = 0;
  private target: Vec3;

  private dirty = true;
  private cachedZIsUp = true;
  private matrices: CameraMatrices | null = null;

  constructor(private readonly store: OptionsStore, target: Vec3 = CAMERA_CONSTANTS.DEFAULT_TARGET) {
    this.target = { ...target };
    this.azimuthAngle = CAMERA_CONSTANTS.DEFAULT_AZIMUTH;
    this.polarAngle = CAMERA_CONSTANTS.DEFAULT_POLAR;
    this.distance = CAMERA_CONSTANTS.DEFAULT_DISTANCE;
  }

  private get options(): ViewerOptions {
    return this.store.getState().options;
  }

  // ==========================================================================
  // Orbit parameters
  // ==========================================================================

  get azimuthAngle(): number {
    return this.azimuth;
  }

  set azimuthAngle(value: number) {
    const o = this.options;
    this.azimuth = o.constrainAzimuth
      ? Math.min(o.maxAzimuth, Math.max(o.minAzimuth, value))
      : wrapAngle(value);
    this.dirty = true;
  }

  get polarAngle(): number {
    return this.polar;
  }

  set polarAngle(value: number) {
    const o = this.options;
    this.polar = o.constrainPolar ? Math.min(o.maxPolar, Math.max(o.minPolar, value)) : value;
    this.dirty = true;
  }

  get distance(): number {
    return this.dist;
  }

  set distance(value: number) {
    const o = this.options;
    this.dist = o.constrainDistance ? Math.min(o.maxDistance, Math.max(o.minDistance, value)) : value;
    this.dirty = true;
  }

  getTarget(): Vec3 {
    return { ...this.target };
  }

  setTarget(target: Vec3): void {
    this.target = { ...target };
    this.dirty = true;
  }

  getState(): OrbitState {
    return {
      azimuthAngle: this.azimuth,
      polarAngle: this.polar,
      distance: this.dist,
      target: this.getTarget(),
    };
  }

  // ==========================================================================
  // Controls
  // ==========================================================================

  /**
   * Rotate around the target. Deltas are scaled by orbitSensitivity.
   */
  orbit(deltaAzimuth: number, deltaPolar: number): void {
    const s = this.options.orbitSensitivity;
    this.azimuthAngle = this.azimuth + deltaAzimuth * s;
    this.polarAngle = this.polar + deltaPolar * s;
  }

  /**
   * Exponential zoom. Orthographic mode scales orthoSize instead of distance.
   */
  zoom(wheelDelta: number): void {
    const factor = 1 + wheelDelta * this.options.zoomSensitivity;
    if (this.options.isPerspective) {
      this.distance = this.dist * factor;
    } else {
      this.store.getState().setOptions({ orthoSize: this.options.orthoSize * factor });
    }
  }

  /**
   * Move the target in the screen plane; speed scales with distance.
   */
  panWithMouse(deltaX: number, deltaY: number, fast = false): void {
    const speed = this.panSpeed(fast);
    const camera = this.getCameraMatrix();
    const right = MathUtils.column(camera, 0);
    const up = MathUtils.column(camera, 1);

    let target = MathUtils.add(this.target, MathUtils.scale(right, -deltaX * speed));
    target = MathUtils.add(target, MathUtils.scale(up, deltaY * speed));
    this.setTarget(target);
  }

  /**
   * WASD-style movement; inputs are in -1..1.
   */
  panWithKeyboard(forward: number, right: number, up: number, fast = false): void {
    const speed = this.panSpeed(fast) * CAMERA_CONSTANTS.KEYBOARD_PAN_FACTOR;
    const camera = this.getCameraMatrix();

    let target = MathUtils.add(this.target, MathUtils.scale(MathUtils.column(camera, 0), right * speed));
    target = MathUtils.add(target, MathUtils.scale(MathUtils.column(camera, 1), up * speed));
    // Camera Z points back at the viewer
    target = MathUtils.add(target, MathUtils.scale(MathUtils.column(camera, 2), -forward * speed));
    this.setTarget(target);
  }

  private panSpeed(fast: boolean): number {
    const o = this.options;
    return o.panSensitivity * this.dist * (fast ? o.panSpeedMultiplier : 1);
  }

  /**
   * Frame a bounding sphere and fit the clip planes around it.
   */
  reset(sphere: Sphere): void {
    const o = this.options;
    this.setTarget(sphere.center);
    this.azimuthAngle = CAMERA_CONSTANTS.DEFAULT_AZIMUTH;
    this.polarAngle = CAMERA_CONSTANTS.DEFAULT_POLAR;

    const r = (1 + o.autoCameraSphereBuffer) * sphere.radius;
    this.distance = r / Math.sin((Math.PI * o.fov) / 360);

    this.store.getState().setOptions({
      zFar: this.dist + CAMERA_CONSTANTS.FAR_RADIUS_MULTIPLIER * r,
      zNear: Math.max(CAMERA_CONSTANTS.MIN_NEAR, CAMERA_CONSTANTS.NEAR_RADIUS_FACTOR * r),
    });
  }

  /**
   * Look at the target from one of the six axis directions.
   */
  setCardinalView(direction: CardinalView): void {
    const table = this.options.zIsUp ? CARDINAL_ANGLES_Z_UP : CARDINAL_ANGLES_Y_UP;
    const [azimuth, polar] = table[direction];
    this.azimuthAngle = azimuth;
    this.polarAngle = polar;
  }

  /**
   * Re-derive the angles after `zIsUp` has been toggled so the camera keeps
   * its world-space position. Call after the option changes.
   */
  swapCameraUp(): void {
    const zIsUp = this.options.zIsUp;
    // Offset as placed by the convention that was active before the toggle
    const p = orbitOffset(this.azimuth, this.polar, this.dist, !zIsUp);
    const d = MathUtils.length(p);
    if (d === 0) return;

    const clampUnit = (v: number) => Math.min(1, Math.max(-1, v));
    if (zIsUp) {
      this.polarAngle = Math.asin(clampUnit(p.z / d));
      this.azimuthAngle = Math.atan2(-p.y, p.x);
    } else {
      this.polarAngle = Math.asin(clampUnit(p.y / d));
      this.azimuthAngle = Math.atan2(-p.x, p.z);
    }
  }

  // ==========================================================================
  // Matrices
  // ==========================================================================

  private ensureMatrices(): CameraMatrices {
    const zIsUp = this.options.zIsUp;
    if (this.dirty || !this.matrices || this.cachedZIsUp !== zIsUp) {
      this.matrices = computeCameraMatrices(this.getState(), zIsUp);
      this.cachedZIsUp = zIsUp;
      this.dirty = false;
    }
    return this.matrices;
  }

  getCameraMatrix(): Mat4 {
    return this.ensureMatrices().camera;
  }

  getViewMatrix(): Mat4 {
    return this.ensureMatrices().view;
  }

  getPosition(): Vec3 {
    return { ...this.ensureMatrices().position };
  }

  createProjectionMatrix(width: number, height: number): Mat4 {
    const o = this.options;
    const aspect = width / height;
    if (o.isPerspective) {
      return MathUtils.perspective((Math.PI * o.fov) / 180, aspect, o.zNear, o.zFar);
    }
    return MathUtils.orthographic(o.orthoSize * 2 * aspect, o.orthoSize * 2, o.zNear, o.zFar);
  }

  /**
   * Ray from the camera through a canvas pixel (y down). A singular
   * view-projection falls back to the camera matrix.
   */
  createRayFromScreenPoint(x: number, y: number, width: number, height: number): Ray {
    const ndcX = (2 * x) / width - 1;
    const ndcY = 1 - (2 * y) / height;

    const viewProj = MathUtils.multiply(this.createProjectionMatrix(width, height), this.getViewMatrix());
    const inverse = MathUtils.invert(viewProj) ?? this.getCameraMatrix();

    const far = MathUtils.transformPoint(inverse, { x: ndcX, y: ndcY, z: 1 });
    const origin = this.getPosition();
    return { origin, direction: MathUtils.normalize(MathUtils.subtract(far, origin)) };
  }
}
