// FlyCamera - free-flying 4D camera driven by four plane angles and the keyboard.
//
// Orientation = Yaw(ZX) * Pitch(ZY) * Yaw4(XW) * Pitch4(ZW). A camera-space
// vector is rotated by Pitch4 first and by Yaw last, so yaw always turns
// around the world's vertical.

import { mat4, vec4 } from "gl-matrix";
import type { Camera } from "./Camera";
import { BiVector4 } from "./BiVector4";
import { Rotor4 } from "./Rotor4";

const TAU = Math.PI * 2;

export const MOVE_SPEED = 3.0;
export const ROTATION_SPEED = (90 * Math.PI / 180) * 1.5;

/** Keys currently held, by KeyboardEvent.key, plus the Shift modifier. */
export interface FlyInput {
  keys: ReadonlySet<string>;
  shift: boolean;
}

export class FlyCamera {
  position = vec4.fromValues(0, 1, -3, 0);
  pitch = 0;
  yaw = 0;
  pitch4 = 0;
  yaw4 = 0;
  fov = Math.PI / 2;
  minDistance = 0.01;
  maxDistance = 1000;
  bounceCount = 5;
  sampleCount = 1;

  private _keys = new Set<string>();
  private _shift = false;

  /** Bind keyboard listeners; held keys are applied in update(). */
  attach(target: Window): void {
    target.addEventListener("keydown", (e) => {
      this._keys.add(e.key.length === 1 ? e.key.toLowerCase() : e.key);
      this._shift = e.shiftKey;
    });
    target.addEventListener("keyup", (e) => {
      this._keys.delete(e.key.length === 1 ? e.key.toLowerCase() : e.key);
      this._shift = e.shiftKey;
    });
    target.addEventListener("blur", () => {
      this._keys.clear();
      this._shift = false;
    });
  }

  /** Advance by `dt` seconds using the attached keyboard state. */
  update(dt: number): void {
    this.applyInput({ keys: this._keys, shift: this._shift }, dt);
  }

  applyInput(input: FlyInput, dt: number): void {
    const { forward, right, up } = this.basis();
    const step = MOVE_SPEED * dt;
    const turn = ROTATION_SPEED * dt;
    const held = (key: string) => input.keys.has(key);

    if (held("w")) vec4.scaleAndAdd(this.position, this.position, forward, step);
    if (held("s")) vec4.scaleAndAdd(this.position, this.position, forward, -step);
    if (held("d")) vec4.scaleAndAdd(this.position, this.position, right, step);
    if (held("a")) vec4.scaleAndAdd(this.position, this.position, right, -step);
    if (held("e")) vec4.scaleAndAdd(this.position, this.position, up, step);
    if (held("q")) vec4.scaleAndAdd(this.position, this.position, up, -step);

    if (input.shift) {
      if (held("ArrowUp")) this.pitch4 = wrapAngle(this.pitch4 + turn);
      if (held("ArrowDown")) this.pitch4 = wrapAngle(this.pitch4 - turn);
      if (held("ArrowRight")) this.yaw4 = wrapAngle(this.yaw4 + turn);
      if (held("ArrowLeft")) this.yaw4 = wrapAngle(this.yaw4 - turn);
    } else {
      if (held("ArrowUp")) this.pitch = wrapAngle(this.pitch + turn);
      if (held("ArrowDown")) this.pitch = wrapAngle(this.pitch - turn);
      if (held("ArrowRight")) this.yaw = wrapAngle(this.yaw + turn);
      if (held("ArrowLeft")) this.yaw = wrapAngle(this.yaw - turn);
    }
  }

  /** Camera-to-world rotation. */
  orientation(out: mat4): mat4 {
    const step = mat4.create();
    Rotor4.fromAnglePlane(this.yaw, BiVector4.ZX).toMat4(out);
    mat4.multiply(out, out, Rotor4.fromAnglePlane(this.pitch, BiVector4.ZY).toMat4(step));
    mat4.multiply(out, out, Rotor4.fromAnglePlane(this.yaw4, BiVector4.XW).toMat4(step));
    mat4.multiply(out, out, Rotor4.fromAnglePlane(this.pitch4, BiVector4.ZW).toMat4(step));
    return out;
  }

  /** World-space forward (+z), right (+x) and up (+y). */
  basis(): { forward: vec4; right: vec4; up: vec4 } {
    const m = this.orientation(mat4.create());
    return {
      forward: vec4.transformMat4(vec4.create(), [0, 0, 1, 0], m),
      right: vec4.transformMat4(vec4.create(), [1, 0, 0, 0], m),
      up: vec4.transformMat4(vec4.create(), [0, 1, 0, 0], m),
    };
  }

  /** Snapshot of the current state as the renderer's camera record. */
  toCamera(): Camera {
    const { forward, right, up } = this.basis();
    return {
      position: vec4.clone(this.position),
      forward,
      right,
      up,
      fov: this.fov,
      minDistance: this.minDistance,
      maxDistance: this.maxDistance,
      bounceCount: this.bounceCount,
      sampleCount: this.sampleCount,
    };
  }
}

/** Maps any angle into [0, 2π). */
export function wrapAngle(angle: number): number {
  return ((angle % TAU) + TAU) % TAU;
}
