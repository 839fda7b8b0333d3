// Rotor4 - scalar + bivector rotor for rotations within a single 4D plane.
//
// Rotors built from one plane (fromAnglePlane) are exact. Products of rotors
// in different planes can pick up a pseudoscalar part this type does not
// carry, so orientations are composed as matrices instead (see toMat4).

import { mat4, vec4 } from "gl-matrix";
import type { ReadonlyVec4 } from "gl-matrix";
import type { BiVector4 } from "./BiVector4";

export class Rotor4 {
  constructor(readonly s: number, readonly bv: BiVector4) {}

  /** Rotation by `angle` radians in `plane`. */
  static fromAnglePlane(angle: number, plane: BiVector4): Rotor4 {
    const half = angle * 0.5;
    return new Rotor4(Math.cos(half), plane.scale(-Math.sin(half))).normalize();
  }

  squaredLength(): number {
    return this.s * this.s + this.bv.squaredLength();
  }

  length(): number {
    return Math.sqrt(this.squaredLength());
  }

  normalize(): Rotor4 {
    const inv = 1 / this.length();
    return new Rotor4(this.s * inv, this.bv.scale(inv));
  }

  /** Reverse rotor: undoes this rotation. */
  reverse(): Rotor4 {
    return new Rotor4(this.s, this.bv.negate());
  }

  /** Sandwich product R v R~. */
  rotateVec(out: vec4, v: ReadonlyVec4): vec4 {
    const { s } = this;
    const { xy, xz, xw, yz, yw, zw } = this.bv;
    const vx = v[0], vy = v[1], vz = v[2], vw = v[3];

    // R v: vector part
    const x = s * vx + xy * vy + xz * vz + xw * vw;
    const y = s * vy - xy * vx + yz * vz + yw * vw;
    const z = s * vz - xz * vx - yz * vy + zw * vw;
    const w = s * vw - xw * vx - yw * vy - zw * vz;

    // R v: trivector part
    const xyz = xy * vz - xz * vy + yz * vx;
    const yzw = yz * vw - yw * vz + zw * vy;
    const zwx = xz * vw - xw * vz + zw * vx;
    const wxy = xy * vw - xw * vy + yw * vx;

    // (R v) R~, where R~ has the bivector negated
    const p = this.reverse();
    const ps = p.s;
    const q = p.bv;
    return vec4.set(
      out,
      x * ps - y * q.xy - z * q.xz - w * q.xw - xyz * q.yz - wxy * q.yw - zwx * q.zw,
      y * ps + x * q.xy - z * q.yz - w * q.yw + xyz * q.xz + wxy * q.xw - yzw * q.zw,
      z * ps + x * q.xz + y * q.yz - w * q.zw - xyz * q.xy + zwx * q.xw + yzw * q.yw,
      w * ps + x * q.xw + y * q.yw + z * q.zw - wxy * q.xy - zwx * q.xz - yzw * q.yz,
    );
  }

  /** Column-major matrix whose columns are the rotated basis vectors. */
  toMat4(out: mat4): mat4 {
    const column = vec4.create();
    const basis = vec4.create();
    for (let i = 0; i < 4; i++) {
      vec4.set(basis, 0, 0, 0, 0);
      basis[i] = 1;
      this.rotateVec(column, basis);
      for (let j = 0; j < 4; j++) {
        out[i * 4 + j] = column[j];
      }
    }
    return out;
  }
}
