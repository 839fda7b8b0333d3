// BiVector4 - oriented plane in 4D, one coefficient per basis plane.
//
// Rotations in 4D happen in planes rather than around axes, so camera angles
// are expressed as (angle, plane) pairs. The named constants are the unit
// planes the fly camera turns in; ZX is -XZ and ZY is -YZ.

export class BiVector4 {
  constructor(
    readonly xy: number,
    readonly xz: number,
    readonly xw: number,
    readonly yz: number,
    readonly yw: number,
    readonly zw: number,
  ) {}

  static readonly XW = new BiVector4(0, 0, 1, 0, 0, 0);
  static readonly ZW = new BiVector4(0, 0, 0, 0, 0, 1);
  static readonly ZX = new BiVector4(0, -1, 0, 0, 0, 0);
  static readonly ZY = new BiVector4(0, 0, 0, -1, 0, 0);

  scale(s: number): BiVector4 {
    return new BiVector4(this.xy * s, this.xz * s, this.xw * s, this.yz * s, this.yw * s, this.zw * s);
  }

  negate(): BiVector4 {
    return this.scale(-1);
  }

  squaredLength(): number {
    return (
      this.xy * this.xy +
      this.xz * this.xz +
      this.xw * this.xw +
      this.yz * this.yz +
      this.yw * this.yw +
      this.zw * this.zw
    );
  }
}
