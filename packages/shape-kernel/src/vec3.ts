/** 3D vectors — plain tuples for readbacks, flat buffers for meshes. */
export type Vec3 = [number, number, number];

/** Axis-aligned bounding box. */
export interface BoundingBox { min: Vec3; max: Vec3; }

// ─── Flat buffer access (xyz triples) ─────────────────────────

export function writeVec3(buf: Float64Array, index: number, x: number, y: number, z: number): void {
  const o = index * 3;
  buf[o] = x;
  buf[o + 1] = y;
  buf[o + 2] = z;
}

/** Bounds of a flat xyz buffer. Empty buffers give a zero box. */
export function boundsOf(buf: ArrayLike<number>): BoundingBox {
  if (buf.length < 3) return { min: [0, 0, 0], max: [0, 0, 0] };
  const min: Vec3 = [Infinity, Infinity, Infinity];
  const max: Vec3 = [-Infinity, -Infinity, -Infinity];
  for (let i = 0; i < buf.length; i += 3) {
    for (let k = 0; k < 3; k++) {
      const c = buf[i + k];
      if (c < min[k]) min[k] = c;
      if (c > max[k]) max[k] = c;
    }
  }
  return { min, max };
}
