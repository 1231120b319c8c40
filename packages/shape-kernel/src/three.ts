/**
 * three.js adapter — MeshBuffer to BufferGeometry for viewers.
 *
 * Without seam UVs the geometry is indexed and shares vertices. Seam
 * UVs give some vertices two texture coordinates, so that geometry is
 * expanded to one vertex per face corner.
 */

import { BufferAttribute, BufferGeometry, Float32BufferAttribute } from 'three';
import type { MeshBuffer } from './mesh.js';

export function toBufferGeometry(mesh: MeshBuffer): BufferGeometry {
  const geometry = new BufferGeometry();
  const { vertices, faces, normals, uvs, uvFaces } = mesh;

  if (uvs && uvFaces && uvFaces !== faces) {
    const corners = faces.length;
    const position = new Float32Array(corners * 3);
    const uv = new Float32Array(corners * 2);
    const normal = normals ? new Float32Array(corners * 3) : null;
    for (let c = 0; c < corners; c++) {
      const v = faces[c];
      const t = uvFaces[c];
      position.set(vertices.subarray(v * 3, v * 3 + 3), c * 3);
      uv.set(uvs.subarray(t * 2, t * 2 + 2), c * 2);
      if (normal && normals) normal.set(normals.subarray(v * 3, v * 3 + 3), c * 3);
    }
    geometry.setAttribute('position', new BufferAttribute(position, 3));
    geometry.setAttribute('uv', new BufferAttribute(uv, 2));
    if (normal) geometry.setAttribute('normal', new BufferAttribute(normal, 3));
  } else {
    geometry.setIndex(new BufferAttribute(Uint32Array.from(faces), 1));
    geometry.setAttribute('position', new Float32BufferAttribute(vertices, 3));
    if (normals) geometry.setAttribute('normal', new Float32BufferAttribute(normals, 3));
    if (uvs) geometry.setAttribute('uv', new Float32BufferAttribute(uvs, 2));
  }

  geometry.computeBoundingBox();
  return geometry;
}
