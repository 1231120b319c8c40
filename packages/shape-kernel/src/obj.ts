/**
 * Wavefront OBJ text export and import.
 *
 * Export layout:
 *   # comments
 *   mtllib / usemtl        (with a material)
 *   v x y z                (buffer order, 6 decimals)
 *   vt u v                 (with a material)
 *   vn x y z               (with normals)
 *   f a b c                a/t, a//n or a/t/n by what is present; 1-based
 *
 * Import reads v, vt, vn, f (any of the four index forms, negative
 * indices relative to the end, polygons fanned into triangles) and
 * mtllib / usemtl. Everything else (o, g, s, ...) is skipped.
 */

import { ConfigError, ShapeError } from './errors.js';
import type { MeshBuffer } from './mesh.js';
import type { MaterialRef } from './options.js';

export interface OBJExportOptions {
  material?: MaterialRef;
  /** One line each, written after '# '. */
  comments?: readonly string[];
}

export interface ParsedOBJ {
  vertices: Float64Array;
  uvs: Float64Array;
  normals: Float64Array;
  /** Vertex index triples, 0-based. */
  faces: Uint32Array;
  /** Present when every face carries texture indices. */
  uvFaces: Uint32Array | null;
  /** Present when every face carries normal indices. */
  normalFaces: Uint32Array | null;
  materialLibrary: string | null;
  material: string | null;
  comments: string[];
}

const DECIMALS = 6;

function fmt(x: number): string {
  return x.toFixed(DECIMALS);
}

// ─── Export ─────────────────────────────────────────────────────

export function exportOBJ(mesh: MeshBuffer, opts: OBJExportOptions = {}): string {
  const { vertices, faces, uvs, uvFaces, normals } = mesh;
  if (faces.length !== mesh.faceCount * 3) {
    throw new Error(
      `Mesh data inconsistent: faces.length (${faces.length}) !== faceCount * 3 (${mesh.faceCount * 3})`,
    );
  }
  const textured = opts.material !== undefined;
  if (textured && (!uvs || !uvFaces)) {
    throw new ConfigError('exportOBJ: a material needs texture coordinates; build the mesh with uvs: true');
  }

  const lines: string[] = [];
  for (const c of opts.comments ?? []) lines.push(`# ${c}`);
  if (opts.material) {
    lines.push(`mtllib ${opts.material.file}`);
    lines.push(`usemtl ${opts.material.name}`);
  }

  for (let i = 0; i < vertices.length; i += 3) {
    lines.push(`v ${fmt(vertices[i])} ${fmt(vertices[i + 1])} ${fmt(vertices[i + 2])}`);
  }
  if (textured && uvs) {
    for (let i = 0; i < uvs.length; i += 2) lines.push(`vt ${fmt(uvs[i])} ${fmt(uvs[i + 1])}`);
  }
  if (normals) {
    for (let i = 0; i < normals.length; i += 3) {
      lines.push(`vn ${fmt(normals[i])} ${fmt(normals[i + 1])} ${fmt(normals[i + 2])}`);
    }
  }

  const tex = textured ? uvFaces : undefined;
  for (let f = 0; f < faces.length; f += 3) {
    const corners: string[] = [];
    for (let k = 0; k < 3; k++) {
      const v = faces[f + k] + 1;
      const t = tex ? tex[f + k] + 1 : null;
      if (t !== null && normals) corners.push(`${v}/${t}/${v}`);
      else if (t !== null) corners.push(`${v}/${t}`);
      else if (normals) corners.push(`${v}//${v}`);
      else corners.push(`${v}`);
    }
    lines.push(`f ${corners.join(' ')}`);
  }

  return lines.join('\n') + '\n';
}

// ─── Import ─────────────────────────────────────────────────────

function parseNumbers(parts: string[], count: number, lineNo: number, what: string): number[] {
  if (parts.length < count) {
    throw new ShapeError(`OBJ line ${lineNo}: ${what} needs ${count} numbers, got ${parts.length}`);
  }
  return parts.slice(0, count).map((p) => {
    const x = Number(p);
    if (!Number.isFinite(x)) throw new ShapeError(`OBJ line ${lineNo}: "${p}" is not a number`);
    return x;
  });
}

/** Resolve a 1-based or negative OBJ index against `count` elements so far. */
function resolveIndex(token: string, count: number, lineNo: number): number {
  const i = Number(token);
  if (!Number.isInteger(i) || i === 0) {
    throw new ShapeError(`OBJ line ${lineNo}: bad index "${token}"`);
  }
  const resolved = i > 0 ? i - 1 : count + i;
  if (resolved < 0 || resolved >= count) {
    throw new ShapeError(`OBJ line ${lineNo}: index ${i} out of range (${count} defined)`);
  }
  return resolved;
}

export function parseOBJ(text: string): ParsedOBJ {
  const vertices: number[] = [];
  const uvs: number[] = [];
  const normals: number[] = [];
  const faces: number[] = [];
  const uvFaces: number[] = [];
  const normalFaces: number[] = [];
  const comments: string[] = [];
  let allTextured = true;
  let allNormals = true;
  let materialLibrary: string | null = null;
  let material: string | null = null;

  const lines = text.split(/\r?\n/);
  for (const [idx, raw] of lines.entries()) {
    const lineNo = idx + 1;
    const line = raw.trim();
    if (line === '') continue;
    if (line.startsWith('#')) {
      comments.push(line.slice(1).trim());
      continue;
    }
    const [keyword, ...parts] = line.split(/\s+/);
    switch (keyword) {
      case 'v':
        vertices.push(...parseNumbers(parts, 3, lineNo, 'v'));
        break;
      case 'vt':
        uvs.push(...parseNumbers(parts, 2, lineNo, 'vt'));
        break;
      case 'vn':
        normals.push(...parseNumbers(parts, 3, lineNo, 'vn'));
        break;
      case 'mtllib':
        materialLibrary = parts.join(' ');
        break;
      case 'usemtl':
        material = parts.join(' ');
        break;
      case 'f': {
        if (parts.length < 3) {
          throw new ShapeError(`OBJ line ${lineNo}: a face needs at least 3 corners, got ${parts.length}`);
        }
        const corners = parts.map((token) => {
          const [v, t, n] = token.split('/');
          return {
            v: resolveIndex(v, vertices.length / 3, lineNo),
            t: t ? resolveIndex(t, uvs.length / 2, lineNo) : null,
            n: n ? resolveIndex(n, normals.length / 3, lineNo) : null,
          };
        });
        // Fan: (0, k, k+1)
        for (let k = 1; k + 1 < corners.length; k++) {
          for (const c of [corners[0], corners[k], corners[k + 1]]) {
            faces.push(c.v);
            if (c.t === null) allTextured = false;
            else uvFaces.push(c.t);
            if (c.n === null) allNormals = false;
            else normalFaces.push(c.n);
          }
        }
        break;
      }
      default:
        break;
    }
  }

  const hasFaces = faces.length > 0;
  return {
    vertices: Float64Array.from(vertices),
    uvs: Float64Array.from(uvs),
    normals: Float64Array.from(normals),
    faces: Uint32Array.from(faces),
    uvFaces: hasFaces && allTextured ? Uint32Array.from(uvFaces) : null,
    normalFaces: hasFaces && allNormals ? Uint32Array.from(normalFaces) : null,
    materialLibrary,
    material,
    comments,
  };
}
