/**
 * Shape registry — one builder per shape name.
 */

import { parseWith } from '../components.js';
import {
  assertShapeName,
  cylinderOptionsSchema, diskOptionsSchema, extrusionOptionsSchema, planeOptionsSchema,
  revolutionOptionsSchema, sphereOptionsSchema, torusOptionsSchema, wormOptionsSchema,
  type ShapeName, type ShapeOptions,
} from '../options.js';
import type { ShapeGrid } from './base.js';
import { DiskGrid } from './disk.js';
import { PlaneGrid } from './plane.js';
import { SphereGrid } from './sphere.js';
import { TorusGrid } from './torus.js';
import { TubeGrid } from './tube.js';

export { ShapeGrid, type UvScheme } from './base.js';
export { SphereGrid, PlaneGrid, DiskGrid, TorusGrid, TubeGrid };

/** Validate options for `kind` and build its grid. */
export function createShape<K extends ShapeName>(kind: K, options?: ShapeOptions[K]): ShapeGrid;
export function createShape(kind: string, options?: unknown): ShapeGrid;
export function createShape(kind: string, options: unknown = {}): ShapeGrid {
  const name = assertShapeName(kind);
  switch (name) {
    case 'sphere':
      return new SphereGrid(parseWith(sphereOptionsSchema, options, name));
    case 'plane':
      return new PlaneGrid(parseWith(planeOptionsSchema, options, name));
    case 'disk':
      return new DiskGrid(parseWith(diskOptionsSchema, options, name));
    case 'torus':
      return new TorusGrid(parseWith(torusOptionsSchema, options, name));
    case 'cylinder':
      return new TubeGrid(name, parseWith(cylinderOptionsSchema, options, name));
    case 'revolution':
      return new TubeGrid(name, parseWith(revolutionOptionsSchema, options, name));
    case 'extrusion':
      return new TubeGrid(name, parseWith(extrusionOptionsSchema, options, name));
    case 'worm':
      return new TubeGrid(name, parseWith(wormOptionsSchema, options, name));
  }
}
