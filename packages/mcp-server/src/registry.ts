/**
 * Model Registry — in-memory named model store.
 *
 * Every mutating MCP tool works on a model stored here and returns a
 * structured readback so the caller always knows the current state.
 */

import type { Model, ModelReadback } from '@stimshape/shape-kernel';

export interface ModelEntry {
  id: string;
  model: Model;
}

export interface ModelResult {
  model_id: string;
  shape: string;
  readback: ModelReadback;
}

const NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

let nextId = 1;

const models = new Map<string, ModelEntry>();

function result(entry: ModelEntry): ModelResult {
  return { model_id: entry.id, shape: entry.model.kind, readback: entry.model.readback() };
}

/** Store a model and return its ID + readback. A named model replaces any model of that name. */
export function create(model: Model, name?: string): ModelResult {
  if (name !== undefined && !NAME_PATTERN.test(name)) {
    throw new Error(
      `Invalid model name "${name}". Use only letters, digits, hyphens, underscores.`
    );
  }
  let id = name ?? `model_${nextId++}`;
  // Auto-generated collision with a user-named model — bump
  while (!name && models.has(id)) id = `model_${nextId++}`;
  const entry = { id, model };
  models.set(id, entry);
  return result(entry);
}

/** Retrieve a model or throw a clear error. */
export function get(id: string): ModelEntry {
  const entry = models.get(id);
  if (!entry) {
    const available = [...models.keys()];
    throw new Error(
      `Model "${id}" not found. Available models: [${available.join(', ')}]`
    );
  }
  return entry;
}

/** Readback for a stored model. */
export function describe(id: string): ModelResult {
  return result(get(id));
}

export function remove(id: string): void {
  if (!models.has(id)) {
    throw new Error(`Model "${id}" not found — cannot delete.`);
  }
  models.delete(id);
}

export function has(id: string): boolean {
  return models.has(id);
}

export function list(): ModelResult[] {
  return [...models.values()].map(result);
}

/** Clear all models (for testing). */
export function clear(): void {
  models.clear();
  nextId = 1;
}
