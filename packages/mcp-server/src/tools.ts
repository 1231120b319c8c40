/**
 * MCP Tool Registrations — 12 tools wrapping the shape kernel.
 *
 * Every model tool returns JSON with { model_id, shape, readback } so the
 * LLM always knows the current state after every operation.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { SHAPE_NAMES } from '@stimshape/shape-kernel';
import * as h from './handlers.js';

function text(result: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(result) }] };
}

export function registerTools(server: McpServer): void {

  // ─── Models (4) ─────────────────────────────────────────────

  server.tool(
    'create_model',
    `Create a base shape on a parametric grid. Shapes: ${SHAPE_NAMES.join(', ')}. ` +
    'All shapes are Y-up. Pass only the options that apply to the shape.',
    h.createModelParams,
    async (params) => text(h.createModel(params))
  );

  server.tool(
    'get_model',
    'Get the readback of a model: grid size, parameters, perturbations, bounds.',
    h.modelParams,
    async (params) => text(h.getModel(params))
  );

  server.tool(
    'list_models',
    'List all models with their readbacks.',
    {},
    async () => text(h.listModels())
  );

  server.tool(
    'delete_model',
    'Delete a model from the registry.',
    h.modelParams,
    async (params) => text(h.deleteModel(params))
  );

  // ─── Perturbations (6) ──────────────────────────────────────

  server.tool(
    'add_sine',
    'Add a sum of plane-wave carriers, optionally multiplied by modulators, to a model. ' +
    'Frequencies are in cycles per full turn on angular axes, per unit length on planes.',
    h.addSineParams,
    async (params) => text(h.addSine(params))
  );

  server.tool(
    'add_noise',
    'Add band-pass filtered noise (log-Gaussian in frequency, Gaussian in orientation) to a model.',
    h.addNoiseParams,
    async (params) => text(h.addNoise(params))
  );

  server.tool(
    'add_bumps',
    'Add Gaussian bumps at random centers. Fails if min_distance cannot be honored for every bump.',
    h.addBumpsParams,
    async (params) => text(h.addBumps(params))
  );

  server.tool(
    'add_custom_matrix',
    'Add a height map given as a numeric matrix, resampled onto the model grid.',
    h.addCustomMatrixParams,
    async (params) => text(h.addCustomMatrix(params))
  );

  server.tool(
    'add_custom_image',
    'Add a height map read from an image file (brightness becomes height).',
    h.addCustomImageParams,
    async (params) => text(await h.addCustomImage(params))
  );

  server.tool(
    'set_perturbation_enabled',
    'Turn one perturbation on or off. The surface is recomputed from the enabled perturbations only.',
    h.setPerturbationEnabledParams,
    async (params) => text(h.setPerturbationEnabled(params))
  );

  // ─── Export (2) ─────────────────────────────────────────────

  server.tool(
    'export_obj',
    'Export a model as a Wavefront OBJ file. A material also writes texture coordinates.',
    h.exportObjParams,
    async (params) => text(h.exportObj(params))
  );

  server.tool(
    'batch_export',
    'Export several models as OBJ files in one call.',
    h.batchExportParams,
    async (params) => text(await h.batchExport(params))
  );
}
