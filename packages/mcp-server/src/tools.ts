/**
 * MCP Tool Registrations — 7 tools wrapping the function-mesh kernel.
 *
 * Mesh tools return JSON with { mesh_id, type, readback } so the LLM
 * always knows the current state after every operation.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import {
  functionMesh, sampleRing, recomputeNormals, exportSTL,
  greedyRefinement, queuedRefinement,
  type FunctionMeshOptions, type Refinement,
} from '@function-mesh/kernel';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { curveSchema, toCurveFunction } from './curves.js';
import { exportDir } from './config.js';
import * as registry from './registry.js';

const refinementSchema = z.enum(['greedy', 'queued']).default('greedy')
  .describe('greedy rescans every interval per insertion; queued keeps a priority queue (same result, faster for large budgets)');

const REFINEMENTS: Record<z.infer<typeof refinementSchema>, Refinement> = {
  greedy: greedyRefinement,
  queued: queuedRefinement,
};

const meshName = z.string().optional()
  .describe('Optional name for the mesh (letters, digits, hyphens, underscores only)');

function text(result: unknown) {
  return { content: [{ type: 'text' as const, text: JSON.stringify(result) }] };
}

export function registerTools(server: McpServer): void {

  // ─── Sampling (1) ─────────────────────────────────────────────

  server.tool(
    'sample_ring',
    'Adaptively sample a curve over [x_start, x_end]. Points concentrate where the slope changes fastest.',
    {
      function: curveSchema.describe('Curve to sample'),
      x_start: z.number().finite().default(-1).describe('Domain start'),
      x_end: z.number().finite().default(1).describe('Domain end, greater than x_start'),
      vertices: z.number().int().min(3).max(5000).default(18).describe('Sample budget'),
      mirror: z.boolean().default(false).describe('Append the mirrored lower half to close the outline'),
      refinement: refinementSchema,
    },
    async (params) => {
      const start = Date.now();
      const ring = sampleRing(toCurveFunction(params.function), params.x_start, params.x_end, params.vertices, {
        mirror: params.mirror,
        refinement: REFINEMENTS[params.refinement],
      });
      const elapsed = Date.now() - start;
      return text({
        type: 'ring',
        point_count: ring.points.length,
        upper_length: ring.upperLength,
        max_y: ring.maxY,
        points: ring.points.map((p) => [p.x, p.y]),
        computed_in_ms: elapsed,
      });
    }
  );

  // ─── Mesh generation (2) ──────────────────────────────────────

  server.tool(
    'create_function_mesh',
    'Generate a mesh from a profile curve (XZ cross-section) and an optional height curve or extrusion height (along Y). Without either, a flat polygon.',
    {
      profile: curveSchema.describe('Cross-section curve; f(x) is the half-width at x'),
      profile_x_start: z.number().finite().default(-1),
      profile_x_end: z.number().finite().default(1),
      profile_vertices: z.number().int().min(3).max(2000).default(18),
      mirror: z.boolean().default(true).describe('Mirror the profile into a closed outline'),
      height: curveSchema.optional().describe('Height curve; x is the layer height, f(x) its radial scale'),
      height_x_start: z.number().finite().default(-1),
      height_x_end: z.number().finite().default(1),
      height_vertices: z.number().int().min(3).max(2000).default(18),
      extrude: z.number().finite().min(0).optional().describe('Straight extrusion height, instead of a height curve'),
      extrusion_layers: z.number().int().min(2).max(2000).default(2).describe('Layers for an extrusion'),
      relative_height: z.number().min(0).max(1).optional()
        .describe('Vertical squash in [0, 1]. Default 1 with a height, 0 without'),
      uv_projection: z.enum(['planar', 'per-layer']).default('planar'),
      refinement: refinementSchema,
      name: meshName,
    },
    async (params) => {
      if (params.height !== undefined && params.extrude !== undefined) {
        throw new Error('Pass either height or extrude, not both.');
      }
      const options: FunctionMeshOptions = {
        profile: {
          f: toCurveFunction(params.profile),
          xStart: params.profile_x_start,
          xEnd: params.profile_x_end,
          vertices: params.profile_vertices,
          mirror: params.mirror,
        },
        height: params.height === undefined
          ? params.extrude
          : {
              f: toCurveFunction(params.height),
              xStart: params.height_x_start,
              xEnd: params.height_x_end,
              vertices: params.height_vertices,
            },
        extrusionLayers: params.extrusion_layers,
        relativeHeight: params.relative_height,
        uvProjection: params.uv_projection,
        refinement: REFINEMENTS[params.refinement],
      };

      const start = Date.now();
      const generated = functionMesh(options);
      const elapsed = Date.now() - start;

      const type = params.height !== undefined ? 'surface' : params.extrude !== undefined ? 'extruded' : 'flat';
      const result = registry.create({
        mesh: generated.mesh,
        type,
        layerCount: generated.layerCount,
        profileRingLength: generated.profileRing.points.length,
      }, params.name);
      return text({ ...result, computed_in_ms: elapsed });
    }
  );

  server.tool(
    'recompute_normals',
    'Replace a stored mesh\'s normals with area-weighted face normals averaged per vertex.',
    {
      mesh: z.string().describe('ID of the mesh'),
    },
    async (params) => {
      const entry = registry.get(params.mesh);
      return text(registry.replace(entry.id, recomputeNormals(entry.mesh)));
    }
  );

  // ─── Registry (3) ─────────────────────────────────────────────

  server.tool(
    'get_mesh',
    'Get the readback of a stored mesh.',
    {
      mesh: z.string().describe('ID of the mesh'),
    },
    async (params) => text(registry.describe(params.mesh))
  );

  server.tool(
    'list_meshes',
    'List all stored meshes with their readbacks.',
    {},
    async () => text({ meshes: registry.list() })
  );

  server.tool(
    'delete_mesh',
    'Remove a mesh from the registry.',
    {
      mesh: z.string().describe('ID of the mesh to delete'),
    },
    async (params) => {
      registry.remove(params.mesh);
      return text({ deleted: params.mesh, remaining: registry.list().map((m) => m.mesh_id) });
    }
  );

  // ─── Export (1) ───────────────────────────────────────────────

  server.tool(
    'export_mesh',
    'Export a stored mesh as binary STL into the export directory.',
    {
      mesh: z.string().describe('ID of the mesh to export'),
      filename: z.string().optional().describe('Output filename (defaults to <mesh>-<timestamp>.stl)'),
    },
    async (params) => {
      const entry = registry.get(params.mesh);
      const stlBuffer = exportSTL(entry.mesh);

      const dir = exportDir();
      fs.mkdirSync(dir, { recursive: true });
      const safeName = (params.filename ?? `${entry.id}-${Date.now()}.stl`).replace(/[^a-zA-Z0-9_.-]/g, '_');
      const filePath = path.join(dir, safeName);
      fs.writeFileSync(filePath, Buffer.from(stlBuffer));

      return text({
        mesh_id: entry.id,
        type: 'stl_export',
        file_path: filePath,
        file_size_bytes: stlBuffer.byteLength,
        triangle_count: entry.mesh.triangleCount,
        bounds: entry.mesh.bounds,
      });
    }
  );
}
