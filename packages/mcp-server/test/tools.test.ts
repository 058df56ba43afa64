/**
 * Tool round trips through a real MCP client, linked to the server
 * in-process.
 */

import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { createServer } from '../src/server.js';
import * as registry from '../src/registry.js';

const client = new Client({ name: 'function-mesh-test', version: '0.0.0' });
let exportRoot = '';

async function call(name: string, args: Record<string, unknown> = {}) {
  const raw = await client.callTool({ name, arguments: args });
  const result = CallToolResultSchema.parse(raw);
  const first = result.content[0];
  if (first === undefined || first.type !== 'text') {
    throw new Error(`${name} returned no text content`);
  }
  return { isError: result.isError ?? false, text: first.text };
}

async function json(name: string, args: Record<string, unknown> = {}): Promise<unknown> {
  const { isError, text } = await call(name, args);
  if (isError) throw new Error(`${name} failed: ${text}`);
  return JSON.parse(text);
}

// Square cross-section extruded to a 2 × 2 × 2 box
const BOX = { profile: { kind: 'constant' }, profile_vertices: 3, extrude: 2 };

beforeAll(async () => {
  exportRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'function-mesh-test-'));
  process.env.FUNCTION_MESH_EXPORT_DIR = exportRoot;
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await createServer().connect(serverTransport);
  await client.connect(clientTransport);
});

afterAll(async () => {
  await client.close();
  delete process.env.FUNCTION_MESH_EXPORT_DIR;
  fs.rmSync(exportRoot, { recursive: true, force: true });
});

beforeEach(() => registry.clear());

describe('tool listing', () => {
  it('exposes the seven tools', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      'create_function_mesh',
      'delete_mesh',
      'export_mesh',
      'get_mesh',
      'list_meshes',
      'recompute_normals',
      'sample_ring',
    ]);
  });
});

describe('sample_ring', () => {
  it('returns the mirrored square outline', async () => {
    const result = await json('sample_ring', {
      function: { kind: 'constant' },
      vertices: 3,
      mirror: true,
    });
    expect(result).toMatchObject({
      type: 'ring',
      point_count: 6,
      upper_length: 3,
      max_y: 1,
      points: [[-1, 1], [0, 1], [1, 1], [1, -1], [0, -1], [-1, -1]],
    });
  });

  it('greedy and queued agree', async () => {
    const args = { function: { kind: 'sine', amplitude: 0.5, frequency: 3 }, x_start: -2, x_end: 2, vertices: 40 };
    const greedy = await json('sample_ring', { ...args, refinement: 'greedy' });
    const queued = await json('sample_ring', { ...args, refinement: 'queued' });
    expect(queued).toMatchObject({ points: expect.any(Array) });
    expect(greedy).toMatchObject({ point_count: 40 });
    expect(JSON.stringify(greedy).replace(/"computed_in_ms":\d+/, ''))
      .toBe(JSON.stringify(queued).replace(/"computed_in_ms":\d+/, ''));
  });

  it('reports a degenerate domain as a tool error', async () => {
    const { isError, text } = await call('sample_ring', { function: { kind: 'constant' }, x_start: 1, x_end: 1 });
    expect(isError).toBe(true);
    expect(text).toMatch(/Invalid curve domain \[1, 1\]/);
  });
});

describe('create_function_mesh', () => {
  it('builds and stores a closed box', async () => {
    const result = await json('create_function_mesh', { ...BOX, name: 'box' });
    expect(result).toMatchObject({
      mesh_id: 'box',
      type: 'extruded',
      readback: {
        vertex_count: 14,
        triangle_count: 24,
        layer_count: 2,
        profile_ring_length: 6,
        bounds: { min: [-1, -1, -1], max: [1, 1, 1] },
        closed: true,
        euler_characteristic: 2,
        signed_volume: expect.closeTo(8, 5),
      },
    });
    expect(registry.has('box')).toBe(true);
  });

  it('without a height gives a flat polygon', async () => {
    const result = await json('create_function_mesh', { profile: { kind: 'circle' }, profile_vertices: 20 });
    expect(result).toMatchObject({
      mesh_id: 'mesh_1',
      type: 'flat',
      readback: { vertex_count: 40, triangle_count: 38, layer_count: 1, closed: false },
    });
  });

  it('with a height curve gives a closed surface', async () => {
    const result = await json('create_function_mesh', {
      profile: { kind: 'circle' },
      profile_vertices: 12,
      height: { kind: 'circle' },
      height_vertices: 12,
    });
    expect(result).toMatchObject({
      type: 'surface',
      readback: { layer_count: 10, closed: true, euler_characteristic: 2 },
    });
  });

  it('refuses height and extrude together', async () => {
    const { isError, text } = await call('create_function_mesh', { ...BOX, height: { kind: 'circle' } });
    expect(isError).toBe(true);
    expect(text).toMatch(/either height or extrude/);
    expect(registry.list()).toEqual([]);
  });

  it('surfaces kernel validation errors', async () => {
    const { isError, text } = await call('create_function_mesh', {
      profile: { kind: 'constant' },
      profile_x_start: 2,
      profile_x_end: 1,
    });
    expect(isError).toBe(true);
    expect(text).toMatch(/Invalid profile domain \[2, 1\]/);
  });
});

describe('registry tools', () => {
  it('get, list and delete', async () => {
    await json('create_function_mesh', { ...BOX, name: 'a' });
    await json('create_function_mesh', { ...BOX, name: 'b' });

    expect(await json('get_mesh', { mesh: 'a' })).toMatchObject({ mesh_id: 'a', type: 'extruded' });
    expect(await json('list_meshes')).toMatchObject({ meshes: [{ mesh_id: 'a' }, { mesh_id: 'b' }] });
    expect(await json('delete_mesh', { mesh: 'a' })).toEqual({ deleted: 'a', remaining: ['b'] });

    const missing = await call('get_mesh', { mesh: 'a' });
    expect(missing.isError).toBe(true);
    expect(missing.text).toMatch(/Mesh "a" not found\. Available meshes: \[b\]/);
  });

  it('recompute_normals keeps the mesh id', async () => {
    await json('create_function_mesh', { ...BOX, name: 'box' });
    const before = registry.get('box').mesh;
    const result = await json('recompute_normals', { mesh: 'box' });
    expect(result).toMatchObject({ mesh_id: 'box', readback: { triangle_count: 24 } });
    expect(registry.get('box').mesh.normals).not.toBe(before.normals);
    expect(registry.get('box').mesh.positions).toBe(before.positions);
  });
});

describe('export_mesh', () => {
  it('writes binary STL into the export directory', async () => {
    await json('create_function_mesh', { ...BOX, name: 'box' });
    const result = await json('export_mesh', { mesh: 'box', filename: 'box.stl' });
    const filePath = path.join(exportRoot, 'box.stl');
    expect(result).toMatchObject({
      mesh_id: 'box',
      type: 'stl_export',
      file_path: filePath,
      file_size_bytes: 84 + 24 * 50,
      triangle_count: 24,
    });
    expect(fs.statSync(filePath).size).toBe(84 + 24 * 50);
  });

  it('sanitizes the filename', async () => {
    await json('create_function_mesh', { ...BOX, name: 'box' });
    const result = await json('export_mesh', { mesh: 'box', filename: '../up/box.stl' });
    expect(result).toMatchObject({ file_path: path.join(exportRoot, '.._up_box.stl') });
  });
});
