/**
 * Mesh Registry — in-memory named mesh store.
 *
 * Every mutating MCP tool stores its result here and returns
 * a structured readback so the LLM always knows the current state.
 */

import { inspectMesh, type SurfaceMesh, type BoundingBox } from '@function-mesh/kernel';

export interface MeshEntry {
  id: string;
  mesh: SurfaceMesh;
  /** How the mesh was made: 'flat', 'extruded' or 'surface'. */
  type: string;
  layerCount: number;
  profileRingLength: number;
}

export interface MeshReadback {
  vertex_count: number;
  triangle_count: number;
  layer_count: number;
  profile_ring_length: number;
  bounds: BoundingBox;
  closed: boolean;
  euler_characteristic: number;
  signed_volume: number;
}

export interface MeshResult {
  mesh_id: string;
  type: string;
  readback: MeshReadback;
}

export type NewMesh = Omit<MeshEntry, 'id'>;

const NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

let nextId = 1;

const meshes = new Map<string, MeshEntry>();

function readback(entry: MeshEntry): MeshReadback {
  const report = inspectMesh(entry.mesh);
  return {
    vertex_count: entry.mesh.vertexCount,
    triangle_count: entry.mesh.triangleCount,
    layer_count: entry.layerCount,
    profile_ring_length: entry.profileRingLength,
    bounds: entry.mesh.bounds,
    closed: report.closed,
    euler_characteristic: report.eulerCharacteristic,
    signed_volume: report.signedVolume,
  };
}

function toResult(entry: MeshEntry): MeshResult {
  return { mesh_id: entry.id, type: entry.type, readback: readback(entry) };
}

/** Store a mesh and return its ID + readback. A named mesh overwrites its namesake. */
export function create(mesh: NewMesh, name?: string): MeshResult {
  if (name !== undefined && !NAME_PATTERN.test(name)) {
    throw new Error(
      `Invalid mesh name "${name}". Use only letters, digits, hyphens, underscores.`
    );
  }
  let id = name ?? `mesh_${nextId++}`;
  while (name === undefined && meshes.has(id)) {
    // Auto-generated collision with a user-chosen name — bump
    id = `mesh_${nextId++}`;
  }
  const entry: MeshEntry = { id, ...mesh };
  meshes.set(id, entry);
  return toResult(entry);
}

/** Retrieve a mesh or throw a clear error. */
export function get(id: string): MeshEntry {
  const entry = meshes.get(id);
  if (!entry) {
    const available = [...meshes.keys()];
    throw new Error(
      `Mesh "${id}" not found. Available meshes: [${available.join(', ')}]`
    );
  }
  return entry;
}

/** Readback of one stored mesh. */
export function describe(id: string): MeshResult {
  return toResult(get(id));
}

/** Swap the buffers of an existing mesh, keeping its id and metadata. */
export function replace(id: string, mesh: SurfaceMesh): MeshResult {
  const entry = { ...get(id), mesh };
  meshes.set(id, entry);
  return toResult(entry);
}

export function remove(id: string): void {
  if (!meshes.has(id)) {
    throw new Error(`Mesh "${id}" not found — cannot delete.`);
  }
  meshes.delete(id);
}

export function has(id: string): boolean {
  return meshes.has(id);
}

export function list(): MeshResult[] {
  return [...meshes.values()].map(toResult);
}

/** Clear all meshes (for testing). */
export function clear(): void {
  meshes.clear();
  nextId = 1;
}
