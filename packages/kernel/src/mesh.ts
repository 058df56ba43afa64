/**
 * Surface mesh — the buffers handed to whatever renders or exports them.
 *
 * Flat typed arrays, one entry per vertex:
 *   positions  xyz xyz ...
 *   normals    xyz xyz ...
 *   uvs        uv  uv  ...
 *   indices    triangle list, counter-clockwise seen from outside
 */

import type { Vec2, Vec3, BoundingBox } from './vec3.js';

export interface Vertex {
  position: Vec3;
  normal: Vec3;
  uv: Vec2;
}

export interface SurfaceMesh {
  positions: Float32Array;
  normals: Float32Array;
  uvs: Float32Array;
  indices: Uint32Array;
  topology: 'triangle-list';
  vertexCount: number;
  triangleCount: number;
  bounds: BoundingBox;
}

/** Pack per-vertex arrays into a SurfaceMesh. */
export function createMesh(vertices: readonly Vertex[], indices: readonly number[]): SurfaceMesh {
  const positions = new Float32Array(vertices.length * 3);
  const normals = new Float32Array(vertices.length * 3);
  const uvs = new Float32Array(vertices.length * 2);

  for (let i = 0; i < vertices.length; i++) {
    const { position, normal, uv } = vertices[i];
    positions.set(position, i * 3);
    normals.set(normal, i * 3);
    uvs.set(uv, i * 2);
  }

  return {
    positions,
    normals,
    uvs,
    indices: Uint32Array.from(indices),
    topology: 'triangle-list',
    vertexCount: vertices.length,
    triangleCount: Math.floor(indices.length / 3),
    bounds: computeBounds(positions),
  };
}

/** Read vertex i back out of the flat buffers. */
export function vertexAt(mesh: SurfaceMesh, i: number): Vertex {
  if (!Number.isInteger(i) || i < 0 || i >= mesh.vertexCount) {
    throw new RangeError(`Vertex ${i} out of range (mesh has ${mesh.vertexCount} vertices)`);
  }
  const p = mesh.positions;
  const n = mesh.normals;
  const t = mesh.uvs;
  return {
    position: [p[i * 3], p[i * 3 + 1], p[i * 3 + 2]],
    normal: [n[i * 3], n[i * 3 + 1], n[i * 3 + 2]],
    uv: [t[i * 2], t[i * 2 + 1]],
  };
}

export function positionAt(mesh: SurfaceMesh, i: number): Vec3 {
  const p = mesh.positions;
  return [p[i * 3], p[i * 3 + 1], p[i * 3 + 2]];
}

function computeBounds(positions: Float32Array): BoundingBox {
  if (positions.length === 0) {
    return { min: [0, 0, 0], max: [0, 0, 0] };
  }
  const min: Vec3 = [Infinity, Infinity, Infinity];
  const max: Vec3 = [-Infinity, -Infinity, -Infinity];
  for (let i = 0; i < positions.length; i += 3) {
    for (let a = 0; a < 3; a++) {
      const v = positions[i + a];
      if (v < min[a]) min[a] = v;
      if (v > max[a]) max[a] = v;
    }
  }
  return { min, max };
}
