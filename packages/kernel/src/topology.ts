/**
 * Mesh topology checks — is the index buffer a closed, consistently
 * wound surface?
 *
 * Edges are keyed by their vertex pair. A closed manifold uses every
 * undirected edge exactly twice, once in each direction; an open surface
 * has boundary edges used once. The signed volume is positive for a
 * closed mesh whose triangles face outward.
 */

import { positionAt, type SurfaceMesh } from './mesh.js';
import { cross, dot } from './vec3.js';

export interface MeshReport {
  /** Every index < vertexCount and the index count is a multiple of 3. */
  indicesValid: boolean;
  triangleCount: number;
  /** Vertices no triangle references. */
  unreferencedVertices: number;
  /** Undirected edges used by exactly one triangle. */
  boundaryEdges: number;
  /** Undirected edges used by more than two triangles. */
  nonManifoldEdges: number;
  /** No directed edge appears twice (neighbours agree on winding). */
  consistentWinding: boolean;
  /** No boundary edges, no non-manifold edges, consistent winding. */
  closed: boolean;
  /** V − E + F over referenced vertices. 2 for a closed sphere-like surface. */
  eulerCharacteristic: number;
  /** Sum of signed tetrahedra against the origin. Meaningful when closed. */
  signedVolume: number;
}

/** Undirected edge key, smaller index first. */
function edgeKey(a: number, b: number): number {
  // Vertex counts stay far below 2^26, so the pair packs into a safe integer
  return a < b ? a * 0x4000000 + b : b * 0x4000000 + a;
}

export function inspectMesh(mesh: SurfaceMesh): MeshReport {
  const { indices, vertexCount } = mesh;
  let indicesValid = indices.length % 3 === 0;
  for (let i = 0; i < indices.length; i++) {
    if (indices[i] >= vertexCount) {
      indicesValid = false;
      break;
    }
  }

  const triangleCount = Math.floor(indices.length / 3);
  if (!indicesValid) {
    return {
      indicesValid,
      triangleCount,
      unreferencedVertices: 0,
      boundaryEdges: 0,
      nonManifoldEdges: 0,
      consistentWinding: false,
      closed: false,
      eulerCharacteristic: 0,
      signedVolume: 0,
    };
  }

  const referenced = new Uint8Array(vertexCount);
  const undirected = new Map<number, number>();
  const directed = new Set<string>();
  let consistentWinding = true;
  let signedVolume = 0;

  for (let t = 0; t < triangleCount; t++) {
    const tri = [indices[t * 3], indices[t * 3 + 1], indices[t * 3 + 2]];
    for (let e = 0; e < 3; e++) {
      const a = tri[e];
      const b = tri[(e + 1) % 3];
      referenced[a] = 1;
      const key = edgeKey(a, b);
      undirected.set(key, (undirected.get(key) ?? 0) + 1);
      const dirKey = `${a}>${b}`;
      if (directed.has(dirKey)) consistentWinding = false;
      directed.add(dirKey);
    }

    const v0 = positionAt(mesh, tri[0]);
    const v1 = positionAt(mesh, tri[1]);
    const v2 = positionAt(mesh, tri[2]);
    signedVolume += dot(v0, cross(v1, v2)) / 6;
  }

  let boundaryEdges = 0;
  let nonManifoldEdges = 0;
  for (const uses of undirected.values()) {
    if (uses === 1) boundaryEdges++;
    else if (uses > 2) nonManifoldEdges++;
  }

  let referencedCount = 0;
  for (let i = 0; i < vertexCount; i++) referencedCount += referenced[i];

  return {
    indicesValid,
    triangleCount,
    unreferencedVertices: vertexCount - referencedCount,
    boundaryEdges,
    nonManifoldEdges,
    consistentWinding,
    closed: boundaryEdges === 0 && nonManifoldEdges === 0 && consistentWinding && triangleCount > 0,
    eulerCharacteristic: referencedCount - undirected.size + triangleCount,
    signedVolume,
  };
}
