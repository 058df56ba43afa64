/**
 * Normal recomputation from the triangles themselves.
 *
 * Each vertex gets the normalised sum of the face normals around it,
 * weighted by face area (the unnormalised cross product). Replaces the
 * blended heuristic normals of the layered regime.
 */

import { positionAt, type SurfaceMesh } from './mesh.js';
import { cross, normalize, sub } from './vec3.js';

/** New mesh with area-weighted vertex normals. Unreferenced vertices keep theirs. */
export function recomputeNormals(mesh: SurfaceMesh): SurfaceMesh {
  const sums = new Float64Array(mesh.vertexCount * 3);
  const { indices } = mesh;

  for (let t = 0; t + 2 < indices.length; t += 3) {
    const a = indices[t];
    const b = indices[t + 1];
    const c = indices[t + 2];
    const pa = positionAt(mesh, a);
    const face = cross(sub(positionAt(mesh, b), pa), sub(positionAt(mesh, c), pa));
    for (const v of [a, b, c]) {
      sums[v * 3] += face[0];
      sums[v * 3 + 1] += face[1];
      sums[v * 3 + 2] += face[2];
    }
  }

  const normals = Float32Array.from(mesh.normals);
  for (let v = 0; v < mesh.vertexCount; v++) {
    const n = normalize([sums[v * 3], sums[v * 3 + 1], sums[v * 3 + 2]]);
    if (n[0] === 0 && n[1] === 0 && n[2] === 0) continue;
    normals.set(n, v * 3);
  }

  return { ...mesh, normals };
}
