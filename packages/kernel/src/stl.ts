/**
 * Binary STL export.
 *
 * Format: 80-byte header + uint32 count + 50 bytes per triangle.
 * Face normals computed via cross product (standard for slicers);
 * the mesh's own vertex normals are not written.
 */

import { positionAt, type SurfaceMesh } from './mesh.js';
import { sub, cross, normalize } from './vec3.js';

export function exportSTL(mesh: SurfaceMesh, header = 'function-mesh'): ArrayBuffer {
  if (mesh.triangleCount === 0) {
    throw new Error('Cannot export empty mesh (0 triangles)');
  }
  const enc = new TextEncoder();
  const headerBytes = enc.encode(header);
  if (headerBytes.length > 80) {
    throw new Error(
      `STL header exceeds 80 bytes (got ${headerBytes.length}). Shorten the header string.`
    );
  }

  const { indices, triangleCount } = mesh;
  if (indices.length !== triangleCount * 3) {
    throw new Error(
      `Mesh data inconsistent: indices.length (${indices.length}) !== triangleCount * 3 (${triangleCount * 3})`
    );
  }
  const size = 84 + triangleCount * 50;
  const buffer = new ArrayBuffer(size);
  const view = new DataView(buffer);
  new Uint8Array(buffer).set(headerBytes, 0);
  view.setUint32(80, triangleCount, true);

  let offset = 84;
  const put = (value: number): void => {
    view.setFloat32(offset, value, true);
    offset += 4;
  };

  for (let t = 0; t < triangleCount; t++) {
    const v0 = positionAt(mesh, indices[t * 3]);
    const v1 = positionAt(mesh, indices[t * 3 + 1]);
    const v2 = positionAt(mesh, indices[t * 3 + 2]);
    const n = normalize(cross(sub(v1, v0), sub(v2, v0)));

    for (const v of [n, v0, v1, v2]) {
      put(v[0]);
      put(v[1]);
      put(v[2]);
    }
    // Attribute byte count
    view.setUint16(offset, 0, true);
    offset += 2;
  }

  return buffer;
}
