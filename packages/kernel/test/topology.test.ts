import { describe, it, expect } from 'vitest';
import { createMesh, inspectMesh } from '../src/index.js';
import type { Vec3, Vertex } from '../src/index.js';

const vert = (position: Vec3): Vertex => ({ position, normal: [0, 0, 1], uv: [0, 0] });

// Unit right tetrahedron, faces wound outward
const tetraVertices = [vert([0, 0, 0]), vert([1, 0, 0]), vert([0, 1, 0]), vert([0, 0, 1])];
const tetraIndices = [0, 2, 1, 0, 1, 3, 0, 3, 2, 1, 2, 3];

describe('inspectMesh — closed surfaces', () => {
  const report = inspectMesh(createMesh(tetraVertices, tetraIndices));

  it('tetrahedron is closed with Euler characteristic 2', () => {
    expect(report.indicesValid).toBe(true);
    expect(report.closed).toBe(true);
    expect(report.boundaryEdges).toBe(0);
    expect(report.nonManifoldEdges).toBe(0);
    expect(report.eulerCharacteristic).toBe(2);
  });

  it('outward winding gives positive volume', () => {
    expect(report.signedVolume).toBeCloseTo(1 / 6, 6);
  });

  it('inward winding gives negative volume', () => {
    const flipped = [0, 1, 2, 0, 3, 1, 0, 2, 3, 1, 3, 2];
    const r = inspectMesh(createMesh(tetraVertices, flipped));
    expect(r.closed).toBe(true);
    expect(r.signedVolume).toBeCloseTo(-1 / 6, 6);
  });
});

describe('inspectMesh — defects', () => {
  it('single triangle has three boundary edges', () => {
    const r = inspectMesh(createMesh(tetraVertices.slice(0, 3), [0, 1, 2]));
    expect(r.boundaryEdges).toBe(3);
    expect(r.closed).toBe(false);
    expect(r.unreferencedVertices).toBe(0);
  });

  it('one flipped face breaks winding consistency', () => {
    const indices = [...tetraIndices];
    indices.splice(9, 3, 1, 3, 2);
    const r = inspectMesh(createMesh(tetraVertices, indices));
    expect(r.consistentWinding).toBe(false);
    expect(r.closed).toBe(false);
  });

  it('edge shared by three triangles is non-manifold', () => {
    const vertices = [...tetraVertices, vert([1, 1, 1])];
    const r = inspectMesh(createMesh(vertices, [0, 1, 2, 1, 0, 3, 0, 1, 4]));
    expect(r.nonManifoldEdges).toBe(1);
  });

  it('index past the vertex buffer is invalid', () => {
    const r = inspectMesh(createMesh(tetraVertices, [0, 1, 4]));
    expect(r.indicesValid).toBe(false);
    expect(r.closed).toBe(false);
  });

  it('unreferenced vertices are counted', () => {
    const r = inspectMesh(createMesh(tetraVertices, [0, 1, 2]));
    expect(r.unreferencedVertices).toBe(1);
  });
});
