import { describe, it, expect } from 'vitest';
import {
  recomputeNormals, functionMesh, vertexAt, sampleRing, buildSurface,
  constant, circle,
} from '../src/index.js';

describe('recomputeNormals', () => {
  it('flat fan gets +Y normals; the unused bottom pole keeps its own', () => {
    const square = sampleRing(constant(1), -1, 1, 3, { mirror: true });
    const mesh = recomputeNormals(buildSurface(square, 0, 0, 1));
    for (let i = 1; i < mesh.vertexCount; i++) {
      const [x, y, z] = vertexAt(mesh, i).normal;
      expect(x).toBeCloseTo(0, 6);
      expect(y).toBeCloseTo(1, 6);
      expect(z).toBeCloseTo(0, 6);
    }
    expect(vertexAt(mesh, 0).normal).toEqual([0, -1, 0]);
  });

  it('sphere normals point away from the center', () => {
    const { mesh } = functionMesh({
      profile: { f: circle(1), xStart: -1, xEnd: 1, vertices: 20 },
      height: { f: circle(1), xStart: -1, xEnd: 1, vertices: 20 },
    });
    const fixed = recomputeNormals(mesh);
    for (let i = 0; i < fixed.vertexCount; i++) {
      const { position, normal } = vertexAt(fixed, i);
      const r = Math.hypot(...position);
      const alignment = (position[0] * normal[0] + position[1] * normal[1] + position[2] * normal[2]) / r;
      expect(alignment).toBeGreaterThan(0.95);
    }
  });

  it('leaves positions, uvs and indices untouched', () => {
    const { mesh } = functionMesh({
      profile: { f: circle(1), xStart: -1, xEnd: 1, vertices: 8 },
      height: 1,
    });
    const fixed = recomputeNormals(mesh);
    expect(fixed.positions).toBe(mesh.positions);
    expect(fixed.uvs).toBe(mesh.uvs);
    expect(fixed.indices).toBe(mesh.indices);
    expect(fixed.normals).not.toBe(mesh.normals);
  });
});
