/**
 * Surface builder — rings in, vertex/index buffers out.
 *
 * The profile ring lies in the XZ plane (ring x → X, ring y → Z). Layers
 * stack it along +Y. Each height sample (hx, hy) contributes one layer at
 * Y = hx · relativeHeight, scaled radially by hy, so a circle profile on a
 * circle height ring gives a sphere and a constant height gives a prism.
 *
 * Vertex layout:
 *   0                      bottom pole
 *   1 + layer·n + k        ring point k of layer `layer` (n = ring length)
 *   1 + layers·n           top pole
 *
 * Index groups, in order: bottom cap fan, side walls, top cap fan. All
 * triangles wind counter-clockwise seen from outside. A profile ring that
 * runs the other way round (negative f) has every triangle and horizontal
 * normal flipped.
 *
 * Normals in the layered regime are a heuristic: the horizontal profile
 * normal (weighted 2/3) blended with the vertical component of the height
 * profile normal. Use recomputeNormals() where lighting has to be right.
 */

import {
  ContractViolationError,
  InvalidParameterError,
  requireCount,
  requireUnitInterval,
} from './errors.js';
import { createMesh, type SurfaceMesh, type Vertex } from './mesh.js';
import type { SamplePoint } from './refinement.js';
import { trimAxisEnds, type Ring } from './ring.js';
import { normalize, type Vec3 } from './vec3.js';

export type UvProjection = 'planar' | 'per-layer';

export interface SurfaceOptions {
  /**
   * 'planar' maps placed X/Z into the profile's bounding box.
   * 'per-layer' divides out each layer's radial scale first, so every
   * layer (and cap) spans the whole texture. Default 'planar'.
   */
  uvProjection?: UvProjection;
}

/** Horizontal share of a blended layered-regime normal. */
const HORIZONTAL_NORMAL_WEIGHT = 2 / 3;

interface Layer {
  y: number;
  scale: number;
  slope: number;
}

/**
 * Number of layers a height ring produces: its points minus the zero-radius
 * ends that collapse into the poles.
 */
export function layerCountOf(height: Ring): number {
  return trimAxisEnds(height.points).length;
}

/**
 * Build a triangle mesh from a profile ring and either a height ring or a
 * straight extrusion height.
 *
 * @param profile - closed cross-section (usually mirrored)
 * @param height - unmirrored height ring, or an extrusion height (0 = flat)
 * @param relativeHeight - vertical squash in [0, 1]; 0 gives a flat polygon
 * @param layerCount - layers to emit; must equal layerCountOf(height) for a ring
 */
export function buildSurface(
  profile: Ring,
  height: Ring | number,
  relativeHeight: number,
  layerCount: number,
  options: SurfaceOptions = {},
): SurfaceMesh {
  requireCount('layerCount', layerCount, 1);
  requireUnitInterval('relativeHeight', relativeHeight);
  if (typeof height === 'number' && (!Number.isFinite(height) || height < 0)) {
    throw new InvalidParameterError('height', `extrusion height must be finite and >= 0 (got ${height})`);
  }

  const ring = profile.points;
  if (ring.length < 3) {
    throw new ContractViolationError(`Profile ring needs at least 3 points (got ${ring.length})`);
  }
  if (profile.upperLength < 2 || profile.upperLength > ring.length) {
    throw new ContractViolationError(
      `Profile upperLength ${profile.upperLength} inconsistent with ${ring.length} ring points`,
    );
  }

  let layers: Layer[];
  let poles: [number, number];
  if (typeof height === 'number') {
    layers = extrusionLayers(height, relativeHeight, layerCount);
    poles = [layers[0].y, layers[layers.length - 1].y];
  } else {
    if (height.upperLength !== height.points.length) {
      throw new ContractViolationError('Height ring must not be mirrored');
    }
    const samples = trimAxisEnds(height.points);
    if (samples.length !== layerCount) {
      throw new ContractViolationError(
        `Height ring yields ${samples.length} layers but layerCount is ${layerCount}`,
      );
    }
    layers = samples.map((p) => ({ y: p.x * relativeHeight, scale: p.y, slope: p.slope }));
    const first = height.points[0];
    const last = height.points[height.points.length - 1];
    poles = [first.x * relativeHeight, last.x * relativeHeight];
  }

  // A height ring always gets its layers and poles, even a single layer
  const flat = typeof height === 'number'
    ? layerCount === 1 || height === 0 || relativeHeight === 0
    : relativeHeight === 0;
  const uv = uvMapper(profile, options.uvProjection ?? 'planar');
  const reversed = ringArea(ring) > 0;

  const { vertices, indices } = flat
    ? buildFlat(profile, relativeHeight * uv.extent, uv, reversed)
    : buildLayered(profile, layers, poles, uv, reversed);
  if (reversed) flipTriangles(indices);
  return createMesh(vertices, indices);
}

interface Buffers {
  vertices: Vertex[];
  indices: number[];
}

/**
 * Shoelace area of the ring in (x, f) coordinates. Negative for the
 * outward-winding orientation: ascending x along positive f.
 */
export function ringArea(points: readonly SamplePoint[]): number {
  let twice = 0;
  for (let i = 0; i < points.length; i++) {
    const a = points[i];
    const b = points[(i + 1) % points.length];
    twice += a.x * b.y - b.x * a.y;
  }
  return twice / 2;
}

function flipTriangles(indices: number[]): void {
  for (let t = 0; t + 2 < indices.length; t += 3) {
    const second = indices[t + 1];
    indices[t + 1] = indices[t + 2];
    indices[t + 2] = second;
  }
}

// ─── Flat regime ───────────────────────────────────────────────

function buildFlat(profile: Ring, offset: number, uv: UvMapper, reversed: boolean): Buffers {
  const ring = profile.points;
  const n = ring.length;
  const vertices: Vertex[] = [pole(offset > 0 ? -offset : 0, -1)];

  for (let k = 0; k < n; k++) {
    const p = ring[k];
    vertices.push({
      position: [p.x, 0, p.y],
      normal: horizontalNormal(p, k >= profile.upperLength, reversed),
      uv: uv(p, 1),
    });
  }
  vertices.push(pole(offset, 1));

  const indices: number[] = [];
  // Coincident poles would make the two fans the same surface twice
  if (offset > 0) bottomFan(indices, n);
  topFan(indices, n, 1);
  return { vertices, indices };
}

// ─── Layered regime ────────────────────────────────────────────

function buildLayered(
  profile: Ring,
  layers: readonly Layer[],
  poles: [number, number],
  uv: UvMapper,
  reversed: boolean,
): Buffers {
  const ring = profile.points;
  const n = ring.length;
  const vertices: Vertex[] = [pole(poles[0], -1)];

  for (const layer of layers) {
    const vy = verticalNormalY(layer.slope);
    for (let k = 0; k < n; k++) {
      const p = ring[k];
      const h = horizontalNormal(p, k >= profile.upperLength, reversed);
      vertices.push({
        position: [p.x * layer.scale, layer.y, p.y * layer.scale],
        normal: normalize([h[0] * HORIZONTAL_NORMAL_WEIGHT, vy, h[2] * HORIZONTAL_NORMAL_WEIGHT]),
        uv: uv(p, layer.scale),
      });
    }
  }
  vertices.push(pole(poles[1], 1));

  const indices: number[] = [];
  bottomFan(indices, n);
  for (let segment = 1; segment < layers.length; segment++) {
    sideWall(indices, n, segment);
  }
  topFan(indices, n, layers.length);
  return { vertices, indices };
}

function extrusionLayers(height: number, relativeHeight: number, layerCount: number): Layer[] {
  const layers: Layer[] = [];
  for (let l = 0; l < layerCount; l++) {
    const t = layerCount > 1 ? l / (layerCount - 1) : 0.5;
    layers.push({ y: (t - 0.5) * height * relativeHeight, scale: 1, slope: 0 });
  }
  return layers;
}

// ─── Index groups ──────────────────────────────────────────────

/** Ring vertex k of layer l. */
function ringIndex(n: number, layer: number, k: number): number {
  return 1 + layer * n + (k % n);
}

function bottomFan(out: number[], n: number): void {
  for (let i = 0; i < n; i++) {
    out.push(ringIndex(n, 0, i + 1), ringIndex(n, 0, i), 0);
  }
}

function topFan(out: number[], n: number, layerCount: number): void {
  const last = layerCount - 1;
  const top = 1 + layerCount * n;
  for (let i = 0; i < n; i++) {
    out.push(ringIndex(n, last, i), ringIndex(n, last, i + 1), top);
  }
}

/** Quads between layer `segment − 1` and `segment`; the last quad wraps to k = 0. */
function sideWall(out: number[], n: number, segment: number): void {
  for (let i = 0; i < n; i++) {
    const tl = ringIndex(n, segment, i);
    const tr = ringIndex(n, segment, i + 1);
    const bl = ringIndex(n, segment - 1, i);
    const br = ringIndex(n, segment - 1, i + 1);
    out.push(br, tr, tl);
    out.push(bl, br, tl);
  }
}

// ─── Normals & UVs ─────────────────────────────────────────────

function pole(y: number, direction: 1 | -1): Vertex {
  return { position: [0, y, 0], normal: [0, direction, 0], uv: [0.5, 0.5] };
}

/**
 * Outward in-plane normal of the profile at p; lower-half points face −Z.
 * On a reversed ring the upper half is the one below the axis.
 */
function horizontalNormal(p: SamplePoint, lower: boolean, reversed: boolean): Vec3 {
  const n = normalize([-Math.tan(p.slope), 0, 1]);
  const side: Vec3 = lower ? [n[0], n[1], -n[2]] : n;
  return reversed ? [-side[0], side[1], -side[2]] : side;
}

/** Y component of the height profile's normal. */
function verticalNormalY(slope: number): number {
  return normalize([1, -Math.tan(slope), 1])[1];
}

type UvMapper = ((p: SamplePoint, scale: number) => [number, number]) & { extent: number };

function uvMapper(profile: Ring, projection: UvProjection): UvMapper {
  const xMin = profile.points[0].x;
  const width = profile.points[profile.upperLength - 1].x - xMin;
  const w = width > 0 ? width : 1;
  const extent = profile.maxY > 0 ? profile.maxY : 1;

  const map = (p: SamplePoint, scale: number): [number, number] => {
    const s = projection === 'per-layer' ? 1 : scale;
    const x = p.x * s;
    const z = p.y * s;
    return [(x - xMin) / w, (z + extent) / (2 * extent)];
  };
  return Object.assign(map, { extent });
}
