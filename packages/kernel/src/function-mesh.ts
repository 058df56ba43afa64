/**
 * Function mesh — one call from curve functions to finished buffers.
 *
 *   functionMesh({ profile: { f: circle(), xStart: -1, xEnd: 1, vertices: 20 } })
 *     → flat disk
 *
 *   functionMesh({
 *     profile: { f: squircle(), xStart: -1, xEnd: 1, vertices: 24 },
 *     height:  { f: circle(),   xStart: -1, xEnd: 1, vertices: 16 },
 *   })
 *     → rounded blob
 *
 * Every parameter is validated before f is evaluated once.
 */

import { requireUnitInterval, InvalidParameterError } from './errors.js';
import { constant, type CurveFunction } from './functions.js';
import type { SurfaceMesh } from './mesh.js';
import type { Refinement } from './refinement.js';
import type { Ring } from './ring.js';
import { sampleRing, validateCurve } from './sampler.js';
import { buildSurface, layerCountOf, type UvProjection } from './surface.js';

export interface CurveOptions {
  f: CurveFunction;
  xStart: number;
  xEnd: number;
  /** Sample budget for this curve (>= 3). */
  vertices: number;
}

export interface ProfileOptions extends CurveOptions {
  /** Mirror across y = 0 into a closed outline. Default true. */
  mirror?: boolean;
}

export interface FunctionMeshOptions {
  /** Cross-section in the XZ plane. */
  profile: ProfileOptions;
  /**
   * Height profile along Y: x is the layer height, f(x) its radial scale.
   * A number extrudes the profile straight by that height. Omit for a
   * flat polygon.
   */
  height?: CurveOptions | number;
  /** Layers for a numeric height. Default 2. */
  extrusionLayers?: number;
  /** Vertical squash in [0, 1]. Default 1 with a height, 0 without. */
  relativeHeight?: number;
  uvProjection?: UvProjection;
  refinement?: Refinement;
}

export interface FunctionMeshResult {
  mesh: SurfaceMesh;
  profileRing: Ring;
  /** Null for flat and extruded meshes. */
  heightRing: Ring | null;
  layerCount: number;
}

export const DEFAULT_PROFILE: Readonly<ProfileOptions> = {
  f: constant(1),
  xStart: -1,
  xEnd: 1,
  vertices: 18,
  mirror: true,
};

export const DEFAULT_HEIGHT: Readonly<CurveOptions> = {
  f: constant(1),
  xStart: -1,
  xEnd: 1,
  vertices: 18,
};

export function functionMesh(options: FunctionMeshOptions): FunctionMeshResult {
  const { profile, height } = options;
  const relativeHeight = options.relativeHeight ?? (height === undefined ? 0 : 1);
  const extrusionLayers = options.extrusionLayers ?? 2;

  // Fail fast: nothing is sampled until every parameter checks out
  validateCurve(profile.xStart, profile.xEnd, profile.vertices, 'profile');
  if (typeof height === 'object') {
    validateCurve(height.xStart, height.xEnd, height.vertices, 'height');
  } else if (typeof height === 'number') {
    if (!Number.isFinite(height) || height < 0) {
      throw new InvalidParameterError('height', `extrusion height must be finite and >= 0 (got ${height})`);
    }
    if (!Number.isInteger(extrusionLayers) || extrusionLayers < 2) {
      throw new InvalidParameterError('extrusionLayers', `must be an integer >= 2 (got ${extrusionLayers})`);
    }
  }
  requireUnitInterval('relativeHeight', relativeHeight);

  const profileRing = sampleRing(profile.f, profile.xStart, profile.xEnd, profile.vertices, {
    mirror: profile.mirror ?? true,
    refinement: options.refinement,
  });
  const surfaceOptions = { uvProjection: options.uvProjection };

  if (height === undefined) {
    return {
      mesh: buildSurface(profileRing, 0, relativeHeight, 1, surfaceOptions),
      profileRing,
      heightRing: null,
      layerCount: 1,
    };
  }

  if (typeof height === 'number') {
    return {
      mesh: buildSurface(profileRing, height, relativeHeight, extrusionLayers, surfaceOptions),
      profileRing,
      heightRing: null,
      layerCount: extrusionLayers,
    };
  }

  const heightRing = sampleRing(height.f, height.xStart, height.xEnd, height.vertices, {
    refinement: options.refinement,
  });
  const layerCount = layerCountOf(heightRing);
  return {
    mesh: buildSurface(profileRing, heightRing, relativeHeight, layerCount, surfaceOptions),
    profileRing,
    heightRing,
    layerCount,
  };
}
