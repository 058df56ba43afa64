// Public API
export type { Vec2, Vec3, BoundingBox } from './vec3.js';
export { vec3 } from './vec3.js';

// Errors
export { InvalidRangeError, InvalidParameterError, ContractViolationError } from './errors.js';

// Curve functions
export type { CurveFunction } from './functions.js';
export { constant, circle, squircle, parabola, sine, lookupTable } from './functions.js';

// Sampling
export type { SamplePoint, Refinement } from './refinement.js';
export { SLOPE_EPSILON, estimateSlope, greedyRefinement, queuedRefinement } from './refinement.js';
export type { Ring } from './ring.js';
export { trimAxisEnds, mirrorHalf, isOnAxis } from './ring.js';
export type { SampleRingOptions } from './sampler.js';
export { sampleRing, MIN_RING_VERTICES } from './sampler.js';

// Surface building
export type { UvProjection, SurfaceOptions } from './surface.js';
export { buildSurface, layerCountOf, ringArea } from './surface.js';
export type { CurveOptions, ProfileOptions, FunctionMeshOptions, FunctionMeshResult } from './function-mesh.js';
export { functionMesh, DEFAULT_PROFILE, DEFAULT_HEIGHT } from './function-mesh.js';

// Mesh buffers & post-processing
export type { SurfaceMesh, Vertex } from './mesh.js';
export { createMesh, vertexAt } from './mesh.js';
export type { MeshReport } from './topology.js';
export { inspectMesh } from './topology.js';
export { recomputeNormals } from './normals.js';
export { exportSTL } from './stl.js';
