import * as path from 'node:path';

/** Where export_mesh writes STL files. */
export function exportDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.FUNCTION_MESH_EXPORT_DIR ?? path.join(env.TMPDIR ?? '/tmp', 'function-mesh');
}
