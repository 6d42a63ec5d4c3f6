import { join, resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

/**
 * Resolves a path from the workspace root (three levels up from packages/tools/src)
 */
export function workspacePath(...segments: string[]): string {
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = dirname(__filename);
  const workspaceRoot = resolve(__dirname, '../../..');
  return join(workspaceRoot, ...segments);
}
