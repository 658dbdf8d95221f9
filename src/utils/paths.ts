import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

// Resolve to <root>/src/<name> from the project root; fall back relative to this file (src/utils or dist/utils)
export function resolveSourcePath(...segments: string[]): string {
  const fromRoot = path.resolve(process.cwd(), 'src', ...segments);
  if (fs.existsSync(fromRoot)) return fromRoot;
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, '..', '..', 'src', ...segments);
}
