import { readFileSync } from 'fs';

/**
 * Package version, read from package.json beside src/ or dist/.
 */
export function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // Running outside the package tree
  }
  return '0.0.0-dev';
}
