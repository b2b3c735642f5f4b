import { existsSync } from 'fs';
import { resolve } from 'path';
import { LookupTableError } from '../../common/errors';

/**
 * Locates a file shipped beside the lookup module, whether running from the repo root,
 * from `apps/backend`, or from the compiled output.
 */
export const resolveLookupAssetPath = (relativePath: string): string => {
  const candidates = [
    resolve(process.cwd(), 'apps', 'backend', 'src', 'lookup', relativePath),
    resolve(process.cwd(), 'src', 'lookup', relativePath),
    resolve(__dirname, '..', relativePath),
  ];

  for (const candidate of candidates) {
    if (existsSync(candidate)) {
      return candidate;
    }
  }

  throw new LookupTableError(`Missing lookup asset: ${relativePath}`);
};
