import { readFileSync } from 'fs';
import { z } from 'zod';

export const UNDEFINED_VERSION = 'undefined';

const PackageInfoSchema = z.object({
  version: z.string().min(1),
});

/**
 * Extract the version from package metadata, or `undefined` when it has none
 */
export function parseVersion(content: string): string {
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    return UNDEFINED_VERSION;
  }
  const result = PackageInfoSchema.safeParse(data);
  return result.success ? result.data.version : UNDEFINED_VERSION;
}

/**
 * Version of the installed CLI package
 */
export function readVersion(packageFile = new URL('../package.json', import.meta.url)): string {
  try {
    return parseVersion(readFileSync(packageFile, 'utf-8'));
  } catch {
    return UNDEFINED_VERSION;
  }
}
