import { readFileSync } from 'node:fs';
import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string() });

/**
 * Read the CLI version from its package.json
 */
export function getVersion(): string {
  const content = readFileSync(
    new URL('../package.json', import.meta.url),
    'utf8'
  );
  return PackageJsonSchema.parse(JSON.parse(content)).version;
}
