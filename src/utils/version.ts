import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string().min(1) });

const FALLBACK_VERSION = '0.1.0';

/**
 * Locate the nearest package.json above this module, so the version
 * resolves the same from src/ under ts-jest and from dist/ after a build.
 */
function findPackageJson(startDir: string): string | null {
  let dir = startDir;
  for (;;) {
    const candidate = join(dir, 'package.json');
    if (existsSync(candidate)) {
      return candidate;
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

function getPackageVersion(): string {
  const packagePath = findPackageJson(__dirname);
  if (!packagePath) {
    return FALLBACK_VERSION;
  }

  const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packagePath, 'utf-8')));
  return parsed.success ? parsed.data.version : FALLBACK_VERSION;
}

// Export as constant so it's only read once
export const PACKAGE_VERSION = getPackageVersion();
