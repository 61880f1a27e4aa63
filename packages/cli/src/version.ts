import fs from 'fs';
import path from 'path';
import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string() });

/** Version from this package's package.json, which sits one level above src/ and dist/. */
export function readVersion(packageDir: string = path.resolve(__dirname, '..')): string {
  try {
    const raw: unknown = JSON.parse(fs.readFileSync(path.join(packageDir, 'package.json'), 'utf8'));
    const parsed = PackageJsonSchema.safeParse(raw);
    return parsed.success ? parsed.data.version : 'unknown';
  } catch {
    return 'unknown';
  }
}
