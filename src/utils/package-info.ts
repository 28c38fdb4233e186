/**
 * Name, version and description from the project's package.json
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import _ from 'lodash';
import { z } from 'zod';

const PackageInfoSchema = z.object({
    name:        z.string(),
    version:     z.string(),
    description: z.string().default(''),
});

export type PackageInfo = z.infer<typeof PackageInfoSchema>;

// Same relative location from src/utils and dist/utils
const PACKAGE_JSON_PATH = fileURLToPath(new URL('../../package.json', import.meta.url));

export const getPackageInfo = _.once((): PackageInfo => {
    const raw: unknown = JSON.parse(readFileSync(PACKAGE_JSON_PATH, 'utf-8'));
    return PackageInfoSchema.parse(raw);
});
