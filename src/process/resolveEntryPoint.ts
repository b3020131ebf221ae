import { readFile, stat } from 'node:fs/promises';
import * as path from 'node:path';

import { VarietyError, VarietyErrorCode } from '../utils/errors.js';
import { compileSchema } from '../utils/schema.js';
import type { ResolvedEntryPoint } from './types.js';

interface PackageManifest {
  name?: string;
  bin?: string | Record<string, string>;
  main?: string;
}

const manifestSchema = {
  type: 'object',
  properties: {
    name: { type: 'string' },
    bin: {
      anyOf: [{ type: 'string' }, { type: 'object', additionalProperties: { type: 'string' } }],
    },
    main: { type: 'string' },
  },
};

const isPackageManifest = compileSchema<PackageManifest>(manifestSchema);

const NODE_SCRIPT_EXTENSIONS = new Set(['.js', '.mjs', '.cjs']);
const CONVENTIONAL_ENTRIES = ['dist/index.js', 'index.js'];

/**
 * Orders the `bin` entries of a manifest: a key mentioning `mcp` or `server`
 * first, then the rest in declaration order.
 */
function binCandidates(bin: PackageManifest['bin']): string[] {
  if (bin === undefined) return [];
  if (typeof bin === 'string') return [bin];
  const entries = Object.entries(bin);
  const preferred = entries.find(([key]) => /mcp|server/i.test(key));
  const ordered = preferred ? [preferred, ...entries.filter((e) => e !== preferred)] : entries;
  return ordered.map(([, file]) => file);
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Finds the command that starts an installed plugin package.
 *
 * Order: `bin` (preferring an mcp/server key), `main`, `dist/index.js`,
 * `index.js`. Script entries are launched through the running Node binary so
 * they do not depend on shebangs or the executable bit.
 *
 * @throws {VarietyError} `SPAWN_NOT_FOUND` when no entry point exists on disk.
 */
export async function resolveEntryPoint(
  packageDir: string,
  nodeExecutable: string = process.execPath,
): Promise<ResolvedEntryPoint> {
  const root = path.resolve(packageDir);
  let manifest: PackageManifest = {};
  try {
    const parsed: unknown = JSON.parse(await readFile(path.join(root, 'package.json'), 'utf8'));
    if (isPackageManifest(parsed)) manifest = parsed;
  } catch (error) {
    throw new VarietyError(
      `No readable package.json in ${root}`,
      VarietyErrorCode.SPAWN_NOT_FOUND,
      { packageDir: root },
      'ProcessSupervisor',
      error,
    );
  }

  const candidates = [
    ...binCandidates(manifest.bin),
    ...(manifest.main ? [manifest.main] : []),
    ...CONVENTIONAL_ENTRIES,
  ];

  for (const candidate of candidates) {
    const entryFile = path.resolve(root, candidate);
    // Entries must stay inside the package.
    if (entryFile !== root && !entryFile.startsWith(root + path.sep)) continue;
    if (!(await isFile(entryFile))) continue;

    return NODE_SCRIPT_EXTENSIONS.has(path.extname(entryFile))
      ? { executablePath: nodeExecutable, args: [entryFile], entryFile }
      : { executablePath: entryFile, args: [], entryFile };
  }

  throw new VarietyError(
    `No entry point found for package ${manifest.name ?? root}`,
    VarietyErrorCode.SPAWN_NOT_FOUND,
    { packageDir: root, tried: candidates },
    'ProcessSupervisor',
  );
}
