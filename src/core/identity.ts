/**
 * Identity & Path Resolver
 *
 * Turns a plugin's declared identity and source location into its
 * canonical identity, its on-disk paths and the first-load flag.
 */

import { existsSync, mkdirSync, statSync } from 'node:fs';
import { basename, dirname, join, resolve } from 'node:path';
import { z } from 'zod';
import type { PluginIdentity, PluginIdentityInput, PluginPaths } from '../types/plugin.js';
import { IdentityError, ValidationError, WorkspaceError } from './plugin-errors.js';

export const DEFAULT_AUTHOR = 'Unknown';
export const DEFAULT_DESCRIPTION = 'No description provided.';
export const DEFAULT_SAVE_FORMAT = 'json';

/** Used in errors raised before a name is known */
const UNNAMED_PLUGIN = '<unnamed>';

const identitySchema = z.object({
  name: z.string(),
  version: z.string(),
  author: z.string().default(DEFAULT_AUTHOR),
  description: z.string().default(DEFAULT_DESCRIPTION),
  dependencies: z.record(z.string(), z.string()).default({}),
  saveFormat: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, 'saveFormat must be a bare format name')
    .default(DEFAULT_SAVE_FORMAT),
});

/**
 * Validate declared identity and apply defaults.
 *
 * @throws IdentityError if name or version is missing or blank
 * @throws ValidationError if any other field has the wrong shape
 */
export function resolveIdentity(input: PluginIdentityInput): PluginIdentity {
  const name = input.name;
  if (name === undefined || name.trim() === '') {
    throw new IdentityError(UNNAMED_PLUGIN, 'name');
  }
  if (input.version === undefined || input.version.trim() === '') {
    throw new IdentityError(name, 'version');
  }

  const parsed = identitySchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ValidationError(name, `invalid identity (${detail})`);
  }

  return Object.freeze({
    ...parsed.data,
    dependencies: Object.freeze({ ...parsed.data.dependencies }),
  });
}

/**
 * Derive plugin paths. The work dir is named after the source directory,
 * not the declared plugin name.
 */
export function resolvePaths(
  identity: PluginIdentity,
  sourceFile: string,
  persistentRoot: string
): PluginPaths {
  const absoluteSource = resolve(sourceFile);
  const sourceDir = dirname(absoluteSource);
  const dirName = basename(sourceDir);
  const workDir = join(resolve(persistentRoot), dirName);

  return Object.freeze({
    sourceFile: absoluteSource,
    sourceDir,
    dirName,
    workDir,
    dataFile: join(workDir, `${dirName}.${identity.saveFormat}`),
  });
}

/**
 * Create the work dir if needed and report whether this is a first load.
 *
 * First load means the work dir or the data file did not exist before
 * this call.
 *
 * @throws WorkspaceError if the work dir path exists but is not a directory
 */
export function prepareWorkspace(paths: PluginPaths, pluginName: string): boolean {
  let firstLoad = false;

  if (!existsSync(paths.workDir)) {
    mkdirSync(paths.workDir, { recursive: true });
    firstLoad = true;
  } else if (!existsSync(paths.dataFile)) {
    firstLoad = true;
  }

  if (!statSync(paths.workDir).isDirectory()) {
    throw new WorkspaceError(pluginName, paths.workDir);
  }

  return firstLoad;
}
