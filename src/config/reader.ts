/**
 * Build config file reader.
 *
 * Reads a JSON file of build options and validates it with
 * `BuildOptionsSchema`. A missing file means all defaults.
 */

import { readFile } from 'node:fs/promises';
import type { ZodIssue } from 'zod';
import { BuildOptionsSchema, type BuildOptions } from './schema.js';

/** Default path of the build config file. */
export const DEFAULT_CONFIG_PATH = 'panelwright.config.json';

/**
 * Build options could not be read or failed validation.
 */
export class BuildConfigError extends Error {
  override name = 'BuildConfigError' as const;

  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
  }
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.join('.');
  return path ? `${path}: ${issue.message}` : issue.message;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Validate raw options (no I/O).
 */
export function validateBuildConfig(
  raw: unknown,
): { valid: true; config: BuildOptions } | { valid: false; errors: string[] } {
  const result = BuildOptionsSchema.safeParse(raw);
  if (result.success) {
    return { valid: true, config: result.data };
  }
  return { valid: false, errors: result.error.issues.map(formatIssue) };
}

/**
 * Validate raw options and return them with defaults filled in.
 *
 * @throws {BuildConfigError} naming the first invalid field
 */
export function resolveBuildOptions(raw: unknown = {}): BuildOptions {
  const result = BuildOptionsSchema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues;
  const first = issues[0];
  throw new BuildConfigError(
    `Build options validation failed:\n${issues.map(formatIssue).join('\n')}`,
    first.code === 'unrecognized_keys' ? first.keys[0] : first.path.join('.') || undefined,
  );
}

/**
 * Read and validate the build config file.
 *
 * @throws {BuildConfigError} on invalid JSON or options
 */
export async function readBuildConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<BuildOptions> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) {
      return resolveBuildOptions({});
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new BuildConfigError(`Invalid JSON in config file: ${configPath}`);
  }

  return resolveBuildOptions(raw);
}
