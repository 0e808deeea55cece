/**
 * Zod schema for build options.
 *
 * Every field has a `.default()`, so `BuildOptionsSchema.parse({})` is a
 * complete set of options and a config file only names what it changes.
 */

import { z } from 'zod';

export const BuildOptionsSchema = z.object({
  /** Unit id of the first page; later pages are `<base>_p<n>`. */
  baseUnitName: z.string()
    .regex(/^[A-Za-z0-9][A-Za-z0-9_-]*$/, 'Must start with a letter or digit and contain only letters, digits, _ and -')
    .default('index'),
  /** Regenerate every unit regardless of the manifest. */
  force: z.boolean().default(false),
  /** Hash characters in generated filtered-view references. */
  hashPrefixLength: z.number().int().min(4).max(64).default(8),
  /** Maximum length of a sanitized chunk base name. */
  maxChunkNameLength: z.number().int().min(8).max(200).default(50),
  /** Text between page index and page count in navigation. */
  paginationSeparator: z.string().default('of'),
  /**
   * What an unsupported visibility operator costs: the item (`item`,
   * dropped with a diagnostic) or its whole page (`page`).
   */
  visibilityErrors: z.enum(['item', 'page']).default('page'),
  /** Dataset name for items when the collection binds none. */
  defaultDataset: z.string().min(1).default('data'),
  /** Page-level settings handed to the renderer; part of every unit hash. */
  pageConfig: z.record(z.string(), z.unknown()).default({}),
}).strict();

export type BuildOptions = z.output<typeof BuildOptionsSchema>;

/** Options as a caller or config file gives them; every field optional. */
export type BuildOptionsInput = z.input<typeof BuildOptionsSchema>;

export const DEFAULT_BUILD_OPTIONS: BuildOptions = BuildOptionsSchema.parse({});
