// Barrel exports for build configuration

export { BuildOptionsSchema, DEFAULT_BUILD_OPTIONS } from './schema.js';
export type { BuildOptions, BuildOptionsInput } from './schema.js';
export {
  readBuildConfig,
  validateBuildConfig,
  resolveBuildOptions,
  BuildConfigError,
  DEFAULT_CONFIG_PATH,
} from './reader.js';
