// Barrel exports for tab assembly and chunk naming

export { parseGroupPath, groupPathKey, GROUP_PATH_SEPARATOR } from './group-path.js';
export type { TabEntry, GroupNode, TabTree } from './group-tree.js';
export { assembleTabs, directItems, childGroups, flattenTabs, findGroup, mapTabs } from './group-tree.js';
export {
  sanitizeChunkName,
  deriveBaseName,
  ChunkNameRegistry,
  MAX_CHUNK_NAME_LENGTH,
} from './chunk-namer.js';
