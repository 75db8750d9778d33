// Path: src/services/config-store/index.ts
// Public API for the config document store

export type { ClientEntry, Inbound, InboundConfig, RealitySettings, StreamSettings } from './types.js';
export { REALITY_FLOW } from './types.js';
export * from './document.js';
export { CACHE_FILES, protocolLabel, type CacheName, type CachedScalars } from './caches.js';
export {
  ConfigDocumentStore,
  loadConfigDocument,
  saveConfigDocument,
  serializeConfigDocument,
  backupConfigDocument,
  backupStamp,
  listBackups,
} from './store.js';
