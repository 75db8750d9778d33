// Path: src/services/user-registry/index.ts
// Public API for the user credential registry

export type { UserRecord, ServerMeta, UserIdentity } from './types.js';
export { UserCredentialRegistry, parseUserRecord, projectRecord, type RegistryScan } from './registry.js';
export { buildConnectionUri } from './links.js';
export { qrcodeRenderer, type QrRenderer } from './qr.js';
