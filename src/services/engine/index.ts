// Path: src/services/engine/index.ts
// Public API for the engine facade

export { VpnEngine, type EngineDeps } from './engine.js';
export type {
  CommandMap,
  CommandName,
  CommandInput,
  CommandOutput,
  EngineResult,
  InstallInput,
  InstallOutput,
  InstanceStatus,
  UserOutput,
} from './types.js';
