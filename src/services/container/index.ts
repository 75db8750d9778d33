// Path: src/services/container/index.ts
// Public API for container lifecycle management

export { DockerComposeRuntime, type ContainerRuntime } from './runtime.js';
export { reconcileDescriptor, renderDescriptor, dumpDescriptor, type DescriptorReconcileResult } from './descriptor.js';
export {
  RuntimeHealthSignals,
  describeProbe,
  READY_MARKERS,
  type HealthProbeResult,
  type HealthSignals,
} from './health.js';
export { ContainerLifecycleManager, HEALTH_HISTORY_FILE, type LifecycleOptions, type RestartReport } from './lifecycle.js';
