/**
 * @brdocs/kernel
 *
 * Document registry and the type-sniffing dispatcher.
 *
 * @packageDocumentation
 */

export { DocumentRegistryImpl } from './registry/registry.js';

export { autoDetect, toDetectionInput } from './detect/auto-detect.js';
export type { AutoDetectOptions } from './detect/auto-detect.js';
export { createDefaultRegistry, DEFAULT_HANDLERS, PRIORITY_STEP } from './detect/default-registry.js';
export {
  cpfHandler,
  cnhHandler,
  pisHandler,
  cnpjHandler,
  voterIdHandler,
  cepHandler,
  phoneHandler,
  cardHandler,
  plateHandler,
} from './detect/handlers.js';

export {
  buildEffectiveConfig,
  loadConfigFromEnv,
  DEFAULT_DETECTOR_CONFIG,
} from './config/effective-config.js';
export type {
  DetectorConfig,
  DetectorConfigOverrides,
  EffectiveConfig,
  EnvSettings,
} from './config/effective-config.js';

// Re-export commonly used types
export type { DetectionResult, DocumentRegistry, DocumentHandler } from '@brdocs/contracts';
