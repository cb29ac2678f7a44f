import type {
  DetectionContext,
  DetectionInput,
  DetectionResult,
  DocumentKind,
  DocumentRegistry,
} from '@brdocs/contracts';
import { onlyAlphanumeric, onlyDigits, silentLogger, type Logger } from '@brdocs/shared';
import { buildEffectiveConfig, type DetectorConfigOverrides } from '../config/effective-config.js';
import { createDefaultRegistry } from './default-registry.js';

/**
 * Options for autoDetect
 */
export interface AutoDetectOptions {
  /** Handlers to try. Defaults to the built-in registry. */
  registry?: DocumentRegistry;
  /** Merged over the default detector configuration */
  config?: DetectorConfigOverrides;
  /** Receives debug lines about the candidates tried */
  logger?: Logger;
}

let defaultRegistry: DocumentRegistry | undefined;

function getDefaultRegistry(): DocumentRegistry {
  defaultRegistry ??= createDefaultRegistry();
  return defaultRegistry;
}

/**
 * Pre-compute the views of the input every handler reads.
 */
export function toDetectionInput(value: string): DetectionInput {
  return { raw: value, digits: onlyDigits(value), alphanumeric: onlyAlphanumeric(value) };
}

/**
 * Infer the document type of an unlabeled string.
 *
 * Enabled handlers are tried by priority. The first one whose shape
 * matches and whose validation passes wins. When none passes, the result
 * is `unknown` and lists the kinds whose shape matched.
 *
 * @example
 * ```typescript
 * autoDetect('123.456.789-09')
 * // { type: 'cpf', valid: true, input: '123.456.789-09', normalized: '12345678909',
 * //   formatted: '123.456.789-09', details: { originRegion: 'PR/SC' } }
 *
 * autoDetect('ABC1D23').details // { variant: 'mercosul' }
 * ```
 */
export function autoDetect(value: string, options: AutoDetectOptions = {}): DetectionResult {
  const registry = options.registry ?? getDefaultRegistry();
  const logger = options.logger ?? silentLogger;
  const { config } = buildEffectiveConfig(undefined, options.config);

  const input = toDetectionInput(typeof value === 'string' ? value : '');
  const context: DetectionContext = { stripCountryCode: config.stripCountryCode };
  const disabled = new Set<DocumentKind>(config.disabledKinds);
  const candidates: DocumentKind[] = [];

  for (const { handler } of registry.list({ enabled: true })) {
    if (disabled.has(handler.kind) || !handler.matches(input, context)) {
      continue;
    }

    candidates.push(handler.kind);
    const result = handler.inspect(input, context);
    if (result !== undefined) {
      logger.debug('Document detected', { kind: handler.kind, tried: candidates });
      return result;
    }
  }

  logger.debug('No document kind validated the input', { candidates, length: input.raw.length });
  return { type: 'unknown', valid: false, input: input.raw, candidates };
}
