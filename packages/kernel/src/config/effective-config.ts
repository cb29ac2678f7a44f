import { z } from 'zod';
import { DOCUMENT_KINDS, type DocumentKind } from '@brdocs/contracts';
import { ConfigurationError, isLogLevel, type LogLevel } from '@brdocs/shared';

/**
 * Dispatcher settings.
 */
export interface DetectorConfig {
  /** Kinds the dispatcher skips */
  disabledKinds: DocumentKind[];
  /** Accept phone numbers prefixed with the `55` country code */
  stripCountryCode: boolean;
}

/**
 * Partial configuration layered over the defaults.
 */
export type DetectorConfigOverrides = Partial<DetectorConfig>;

/**
 * Default dispatcher configuration.
 */
export const DEFAULT_DETECTOR_CONFIG: Readonly<DetectorConfig> = {
  disabledKinds: [],
  stripCountryCode: true,
};

/**
 * Effective configuration result.
 */
export interface EffectiveConfig {
  /** Merged configuration */
  config: DetectorConfig;
  /** Sources that contributed to this config, lowest precedence first */
  sources: ('default' | 'env' | 'override')[];
}

const overridesSchema = z
  .object({
    disabledKinds: z.array(z.enum(DOCUMENT_KINDS)).optional(),
    stripCountryCode: z.boolean().optional(),
  })
  .strict();

function parseOverrides(input: unknown, source: 'env' | 'override'): DetectorConfigOverrides {
  const result = overridesSchema.safeParse(input);
  if (result.success) {
    const overrides: DetectorConfigOverrides = {};
    if (result.data.disabledKinds !== undefined) {
      overrides.disabledKinds = result.data.disabledKinds;
    }
    if (result.data.stripCountryCode !== undefined) {
      overrides.stripCountryCode = result.data.stripCountryCode;
    }
    return overrides;
  }

  const issues = result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
  const first = issues[0];
  throw new ConfigurationError(
    `Invalid detector configuration (${source})${first ? `: ${first.path || 'config'}: ${first.message}` : ''}`,
    { source, issues },
  );
}

/**
 * Build effective configuration by merging:
 * 1. Defaults
 * 2. Environment configuration (if provided)
 * 3. Caller overrides (if provided)
 *
 * @throws ConfigurationError when a layer has unknown keys or invalid values
 *
 * @example
 * ```typescript
 * buildEffectiveConfig(undefined, { disabledKinds: ['card'] })
 * // { config: { disabledKinds: ['card'], stripCountryCode: true }, sources: ['default', 'override'] }
 * ```
 */
export function buildEffectiveConfig(
  envConfig?: DetectorConfigOverrides,
  overrides?: DetectorConfigOverrides,
): EffectiveConfig {
  const sources: EffectiveConfig['sources'] = ['default'];
  const config: DetectorConfig = {
    disabledKinds: [...DEFAULT_DETECTOR_CONFIG.disabledKinds],
    stripCountryCode: DEFAULT_DETECTOR_CONFIG.stripCountryCode,
  };

  const layers: ['env' | 'override', DetectorConfigOverrides | undefined][] = [
    ['env', envConfig],
    ['override', overrides],
  ];

  for (const [source, layer] of layers) {
    if (layer === undefined) continue;
    const parsed = parseOverrides(layer, source);
    sources.push(source);
    if (parsed.disabledKinds !== undefined) {
      config.disabledKinds = [...new Set(parsed.disabledKinds)];
    }
    if (parsed.stripCountryCode !== undefined) {
      config.stripCountryCode = parsed.stripCountryCode;
    }
  }

  return { config, sources };
}

/**
 * Settings read from the environment.
 */
export interface EnvSettings {
  /** Detector overrides; undefined when no detector variable is set */
  config: DetectorConfigOverrides | undefined;
  logLevel: LogLevel | undefined;
}

const BOOLEAN_VALUES: Readonly<Record<string, boolean>> = {
  true: true,
  '1': true,
  yes: true,
  false: false,
  '0': false,
  no: false,
};

function isDocumentKind(value: string): value is DocumentKind {
  return DOCUMENT_KINDS.some((kind) => kind === value);
}

/**
 * Read `BRDOCS_LOG_LEVEL`, `BRDOCS_DISABLED_KINDS` (comma-separated kinds)
 * and `BRDOCS_STRIP_COUNTRY_CODE` (true/false).
 *
 * @throws ConfigurationError naming the variable with an invalid value
 */
export function loadConfigFromEnv(env: Record<string, string | undefined> = process.env): EnvSettings {
  const config: DetectorConfigOverrides = {};
  let hasConfig = false;

  const disabled = env['BRDOCS_DISABLED_KINDS'];
  if (disabled !== undefined && disabled.trim() !== '') {
    const kinds = disabled
      .split(',')
      .map((kind) => kind.trim().toLowerCase())
      .filter((kind) => kind !== '');
    const unknown = kinds.filter((kind) => !isDocumentKind(kind));
    if (unknown.length > 0) {
      throw new ConfigurationError(`BRDOCS_DISABLED_KINDS: unknown document kind '${unknown.join("', '")}'`, {
        variable: 'BRDOCS_DISABLED_KINDS',
        allowed: DOCUMENT_KINDS,
      });
    }
    config.disabledKinds = kinds.filter(isDocumentKind);
    hasConfig = true;
  }

  const strip = env['BRDOCS_STRIP_COUNTRY_CODE'];
  if (strip !== undefined && strip.trim() !== '') {
    const value = BOOLEAN_VALUES[strip.trim().toLowerCase()];
    if (value === undefined) {
      throw new ConfigurationError(`BRDOCS_STRIP_COUNTRY_CODE: expected true or false, got '${strip}'`, {
        variable: 'BRDOCS_STRIP_COUNTRY_CODE',
      });
    }
    config.stripCountryCode = value;
    hasConfig = true;
  }

  const level = env['BRDOCS_LOG_LEVEL']?.trim().toLowerCase();
  let logLevel: LogLevel | undefined;
  if (level !== undefined && level !== '') {
    if (!isLogLevel(level)) {
      throw new ConfigurationError(`BRDOCS_LOG_LEVEL: unknown log level '${level}'`, {
        variable: 'BRDOCS_LOG_LEVEL',
      });
    }
    logLevel = level;
  }

  return { config: hasConfig ? config : undefined, logLevel };
}
