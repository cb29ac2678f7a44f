import type { DocumentKind } from '../document/kinds.js';
import type { DetectedDocument, DetectionContext, DetectionInput } from '../detection/result.js';

/**
 * A DocumentHandler teaches the dispatcher one document kind.
 *
 * `matches` is a cheap shape test (length, character classes).
 * `inspect` runs the full validation and returns undefined when it fails.
 */
export interface DocumentHandler<K extends DocumentKind = DocumentKind> {
  readonly kind: K;

  /** Human-readable name */
  readonly name: string;

  readonly description?: string;

  matches(input: DetectionInput, context: DetectionContext): boolean;

  inspect(input: DetectionInput, context: DetectionContext): DetectedDocument<K> | undefined;
}

/**
 * Any handler, keeping the correlation between `kind` and its result
 */
export type AnyDocumentHandler = { [K in DocumentKind]: DocumentHandler<K> }[DocumentKind];

/**
 * Handler registration options
 */
export interface HandlerRegistrationOptions {
  /**
   * Position in the detection order.
   * Lower numbers are tried first.
   */
  priority?: number;

  /**
   * Mark as enabled/disabled
   */
  enabled?: boolean;

  /**
   * Alternative names for lookup (e.g. 'titulo-eleitor' for 'voter-id')
   */
  aliases?: string[];
}

/**
 * Registered handler entry
 */
export interface RegisteredHandler {
  handler: AnyDocumentHandler;
  options: HandlerRegistrationOptions;
  registeredAt: string;
}

/**
 * DocumentRegistry holds the handlers the dispatcher tries.
 *
 * @example
 * ```typescript
 * const registry = createDefaultRegistry();
 * registry.get('titulo-eleitor')?.handler.kind; // 'voter-id'
 * registry.list({ enabled: true }).map((r) => r.handler.kind);
 * ```
 */
export interface DocumentRegistry {
  /**
   * @throws If the kind or one of the aliases is already registered
   */
  register(handler: AnyDocumentHandler, options?: HandlerRegistrationOptions): void;

  /**
   * @returns True if the kind was found and removed
   */
  unregister(kind: DocumentKind): boolean;

  /**
   * Look up by kind or alias
   */
  get(kindOrAlias: string): RegisteredHandler | undefined;

  has(kindOrAlias: string): boolean;

  /**
   * Registered handlers sorted by priority
   */
  list(options?: { enabled?: boolean }): RegisteredHandler[];

  clear(): void;

  size(): number;
}
