import type {
  AnyDocumentHandler,
  DocumentKind,
  DocumentRegistry,
  HandlerRegistrationOptions,
  RegisteredHandler,
} from '@brdocs/contracts';
import { DuplicateRegistrationError } from '@brdocs/shared';

/**
 * Implementation of the document registry.
 */
export class DocumentRegistryImpl implements DocumentRegistry {
  private handlers: Map<string, RegisteredHandler> = new Map();
  private aliases: Map<string, string> = new Map();

  register(handler: AnyDocumentHandler, options: HandlerRegistrationOptions = {}): void {
    if (this.handlers.has(handler.kind) || this.aliases.has(handler.kind)) {
      throw new DuplicateRegistrationError(handler.kind, 'kind');
    }

    const aliases = options.aliases ?? [];
    for (const alias of aliases) {
      if (this.aliases.has(alias) || this.handlers.has(alias) || alias === handler.kind) {
        throw new DuplicateRegistrationError(alias, 'alias');
      }
    }

    this.handlers.set(handler.kind, {
      handler,
      options,
      registeredAt: new Date().toISOString(),
    });

    // Register aliases
    for (const alias of aliases) {
      this.aliases.set(alias, handler.kind);
    }
  }

  unregister(kind: DocumentKind): boolean {
    const registered = this.handlers.get(kind);
    if (!registered) return false;

    // Remove aliases
    for (const alias of registered.options.aliases ?? []) {
      this.aliases.delete(alias);
    }

    return this.handlers.delete(kind);
  }

  get(kindOrAlias: string): RegisteredHandler | undefined {
    const direct = this.handlers.get(kindOrAlias);
    if (direct) return direct;

    const resolved = this.aliases.get(kindOrAlias);
    return resolved === undefined ? undefined : this.handlers.get(resolved);
  }

  has(kindOrAlias: string): boolean {
    return this.handlers.has(kindOrAlias) || this.aliases.has(kindOrAlias);
  }

  list(options?: { enabled?: boolean }): RegisteredHandler[] {
    let result = Array.from(this.handlers.values());

    if (options?.enabled !== undefined) {
      result = result.filter((r) => (r.options.enabled ?? true) === options.enabled);
    }

    // Sort by priority; Array.prototype.sort is stable, so ties keep registration order
    return result.sort((a, b) => (a.options.priority ?? 0) - (b.options.priority ?? 0));
  }

  clear(): void {
    this.handlers.clear();
    this.aliases.clear();
  }

  size(): number {
    return this.handlers.size;
  }
}
