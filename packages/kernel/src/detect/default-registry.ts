import type { AnyDocumentHandler, DocumentRegistry } from '@brdocs/contracts';
import { DocumentRegistryImpl } from '../registry/registry.js';
import {
  cardHandler,
  cepHandler,
  cnhHandler,
  cnpjHandler,
  cpfHandler,
  phoneHandler,
  pisHandler,
  plateHandler,
  voterIdHandler,
} from './handlers.js';

/**
 * Built-in handlers in detection order, with their lookup aliases.
 * Identifiers come before the broader shapes (CEP, phone, card, plate).
 */
export const DEFAULT_HANDLERS: readonly { handler: AnyDocumentHandler; aliases: string[] }[] = [
  { handler: cpfHandler, aliases: [] },
  { handler: cnhHandler, aliases: ['carteira-motorista'] },
  { handler: pisHandler, aliases: ['pasep', 'nit'] },
  { handler: cnpjHandler, aliases: [] },
  { handler: voterIdHandler, aliases: ['titulo-eleitor'] },
  { handler: cepHandler, aliases: [] },
  { handler: phoneHandler, aliases: ['telefone'] },
  { handler: cardHandler, aliases: ['cartao'] },
  { handler: plateHandler, aliases: ['placa'] },
];

/** Gap between consecutive built-in priorities, leaving room for custom handlers */
export const PRIORITY_STEP = 10;

/**
 * Registry holding every built-in handler.
 *
 * @example
 * ```typescript
 * const registry = createDefaultRegistry();
 * registry.get('placa')?.handler.kind; // 'plate'
 * ```
 */
export function createDefaultRegistry(): DocumentRegistry {
  const registry = new DocumentRegistryImpl();
  DEFAULT_HANDLERS.forEach(({ handler, aliases }, index) => {
    registry.register(handler, { priority: (index + 1) * PRIORITY_STEP, aliases });
  });
  return registry;
}
