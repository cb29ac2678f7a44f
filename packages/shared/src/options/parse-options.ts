import type { ZodTypeAny, output } from 'zod';
import { InvalidArgumentError } from '../errors/errors.js';

/**
 * Validate generator options against a zod schema.
 *
 * @param schema - Schema producing the resolved options (defaults applied)
 * @param input - Options as passed by the caller
 * @param operation - Name used in the error message (e.g. 'generateCnpj')
 * @throws InvalidArgumentError naming the first offending option
 *
 * @example
 * ```typescript
 * const schema = z.object({ branch: z.number().int().min(1).max(9999).default(1) });
 * parseOptions(schema, { branch: 0 }, 'generateCnpj');
 * // InvalidArgumentError: generateCnpj: invalid option 'branch': Number must be greater than or equal to 1
 * ```
 */
export function parseOptions<Schema extends ZodTypeAny>(
  schema: Schema,
  input: unknown,
  operation: string,
): output<Schema> {
  const result = schema.safeParse(input ?? {});
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  const first = issues[0];
  const argument = first?.path || 'options';
  const detail = first ? `: ${first.message}` : '';

  throw new InvalidArgumentError(argument, `${operation}: invalid option '${argument}'${detail}`, {
    operation,
    issues,
  });
}
