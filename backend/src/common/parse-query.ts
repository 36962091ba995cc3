import { BadRequestException } from '@nestjs/common';
import { z } from 'zod';

/**
 * Raw query or route params object as Express hands it to a controller
 */
export type RawQuery = Record<string, string | string[] | undefined>;

/**
 * Validate a query string or route params against a schema.
 *
 * @throws BadRequestException listing every failing parameter
 */
export function parseQuery<S extends z.ZodTypeAny>(
  schema: S,
  query: RawQuery,
): z.output<S> {
  const result = schema.safeParse(query);
  if (!result.success) {
    throw new BadRequestException(
      result.error.issues.map(
        (issue) => `${issue.path.join('.') || 'query'}: ${issue.message}`,
      ),
    );
  }
  return result.data;
}
