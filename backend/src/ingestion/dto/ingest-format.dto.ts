import { z } from 'zod';

export const INGEST_FORMATS = ['wide', 'long', 'auto'] as const;

export const IngestParamsSchema = z.object({
  format: z.enum(INGEST_FORMATS, {
    errorMap: () => ({
      message: `expected one of ${INGEST_FORMATS.join(', ')}`,
    }),
  }),
});

/**
 * Layout named by the upload route. `auto` detects it per file from the
 * header; `wide` and `long` pick that parser directly.
 */
export type IngestFormat = z.infer<typeof IngestParamsSchema>['format'];
