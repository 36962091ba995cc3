import { z } from 'zod';
import { POLLUTANTS, normalizePollutant } from '../../compliance';
import { DateBound, parseDateBound } from '../../readings/date-bounds';

const PollutantParam = z
  .preprocess(
    (value) =>
      typeof value === 'string' ? (normalizePollutant(value) ?? value) : value,
    z.enum(POLLUTANTS),
  )
  .default('PM2.5');

const dateParam = (bound: DateBound) =>
  z.string().transform((value, ctx) => {
    const date = parseDateBound(value, bound);
    if (!date) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid date: ${value}`,
      });
      return z.NEVER;
    }
    return date;
  });

const UtcOffsetParam = z.coerce.number().int().min(-720).max(840).optional();

const RangeShape = {
  start: dateParam('start').optional(),
  // a bare date includes that whole day
  end: dateParam('end').optional(),
};

function startBeforeEnd(range: { start?: Date; end?: Date }): boolean {
  return !range.start || !range.end || range.start <= range.end;
}

const RANGE_ORDER_ISSUE = {
  message: 'start must not be after end',
  path: ['start'],
};

export const RangeQuerySchema = z
  .object(RangeShape)
  .refine(startBeforeEnd, RANGE_ORDER_ISSUE);

export const ComplianceQuerySchema = z
  .object({
    ...RangeShape,
    pollutant: PollutantParam,
    // one leap year
    windowHours: z.coerce.number().int().min(1).max(8784).default(24),
    utcOffsetMinutes: UtcOffsetParam,
    impute: z
      .enum(['true', 'false'])
      .default('true')
      .transform((value) => value === 'true'),
  })
  .refine(startBeforeEnd, RANGE_ORDER_ISSUE);

export const SummaryQuerySchema = z
  .object({
    ...RangeShape,
    pollutant: PollutantParam,
    cities: z
      .string()
      .transform((value) =>
        value
          .split(',')
          .map((city) => city.trim())
          .filter((city) => city.length > 0),
      )
      .pipe(z.array(z.string()).min(1, 'at least one city is required')),
  })
  .refine(startBeforeEnd, RANGE_ORDER_ISSUE);

export const HeatmapQuerySchema = z
  .object({
    ...RangeShape,
    pollutant: PollutantParam,
    utcOffsetMinutes: UtcOffsetParam,
  })
  .refine(startBeforeEnd, RANGE_ORDER_ISSUE);

export const DistributionQuerySchema = z
  .object({
    ...RangeShape,
    pollutant: PollutantParam,
    bins: z.coerce.number().int().min(1).max(100).default(20),
  })
  .refine(startBeforeEnd, RANGE_ORDER_ISSUE);

export type RangeQuery = z.infer<typeof RangeQuerySchema>;
export type ComplianceQuery = z.infer<typeof ComplianceQuerySchema>;
export type SummaryQuery = z.infer<typeof SummaryQuerySchema>;
export type HeatmapQuery = z.infer<typeof HeatmapQuerySchema>;
export type DistributionQuery = z.infer<typeof DistributionQuerySchema>;
