import { z } from 'zod';

/**
 * Response shapes of the Growatt web API
 *
 * Only the fields the adapter reads are declared; everything else the server
 * sends passes through untouched. Growatt mixes numbers, numeric strings and
 * nulls freely, so readings go through `reading`.
 */

export const reading = z
  .union([z.number(), z.string(), z.null()])
  .transform((value): number | null => {
    if (value === null) return null;
    const parsed = typeof value === 'number' ? value : value.trim() === '' ? NaN : Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  });

const identifier = z.union([z.string(), z.number()]).transform(String);

const pageCount = z.coerce.number().int().nonnegative();

export const loginResponseSchema = z
  .object({
    result: z.coerce.number(),
    msg: z.string().optional(),
  })
  .passthrough();

export const plantListResponseSchema = z
  .object({
    pages: pageCount,
    datas: z.array(
      z
        .object({
          id: identifier,
          plantName: z.string(),
        })
        .passthrough()
    ),
  })
  .passthrough();

export const plantDevicesResponseSchema = z
  .object({
    result: z.coerce.number(),
    obj: z
      .object({
        pages: pageCount,
        datas: z.array(
          z
            .object({
              sn: identifier,
              deviceTypeName: z.string(),
              alias: z.string().nullish(),
            })
            .passthrough()
        ),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export const deviceHistoryResponseSchema = z
  .object({
    result: z.coerce.number().optional(),
    obj: z
      .object({
        datas: z.array(z.record(z.unknown())),
        start: z.coerce.number().int(),
        haveNext: z.boolean(),
      })
      .passthrough(),
  })
  .passthrough();

export const chartResponseSchema = z
  .object({
    result: z.coerce.number().optional(),
    obj: z.array(
      z
        .object({
          datas: z
            .object({
              pac: z.array(reading).optional(),
              energy: z.array(reading).optional(),
            })
            .passthrough(),
        })
        .passthrough()
    ),
  })
  .passthrough();

export type ChartResponse = z.infer<typeof chartResponseSchema>;
