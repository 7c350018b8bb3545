// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import { z } from "zod";

export const UUID = z.string().uuid();

// Column limits: INT for quantities, DECIMAL(12,2) for money.
export const MAX_QUANTITY = 2147483647;
export const MAX_MONEY_AMOUNT = 9999999999.99;

export const MoneySchema = z.number().finite();
export const MoneyInputSchema = z.coerce.number().finite().max(MAX_MONEY_AMOUNT);
export const MoneyInputNonNegativeSchema = MoneyInputSchema.pipe(MoneySchema.nonnegative());

export const DateOnlySchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/);
export const DateTimeSchema = z.string().datetime();

export const PaginationQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).optional(),
  offset: z.coerce.number().int().min(0).default(0)
});

/**
 * Free-text search; blank strings are treated as absent.
 */
export const SearchTermSchema = z
  .string()
  .trim()
  .max(191)
  .optional()
  .transform((value) => {
    if (!value) {
      return undefined;
    }

    return value;
  });

export const optionalTextSchema = (maxLength: number) =>
  z
    .string()
    .trim()
    .max(maxLength)
    .nullable()
    .optional()
    .transform((value) => {
      if (!value) {
        return null;
      }

      return value;
    });

export const nullableTextSchema = (maxLength: number) =>
  z
    .string()
    .trim()
    .max(maxLength)
    .nullable()
    .transform((value) => {
      if (!value) {
        return null;
      }

      return value;
    });

export type PaginationQuery = z.infer<typeof PaginationQuerySchema>;
