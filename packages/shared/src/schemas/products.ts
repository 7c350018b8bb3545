// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import { z } from "zod";
import {
  DateTimeSchema,
  MoneyInputNonNegativeSchema,
  MoneySchema,
  nullableTextSchema,
  optionalTextSchema,
  PaginationQuerySchema,
  SearchTermSchema,
  UUID
} from "./common";

/**
 * Wine is sold either by the bottle/case ("unit") or by weight (bulk).
 */
export const UnitOfMeasureSchema = z.enum(["weight", "unit"]);

const ProductNameSchema = z.string().trim().min(1).max(191);

export const ProductCreateRequestSchema = z.object({
  name: ProductNameSchema,
  description: optionalTextSchema(1000),
  price: MoneyInputNonNegativeSchema,
  unit_of_measure: UnitOfMeasureSchema
});

export const ProductUpdateRequestSchema = z
  .object({
    name: ProductNameSchema.optional(),
    description: nullableTextSchema(1000).optional(),
    price: MoneyInputNonNegativeSchema.optional(),
    unit_of_measure: UnitOfMeasureSchema.optional()
  })
  .refine((value) => Object.keys(value).length > 0, {
    message: "At least one field must be provided"
  });

export const ProductSchema = z.object({
  id: UUID,
  name: z.string().min(1),
  description: z.string().nullable(),
  price: MoneySchema.nonnegative(),
  unit_of_measure: UnitOfMeasureSchema,
  created_at: DateTimeSchema,
  updated_at: DateTimeSchema
});

export const ProductListQuerySchema = PaginationQuerySchema.extend({
  query: SearchTermSchema
});

export type UnitOfMeasure = z.infer<typeof UnitOfMeasureSchema>;
export type ProductCreateRequest = z.infer<typeof ProductCreateRequestSchema>;
export type ProductUpdateRequest = z.infer<typeof ProductUpdateRequestSchema>;
export type Product = z.infer<typeof ProductSchema>;
export type ProductListQuery = z.infer<typeof ProductListQuerySchema>;
