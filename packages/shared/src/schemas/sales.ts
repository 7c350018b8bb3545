// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import { z } from "zod";
import {
  DateOnlySchema,
  DateTimeSchema,
  MAX_QUANTITY,
  MoneySchema,
  PaginationQuerySchema,
  SearchTermSchema,
  UUID
} from "./common";

export const SaleStatusSchema = z.enum(["pending", "paid", "delivered", "canceled"]);

export const SaleItemInputSchema = z.object({
  product_id: z.string().trim().optional(),
  quantity: z.coerce.number().int().max(MAX_QUANTITY).optional()
});

/**
 * Shape-only parsing. Presence, references, duplicates and quantities are
 * checked by the sale builder so they come back as field errors.
 */
export const SaleCreateRequestSchema = z.object({
  customer_id: z.string().trim().optional(),
  sale_date: DateOnlySchema.optional(),
  // accepted for form compatibility; new sales always start as pending
  status: SaleStatusSchema.optional(),
  items: z.array(SaleItemInputSchema).default([])
});

export const SaleUpdateRequestSchema = z
  .object({
    status: SaleStatusSchema.optional(),
    customer_id: UUID.optional(),
    sale_date: DateOnlySchema.optional()
  })
  .strict()
  .refine((value) => Object.keys(value).length > 0, {
    message: "At least one field must be provided"
  });

export const SaleItemSchema = z.object({
  product_id: UUID,
  product_name: z.string(),
  quantity: z.number().int().positive(),
  unit_price: MoneySchema.nonnegative(),
  subtotal: MoneySchema.nonnegative()
});

export const SaleSchema = z.object({
  id: UUID,
  status: SaleStatusSchema,
  customer_id: UUID,
  customer_name: z.string().nullable(),
  sale_date: DateOnlySchema,
  total_amount: MoneySchema.nonnegative(),
  items: z.array(SaleItemSchema),
  created_at: DateTimeSchema,
  updated_at: DateTimeSchema
});

export const SaleListQuerySchema = PaginationQuerySchema.extend({
  query: SearchTermSchema,
  status: SaleStatusSchema.optional(),
  customer_id: UUID.optional(),
  date_from: DateOnlySchema.optional(),
  date_to: DateOnlySchema.optional()
});

export type SaleStatus = z.infer<typeof SaleStatusSchema>;
export type SaleItemInput = z.infer<typeof SaleItemInputSchema>;
export type SaleCreateRequest = z.infer<typeof SaleCreateRequestSchema>;
export type SaleUpdateRequest = z.infer<typeof SaleUpdateRequestSchema>;
export type SaleItem = z.infer<typeof SaleItemSchema>;
export type Sale = z.infer<typeof SaleSchema>;
export type SaleListQuery = z.infer<typeof SaleListQuerySchema>;
