// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import { z } from "zod";
import { DateTimeSchema, MAX_QUANTITY, PaginationQuerySchema, SearchTermSchema, UUID } from "./common";
import { UnitOfMeasureSchema } from "./products";

/**
 * Movement types
 *
 * purchase:      stock received from a supplier (credit)
 * sale:          stock leaving with a sale (debit)
 * sale_reversal: compensates a sale movement when the sale is canceled (credit)
 */
export const MovementTypeSchema = z.enum(["purchase", "sale", "sale_reversal"]);

const MovementQuantitySchema = z.coerce.number().int().positive().max(MAX_QUANTITY);

export const InventoryRecordSchema = z.object({
  id: UUID,
  product_id: UUID,
  product_name: z.string(),
  product_description: z.string().nullable(),
  unit_of_measure: UnitOfMeasureSchema,
  quantity: z.number().int(),
  last_update: DateTimeSchema
});

export const InventoryMovementSchema = z.object({
  id: UUID,
  product_id: UUID,
  product_name: z.string(),
  quantity: z.number().int().positive(),
  movement_type: MovementTypeSchema,
  related_id: UUID.nullable(),
  created_at: DateTimeSchema
});

// Staff only enter purchases; sale and sale_reversal movements come from the sales ledger.
export const InventoryMovementCreateRequestSchema = z.object({
  product_id: UUID,
  quantity: MovementQuantitySchema,
  movement_type: z.literal("purchase").default("purchase")
});

export const InventoryListQuerySchema = PaginationQuerySchema.extend({
  query: SearchTermSchema
});

export const InventoryMovementListQuerySchema = PaginationQuerySchema.extend({
  query: SearchTermSchema,
  product_id: UUID.optional(),
  movement_type: MovementTypeSchema.optional(),
  related_id: UUID.optional()
});

export type MovementType = z.infer<typeof MovementTypeSchema>;
export type InventoryRecord = z.infer<typeof InventoryRecordSchema>;
export type InventoryMovement = z.infer<typeof InventoryMovementSchema>;
export type InventoryMovementCreateRequest = z.infer<typeof InventoryMovementCreateRequestSchema>;
export type InventoryListQuery = z.infer<typeof InventoryListQuerySchema>;
export type InventoryMovementListQuery = z.infer<typeof InventoryMovementListQuerySchema>;
