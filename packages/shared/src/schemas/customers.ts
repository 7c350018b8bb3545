// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import { z } from "zod";
import { DateTimeSchema, PaginationQuerySchema, SearchTermSchema, UUID } from "./common";

const CustomerNameSchema = z.string().trim().min(1).max(191);
const CustomerEmailSchema = z.string().trim().email().max(191);
const CustomerPhoneSchema = z.string().trim().min(1).max(32);

export const CustomerCreateRequestSchema = z.object({
  name: CustomerNameSchema,
  email: CustomerEmailSchema,
  phone: CustomerPhoneSchema
});

export const CustomerUpdateRequestSchema = z
  .object({
    name: CustomerNameSchema.optional(),
    email: CustomerEmailSchema.optional(),
    phone: CustomerPhoneSchema.optional()
  })
  .refine((value) => Object.keys(value).length > 0, {
    message: "At least one field must be provided"
  });

export const CustomerSchema = z.object({
  id: UUID,
  name: z.string().min(1),
  email: z.string().email(),
  phone: z.string().min(1),
  created_at: DateTimeSchema,
  updated_at: DateTimeSchema
});

export const CustomerListQuerySchema = PaginationQuerySchema.extend({
  query: SearchTermSchema
});

export type CustomerCreateRequest = z.infer<typeof CustomerCreateRequestSchema>;
export type CustomerUpdateRequest = z.infer<typeof CustomerUpdateRequestSchema>;
export type Customer = z.infer<typeof CustomerSchema>;
export type CustomerListQuery = z.infer<typeof CustomerListQuerySchema>;
