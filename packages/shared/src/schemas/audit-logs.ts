// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import { z } from "zod";

/**
 * Audit log action types
 */
export const AuditActionSchema = z.enum(["CREATE", "UPDATE", "DELETE", "CANCEL"]);

export type AuditAction = z.infer<typeof AuditActionSchema>;

/**
 * Audit log entity types
 */
export const AuditEntityTypeSchema = z.enum(["product", "customer", "inventory_movement", "sale"]);

export type AuditEntityType = z.infer<typeof AuditEntityTypeSchema>;

/**
 * Audit log result
 */
export const AuditResultSchema = z.enum(["SUCCESS", "FAIL"]);

export type AuditResult = z.infer<typeof AuditResultSchema>;

/**
 * Audit log entry request (for creating audit logs)
 */
export const AuditLogEntryRequestSchema = z.object({
  entity_type: AuditEntityTypeSchema,
  entity_id: z.string(),
  action: AuditActionSchema,
  result: AuditResultSchema.default("SUCCESS"),
  correlation_id: z.string().max(128).nullable().optional(),
  payload: z.record(z.unknown()).optional(),
  changes: z
    .object({
      before: z.record(z.unknown()),
      after: z.record(z.unknown())
    })
    .optional()
});

export type AuditLogEntryRequest = z.infer<typeof AuditLogEntryRequestSchema>;
