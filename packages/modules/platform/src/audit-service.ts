// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import type {
  AuditAction,
  AuditEntityType,
  AuditLogEntryRequest,
  AuditResult
} from "@vinstock/shared";

type AuditPayload = Record<string, unknown>;

/**
 * Storage for audit entries. Implementations write through the same
 * connection as the operation being audited, so an entry commits or rolls
 * back together with it.
 */
export interface AuditRepository {
  insertAuditLog(entry: AuditLogEntryRequest): Promise<void>;
}

/**
 * Context for audit operations
 */
export interface AuditContext {
  correlation_id?: string | null;
}

/**
 * AuditService
 * Framework-agnostic service for audit logging
 *
 * Records every catalog, inventory and sales mutation.
 */
export class AuditService {
  constructor(
    private readonly repository: AuditRepository,
    private readonly context: AuditContext = {}
  ) {}

  /**
   * Log entity creation
   */
  async logCreate(entityType: AuditEntityType, entityId: string, payload: AuditPayload): Promise<void> {
    return this.log({
      entity_type: entityType,
      entity_id: entityId,
      action: "CREATE",
      result: "SUCCESS",
      payload
    });
  }

  /**
   * Log entity update with before/after changes
   */
  async logUpdate(
    entityType: AuditEntityType,
    entityId: string,
    before: AuditPayload,
    after: AuditPayload
  ): Promise<void> {
    return this.log({
      entity_type: entityType,
      entity_id: entityId,
      action: "UPDATE",
      result: "SUCCESS",
      changes: this.computeChanges(before, after)
    });
  }

  async logDelete(entityType: AuditEntityType, entityId: string, payload: AuditPayload): Promise<void> {
    return this.log({
      entity_type: entityType,
      entity_id: entityId,
      action: "DELETE",
      result: "SUCCESS",
      payload
    });
  }

  /**
   * Generic log method for custom actions
   */
  async logAction(
    entityType: AuditEntityType,
    entityId: string,
    action: AuditAction,
    payload: AuditPayload = {},
    result: AuditResult = "SUCCESS"
  ): Promise<void> {
    return this.log({
      entity_type: entityType,
      entity_id: entityId,
      action,
      result,
      payload
    });
  }

  private async log(entry: AuditLogEntryRequest): Promise<void> {
    await this.repository.insertAuditLog({
      ...entry,
      correlation_id: this.context.correlation_id ?? null
    });
  }

  /**
   * Only the fields that changed, with their before/after values
   */
  private computeChanges(
    before: AuditPayload,
    after: AuditPayload
  ): { before: AuditPayload; after: AuditPayload } {
    const changedBefore: AuditPayload = {};
    const changedAfter: AuditPayload = {};

    for (const key of Object.keys(after)) {
      if (JSON.stringify(before[key]) !== JSON.stringify(after[key])) {
        changedBefore[key] = before[key];
        changedAfter[key] = after[key];
      }
    }

    for (const key of Object.keys(before)) {
      if (!(key in after)) {
        changedBefore[key] = before[key];
        changedAfter[key] = undefined;
      }
    }

    return {
      before: changedBefore,
      after: changedAfter
    };
  }
}
