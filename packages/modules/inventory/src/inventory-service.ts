// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import { randomUUID } from "node:crypto";
import {
  assertMovementQuantity,
  movementDelta,
  NotFoundError,
  runInTransaction,
  StateError,
  ValidationError,
  type TransactionalRepository,
  type TransactionOptions
} from "@vinstock/core";
import type { InventoryInitializer, ProductsRepository } from "@vinstock/modules-catalog";
import { AuditService, type AuditRepository } from "@vinstock/modules-platform";
import type {
  InventoryListQuery,
  InventoryMovement,
  InventoryMovementListQuery,
  InventoryRecord,
  MovementType
} from "@vinstock/shared";

const DEFAULT_LIST_LIMIT = 50;

export type NewInventoryRecord = {
  id: string;
  product_id: string;
  quantity: number;
  last_update: string;
};

export type InventoryListFilters = {
  query?: string;
  limit: number;
  offset: number;
};

export type MovementListFilters = {
  query?: string;
  product_id?: string;
  movement_type?: MovementType;
  related_id?: string;
  limit: number;
  offset: number;
};

export type MovementEffect = Pick<InventoryMovement, "product_id" | "quantity" | "movement_type">;

export type RecordMovementInput = MovementEffect & {
  related_id?: string | null;
};

export interface InventoryRepository
  extends TransactionalRepository,
    AuditRepository,
    Pick<ProductsRepository, "findProductById"> {
  insertInventoryRecord(record: NewInventoryRecord): Promise<void>;
  findInventoryByProductId(productId: string): Promise<InventoryRecord | null>;
  listInventory(filters: InventoryListFilters): Promise<{ total: number; inventory: InventoryRecord[] }>;
  /**
   * Adds `delta` to the stored quantity in a single statement and returns the
   * new quantity, or null when the product has no inventory record.
   */
  adjustInventoryQuantity(productId: string, delta: number, at: string): Promise<number | null>;
  insertMovement(movement: InventoryMovement): Promise<void>;
  findMovementById(movementId: string): Promise<InventoryMovement | null>;
  listMovements(filters: MovementListFilters): Promise<{ total: number; movements: InventoryMovement[] }>;
  listMovementsByRelatedId(relatedId: string): Promise<InventoryMovement[]>;
  deleteMovement(movementId: string): Promise<boolean>;
}

export type InventoryServiceOptions = {
  /**
   * When false, a debit that would take on-hand quantity below zero fails
   * with InsufficientStockError and aborts the surrounding transaction.
   */
  allowNegativeStock?: boolean;
  audit?: AuditService;
};

export class InventoryRecordNotFoundError extends NotFoundError {
  constructor(productId: string) {
    super("Inventory record for product", productId);
    this.name = "InventoryRecordNotFoundError";
  }
}

export class InventoryMovementNotFoundError extends NotFoundError {
  constructor(movementId: string) {
    super("Inventory movement", movementId);
    this.name = "InventoryMovementNotFoundError";
  }
}

export class MovementProductNotFoundError extends ValidationError {
  constructor(productId: string) {
    super(`Product ${productId} does not exist`, { product_id: ["does not exist"] });
    this.name = "MovementProductNotFoundError";
  }
}

export class InsufficientStockError extends ValidationError {
  constructor(
    readonly productId: string,
    readonly available: number,
    readonly requested: number
  ) {
    super(`Insufficient stock for product ${productId}: ${available} available, ${requested} requested`, {
      quantity: [`only ${available} in stock`]
    });
    this.name = "InsufficientStockError";
  }
}

export class MovementNotRemovableError extends StateError {
  constructor(movementId: string, movementType: MovementType) {
    super(`Movement ${movementId} of type ${movementType} belongs to a sale and cannot be deleted`);
    this.name = "MovementNotRemovableError";
  }
}

/**
 * InventoryService
 * Owns on-hand quantities and the append-only movement ledger they are
 * derived from.
 */
export class InventoryService implements InventoryInitializer {
  private readonly allowNegativeStock: boolean;
  private readonly audit: AuditService;

  constructor(
    private readonly repository: InventoryRepository,
    options: InventoryServiceOptions = {}
  ) {
    this.allowNegativeStock = options.allowNegativeStock ?? true;
    this.audit = options.audit ?? new AuditService(repository);
  }

  async initializeInventory(productId: string, at: string): Promise<void> {
    await this.repository.insertInventoryRecord({
      id: randomUUID(),
      product_id: productId,
      quantity: 0,
      last_update: at
    });
  }

  async listInventory(query: Partial<InventoryListQuery> = {}): Promise<{ total: number; inventory: InventoryRecord[] }> {
    return this.repository.listInventory({
      query: query.query,
      limit: query.limit ?? DEFAULT_LIST_LIMIT,
      offset: query.offset ?? 0
    });
  }

  async getInventoryByProductId(productId: string): Promise<InventoryRecord> {
    const record = await this.repository.findInventoryByProductId(productId);
    if (!record) {
      throw new InventoryRecordNotFoundError(productId);
    }

    return record;
  }

  /**
   * Applies one movement's effect to its product's on-hand quantity and
   * returns the new quantity. Runs on the caller's transaction; it never
   * opens one itself.
   */
  async applyMovement(movement: MovementEffect): Promise<number> {
    return this.adjust(movement.product_id, movementDelta(movement));
  }

  /**
   * Appends a movement to the ledger and applies it.
   */
  async recordMovement(input: RecordMovementInput, options: TransactionOptions = {}): Promise<InventoryMovement> {
    assertMovementQuantity(input.quantity);

    return runInTransaction(
      this.repository,
      async () => {
        const product = await this.repository.findProductById(input.product_id);
        if (!product) {
          throw new MovementProductNotFoundError(input.product_id);
        }

        const movement: InventoryMovement = {
          id: randomUUID(),
          product_id: product.id,
          product_name: product.name,
          quantity: input.quantity,
          movement_type: input.movement_type,
          related_id: input.related_id ?? null,
          created_at: new Date().toISOString()
        };

        await this.repository.insertMovement(movement);
        await this.applyMovement(movement);
        await this.audit.logCreate("inventory_movement", movement.id, movement);

        return movement;
      },
      options
    );
  }

  async listMovements(
    query: Partial<InventoryMovementListQuery> = {}
  ): Promise<{ total: number; movements: InventoryMovement[] }> {
    return this.repository.listMovements({
      query: query.query,
      product_id: query.product_id,
      movement_type: query.movement_type,
      related_id: query.related_id,
      limit: query.limit ?? DEFAULT_LIST_LIMIT,
      offset: query.offset ?? 0
    });
  }

  async listMovementsByRelatedId(relatedId: string): Promise<InventoryMovement[]> {
    return this.repository.listMovementsByRelatedId(relatedId);
  }

  async getMovement(movementId: string): Promise<InventoryMovement> {
    const movement = await this.repository.findMovementById(movementId);
    if (!movement) {
      throw new InventoryMovementNotFoundError(movementId);
    }

    return movement;
  }

  /**
   * Removes a purchase entered by mistake and takes its quantity back out
   * of stock. Sale and reversal entries are only ever written and undone by
   * the sales ledger.
   */
  async deleteMovement(movementId: string): Promise<void> {
    await runInTransaction(this.repository, async () => {
      const movement = await this.getMovement(movementId);
      if (movement.movement_type !== "purchase") {
        throw new MovementNotRemovableError(movementId, movement.movement_type);
      }

      await this.repository.deleteMovement(movementId);

      // the product (and its stock record) may already be gone
      const record = await this.repository.findInventoryByProductId(movement.product_id);
      if (record) {
        await this.adjust(movement.product_id, -movementDelta(movement));
      }

      await this.audit.logDelete("inventory_movement", movementId, movement);
    });
  }

  private async adjust(productId: string, delta: number): Promise<number> {
    const quantity = await this.repository.adjustInventoryQuantity(productId, delta, new Date().toISOString());
    if (quantity === null) {
      throw new InventoryRecordNotFoundError(productId);
    }

    if (!this.allowNegativeStock && delta < 0 && quantity < 0) {
      throw new InsufficientStockError(productId, quantity - delta, -delta);
    }

    return quantity;
  }
}
