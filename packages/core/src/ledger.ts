// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import type { InventoryMovement, MovementType } from "@vinstock/shared";
import { ValidationError } from "./errors";

export type MovementDirection = "credit" | "debit";

export const MOVEMENT_DIRECTIONS: Readonly<Record<MovementType, MovementDirection>> = {
  purchase: "credit",
  sale: "debit",
  sale_reversal: "credit"
};

type MovementEffect = Pick<InventoryMovement, "movement_type" | "quantity">;

type SaleLedgerEntry = Pick<InventoryMovement, "id" | "product_id" | "quantity" | "movement_type">;

export class InvalidMovementQuantityError extends ValidationError {
  constructor(quantity: number) {
    super(`Movement quantity must be a positive integer, got ${quantity}`, {
      quantity: ["must be a positive integer"]
    });
    this.name = "InvalidMovementQuantityError";
  }
}

export function assertMovementQuantity(quantity: number): void {
  if (!Number.isInteger(quantity) || quantity <= 0) {
    throw new InvalidMovementQuantityError(quantity);
  }
}

/**
 * Signed change a movement makes to on-hand quantity.
 */
export function movementDelta(movement: MovementEffect): number {
  assertMovementQuantity(movement.quantity);
  return MOVEMENT_DIRECTIONS[movement.movement_type] === "credit"
    ? movement.quantity
    : -movement.quantity;
}

export function applyMovementToQuantity(currentQuantity: number, movement: MovementEffect): number {
  return currentQuantity + movementDelta(movement);
}

/**
 * On-hand quantity as derived from the ledger alone.
 */
export function projectQuantity(movements: readonly MovementEffect[]): number {
  let quantity = 0;
  for (const movement of movements) {
    quantity = applyMovementToQuantity(quantity, movement);
  }
  return quantity;
}

/**
 * Sale movements of one sale that no reversal has compensated yet.
 * Each reversal cancels one sale movement of the same product and quantity.
 */
export function findUnreversedSaleMovements<T extends SaleLedgerEntry>(movements: readonly T[]): T[] {
  const pendingReversals = movements.filter((movement) => movement.movement_type === "sale_reversal");
  const outstanding: T[] = [];

  for (const movement of movements) {
    if (movement.movement_type !== "sale") {
      continue;
    }

    const matchIndex = pendingReversals.findIndex(
      (reversal) => reversal.product_id === movement.product_id && reversal.quantity === movement.quantity
    );

    if (matchIndex >= 0) {
      pendingReversals.splice(matchIndex, 1);
      continue;
    }

    outstanding.push(movement);
  }

  return outstanding;
}
