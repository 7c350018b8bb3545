// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import type { SaleStatus } from "@vinstock/shared";

export const SALE_STATUS_TRANSITIONS: Readonly<Record<SaleStatus, readonly SaleStatus[]>> = {
  pending: ["paid", "delivered", "canceled"],
  paid: ["pending", "delivered", "canceled"],
  delivered: [],
  canceled: []
};

export function isTerminalSaleStatus(status: SaleStatus): boolean {
  return SALE_STATUS_TRANSITIONS[status].length === 0;
}

/**
 * Keeping the current status is allowed while the sale is still editable.
 */
export function canTransitionSale(from: SaleStatus, to: SaleStatus): boolean {
  if (isTerminalSaleStatus(from)) {
    return false;
  }

  return from === to || SALE_STATUS_TRANSITIONS[from].includes(to);
}
