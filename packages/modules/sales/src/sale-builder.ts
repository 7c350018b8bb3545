// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import {
  addFieldError,
  computeSaleTotal,
  hasFieldErrors,
  invalid,
  priceSaleItem,
  valid,
  type FieldErrors,
  type PricedProduct,
  type ValidationResult
} from "@vinstock/core";
import { MAX_MONEY_AMOUNT, type SaleCreateRequest, type SaleItem } from "@vinstock/shared";

export const DUPLICATE_ITEMS_MESSAGE = "duplicate items found";

export type SaleDraft = {
  readonly customer_id: string;
  readonly sale_date: string;
  readonly status: "pending";
  readonly items: readonly SaleItem[];
  readonly total_amount: number;
};

/**
 * References already resolved by the caller; building itself does no I/O.
 */
export type SaleReferences = {
  readonly customerExists: boolean;
  readonly products: ReadonlyMap<string, PricedProduct>;
};

function itemField(index: number, field: string): string {
  return `items[${index}].${field}`;
}

/**
 * Validates a sale request and prices its lines from the current products.
 * The requested status is ignored: a new sale is always pending.
 */
export function buildSale(
  input: SaleCreateRequest,
  references: SaleReferences,
  today: string
): ValidationResult<SaleDraft> {
  let errors: FieldErrors = {};

  const customerId = input.customer_id ?? "";
  if (customerId.length === 0) {
    errors = addFieldError(errors, "customer_id", "is required");
  } else if (!references.customerExists) {
    errors = addFieldError(errors, "customer_id", "does not exist");
  }

  if (input.items.length === 0) {
    errors = addFieldError(errors, "items", "at least one item is required");
  }

  const items: SaleItem[] = [];
  const seenProductIds = new Set<string>();

  for (const [index, item] of input.items.entries()) {
    const productId = item.product_id ?? "";
    const quantity = item.quantity;

    if (productId.length === 0) {
      errors = addFieldError(errors, itemField(index, "product_id"), "is required");
    } else if (seenProductIds.has(productId)) {
      errors = addFieldError(errors, "items", DUPLICATE_ITEMS_MESSAGE);
    } else {
      seenProductIds.add(productId);
    }

    if (quantity === undefined) {
      errors = addFieldError(errors, itemField(index, "quantity"), "is required");
    } else if (quantity <= 0) {
      errors = addFieldError(errors, itemField(index, "quantity"), "must be greater than 0");
    }

    const product = productId.length > 0 ? references.products.get(productId) : undefined;
    if (productId.length > 0 && !product) {
      errors = addFieldError(errors, itemField(index, "product_id"), "does not exist");
    }

    if (product && quantity !== undefined && quantity > 0) {
      items.push(priceSaleItem(product, quantity));
    }
  }

  const totalAmount = computeSaleTotal(items);
  if (totalAmount > MAX_MONEY_AMOUNT) {
    errors = addFieldError(errors, "items", "total amount is too large");
  }

  if (hasFieldErrors(errors)) {
    return invalid(errors);
  }

  return valid({
    customer_id: customerId,
    sale_date: input.sale_date ?? today,
    status: "pending",
    items,
    total_amount: totalAmount
  });
}
