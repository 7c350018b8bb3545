// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import type { Product, SaleItem } from "@vinstock/shared";
import { normalizeMoney, sumMoney } from "./money";

export type PricedProduct = Pick<Product, "id" | "name" | "price">;

/**
 * Snapshot of the product's current name and price on a sale line.
 */
export function priceSaleItem(product: PricedProduct, quantity: number): SaleItem {
  const unitPrice = normalizeMoney(product.price);
  return {
    product_id: product.id,
    product_name: product.name,
    quantity,
    unit_price: unitPrice,
    subtotal: normalizeMoney(quantity * unitPrice)
  };
}

export function computeSaleTotal(items: readonly Pick<SaleItem, "subtotal">[]): number {
  return sumMoney(items.map((item) => item.subtotal));
}
