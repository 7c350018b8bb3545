import { describe, expect, it } from "vitest";
import { normalizeMoney, sumMoney } from "./money";
import { computeSaleTotal, priceSaleItem } from "./pricing";

describe("money", () => {
  it("rounds to cents", () => {
    expect(normalizeMoney(12.344)).toBe(12.34);
    expect(normalizeMoney(12.346)).toBe(12.35);
  });

  it("sums in minor units", () => {
    expect(sumMoney([0.1, 0.2])).toBe(0.3);
    expect(sumMoney([])).toBe(0);
  });
});

describe("priceSaleItem", () => {
  it("snapshots the product name and price", () => {
    const item = priceSaleItem({ id: "product-a", name: "Malbec Reserva", price: 19.99 }, 3);

    expect(item).toEqual({
      product_id: "product-a",
      product_name: "Malbec Reserva",
      quantity: 3,
      unit_price: 19.99,
      subtotal: 59.97
    });
  });
});

describe("computeSaleTotal", () => {
  it("adds the line subtotals", () => {
    expect(computeSaleTotal([{ subtotal: 59.97 }, { subtotal: 0.1 }, { subtotal: 0.2 }])).toBe(60.27);
  });
});
