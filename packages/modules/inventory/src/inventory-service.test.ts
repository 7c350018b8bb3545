import { describe, expect, it } from "vitest";
import { InvalidMovementQuantityError } from "@vinstock/core";
import { InMemoryStockStore } from "@vinstock/testing";
import {
  InsufficientStockError,
  InventoryMovementNotFoundError,
  InventoryRecordNotFoundError,
  InventoryService,
  MovementNotRemovableError,
  MovementProductNotFoundError
} from "./inventory-service";

function setup(options: { allowNegativeStock?: boolean } = {}) {
  const store = new InMemoryStockStore();
  const inventory = new InventoryService(store, options);
  const malbec = store.seedProduct({ name: "Malbec Reserva", description: "Mendoza", price: 19.99 }, 5);

  return { store, inventory, malbec };
}

describe("InventoryService.applyMovement", () => {
  it("adds purchases and reversals and subtracts sales", async () => {
    const { store, inventory, malbec } = setup();

    expect(await inventory.applyMovement({ product_id: malbec.id, quantity: 12, movement_type: "purchase" })).toBe(17);
    expect(await inventory.applyMovement({ product_id: malbec.id, quantity: 4, movement_type: "sale" })).toBe(13);
    expect(await inventory.applyMovement({ product_id: malbec.id, quantity: 4, movement_type: "sale_reversal" })).toBe(17);
    expect(store.quantityOf(malbec.id)).toBe(17);
  });

  it("does not open a transaction of its own", async () => {
    const { store, inventory, malbec } = setup();

    await inventory.applyMovement({ product_id: malbec.id, quantity: 1, movement_type: "sale" });

    expect(store.transactionLog).toEqual([]);
  });

  it("fails when the product has no inventory record", async () => {
    const { store, inventory } = setup();
    const untracked = store.seedProduct({ name: "Cabernet Franc" }, null);

    await expect(
      inventory.applyMovement({ product_id: untracked.id, quantity: 1, movement_type: "sale" })
    ).rejects.toBeInstanceOf(InventoryRecordNotFoundError);
  });

  it("goes below zero unless negative stock is disabled", async () => {
    const permissive = setup();
    expect(
      await permissive.inventory.applyMovement({ product_id: permissive.malbec.id, quantity: 8, movement_type: "sale" })
    ).toBe(-3);

    const guarded = setup({ allowNegativeStock: false });
    const error = await guarded.inventory
      .applyMovement({ product_id: guarded.malbec.id, quantity: 8, movement_type: "sale" })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(InsufficientStockError);
    expect(error instanceof InsufficientStockError && [error.available, error.requested]).toEqual([5, 8]);
  });
});

describe("InventoryService.recordMovement", () => {
  it("appends a purchase and raises the quantity", async () => {
    const { store, inventory, malbec } = setup();

    const movement = await inventory.recordMovement({
      product_id: malbec.id,
      quantity: 12,
      movement_type: "purchase"
    });

    expect(movement).toMatchObject({
      product_id: malbec.id,
      product_name: "Malbec Reserva",
      quantity: 12,
      movement_type: "purchase",
      related_id: null
    });
    expect(store.quantityOf(malbec.id)).toBe(17);
    expect(store.transactionLog).toEqual(["begin", "commit"]);
    expect(store.auditLogs).toEqual([
      expect.objectContaining({ entity_type: "inventory_movement", entity_id: movement.id, action: "CREATE" })
    ]);
  });

  it("rejects an unknown product", async () => {
    const { store, inventory } = setup();

    await expect(
      inventory.recordMovement({
        product_id: "3f9c1e7a-2b4d-4c6e-8a0f-1b2c3d4e5f60",
        quantity: 1,
        movement_type: "purchase"
      })
    ).rejects.toBeInstanceOf(MovementProductNotFoundError);
    expect(store.movements).toEqual([]);
  });

  it("rejects a non-positive quantity before touching the store", async () => {
    const { store, inventory, malbec } = setup();

    await expect(
      inventory.recordMovement({ product_id: malbec.id, quantity: 0, movement_type: "purchase" })
    ).rejects.toBeInstanceOf(InvalidMovementQuantityError);
    expect(store.transactionLog).toEqual([]);
  });

  it("rolls back the movement when the audit write fails", async () => {
    const { store, inventory, malbec } = setup();
    const failure = new Error("audit table locked");
    store.failOn("insertAuditLog", failure);

    await expect(
      inventory.recordMovement({ product_id: malbec.id, quantity: 12, movement_type: "purchase" })
    ).rejects.toBe(failure);
    expect(store.movements).toEqual([]);
    expect(store.quantityOf(malbec.id)).toBe(5);
  });
});

describe("InventoryService queries", () => {
  it("lists stock with product details", async () => {
    const { store, inventory, malbec } = setup();
    store.seedProduct({ name: "Rosé Seco" }, 2);

    const result = await inventory.listInventory({ query: "mendoza" });

    expect(result.total).toBe(1);
    expect(result.inventory[0]).toMatchObject({
      product_id: malbec.id,
      product_name: "Malbec Reserva",
      product_description: "Mendoza",
      quantity: 5
    });
  });

  it("filters movements by type, newest first", async () => {
    const { inventory, malbec } = setup();
    const first = await inventory.recordMovement({ product_id: malbec.id, quantity: 1, movement_type: "purchase" });
    const second = await inventory.recordMovement({ product_id: malbec.id, quantity: 2, movement_type: "purchase" });
    await inventory.recordMovement({ product_id: malbec.id, quantity: 1, movement_type: "sale" });

    const result = await inventory.listMovements({ movement_type: "purchase" });

    expect(result.movements.map((movement) => movement.id)).toEqual([second.id, first.id]);
  });

  it("fails for an unknown record or movement", async () => {
    const { inventory } = setup();

    await expect(inventory.getInventoryByProductId("5d4c3b2a-1f0e-4d9c-8b7a-6f5e4d3c2b1a")).rejects.toBeInstanceOf(
      InventoryRecordNotFoundError
    );
    await expect(inventory.getMovement("5d4c3b2a-1f0e-4d9c-8b7a-6f5e4d3c2b1a")).rejects.toBeInstanceOf(
      InventoryMovementNotFoundError
    );
  });
});

describe("InventoryService.deleteMovement", () => {
  it("removes a purchase and takes its quantity back out", async () => {
    const { store, inventory, malbec } = setup();
    const purchase = await inventory.recordMovement({ product_id: malbec.id, quantity: 12, movement_type: "purchase" });

    await inventory.deleteMovement(purchase.id);

    expect(store.movements).toEqual([]);
    expect(store.quantityOf(malbec.id)).toBe(5);
    expect(store.auditLogs.map((entry) => entry.action)).toEqual(["CREATE", "DELETE"]);
  });

  it("refuses to remove sale movements", async () => {
    const { store, inventory, malbec } = setup();
    const sale = await inventory.recordMovement({
      product_id: malbec.id,
      quantity: 2,
      movement_type: "sale",
      related_id: "8a7b6c5d-4e3f-4a2b-9c1d-0e9f8a7b6c5d"
    });

    await expect(inventory.deleteMovement(sale.id)).rejects.toBeInstanceOf(MovementNotRemovableError);
    expect(store.movements).toHaveLength(1);
    expect(store.quantityOf(malbec.id)).toBe(3);
  });
});
