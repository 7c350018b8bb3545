import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Customer, Product } from "@vinstock/shared";
import { InMemoryStockStore } from "@vinstock/testing";
import { jsonRequest, servicesFor } from "../../../src/lib/route-test-support";
import { createServices } from "../../../src/lib/services";
import { GET as getSale, PATCH as patchSale } from "./[saleId]/route";
import { POST as postSale } from "./route";

vi.mock("../../../src/lib/services", () => ({
  createServices: vi.fn()
}));

let store: InMemoryStockStore;
let customer: Customer;
let malbec: Product;

beforeEach(() => {
  store = new InMemoryStockStore();
  customer = store.seedCustomer({ name: "Ana Souza" });
  malbec = store.seedProduct({ name: "Malbec Reserva", price: 19.99 }, 10);
  vi.mocked(createServices).mockReturnValue(servicesFor(store));
});

describe("POST /api/sales", () => {
  it("creates a pending sale and debits stock", async () => {
    const response = await postSale(
      jsonRequest("http://localhost/api/sales", "POST", {
        customer_id: customer.id,
        sale_date: "2026-03-14",
        items: [{ product_id: malbec.id, quantity: 3 }]
      })
    );

    expect(response.status).toBe(201);
    const body = await response.json();
    expect(body.ok).toBe(true);
    expect(body.sale).toMatchObject({ status: "pending", total_amount: 59.97, sale_date: "2026-03-14" });
    expect(store.quantityOf(malbec.id)).toBe(7);
    expect(vi.mocked(createServices)).toHaveBeenCalledWith({ correlationId: "req-test" });
  });

  it("accepts form-encoded attribute maps", async () => {
    const response = await postSale(
      new Request("http://localhost/api/sales", {
        method: "POST",
        headers: { "content-type": "application/x-www-form-urlencoded" },
        body: `customer_id=${customer.id}&items[0][product_id]=${malbec.id}&items[0][quantity]=2`
      })
    );

    expect(response.status).toBe(201);
    expect(store.quantityOf(malbec.id)).toBe(8);
  });

  it("answers duplicate lines with a field error and writes nothing", async () => {
    const response = await postSale(
      jsonRequest("http://localhost/api/sales", "POST", {
        customer_id: customer.id,
        items: [
          { product_id: malbec.id, quantity: 1 },
          { product_id: malbec.id, quantity: 1 }
        ]
      })
    );

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      ok: false,
      error: { code: "VALIDATION_ERROR", message: "Sale is invalid", fields: { items: ["duplicate items found"] } }
    });
    expect(store.sales).toEqual([]);
    expect(store.movements).toEqual([]);
  });

  it("rejects a malformed body", async () => {
    const response = await postSale(
      new Request("http://localhost/api/sales", {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: "{"
      })
    );

    expect(response.status).toBe(400);
  });
});

describe("/api/sales/:id", () => {
  it("cancels a sale and refuses to reopen it", async () => {
    const created = await servicesFor(store).sales.createSale({
      customer_id: customer.id,
      items: [{ product_id: malbec.id, quantity: 3 }]
    });
    const url = `http://localhost/api/sales/${created.id}`;

    const canceled = await patchSale(jsonRequest(url, "PATCH", { status: "canceled" }));
    expect(canceled.status).toBe(200);
    expect(store.quantityOf(malbec.id)).toBe(10);

    const reopened = await patchSale(jsonRequest(url, "PATCH", { status: "pending" }));
    expect(reopened.status).toBe(409);
    expect(await reopened.json()).toEqual({
      ok: false,
      error: { code: "INVALID_STATE", message: "cannot modify a sale in this status" }
    });

    const fetched = await getSale(new Request(url));
    expect((await fetched.json()).sale.status).toBe("canceled");
  });

  it("answers 404 for an unknown sale", async () => {
    const response = await getSale(new Request("http://localhost/api/sales/7f6e5d4c-3b2a-4190-8f7e-6d5c4b3a2910"));

    expect(response.status).toBe(404);
  });

  it("answers 400 for a malformed id", async () => {
    const response = await getSale(new Request("http://localhost/api/sales/not-a-uuid"));

    expect(response.status).toBe(400);
  });
});
