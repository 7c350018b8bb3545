import { beforeEach, describe, expect, it, vi } from "vitest";
import { InMemoryStockStore } from "@vinstock/testing";
import { jsonRequest, servicesFor } from "../../../src/lib/route-test-support";
import { createServices } from "../../../src/lib/services";
import { DELETE as deleteCustomer, GET as getCustomer } from "./[customerId]/route";
import { GET as listCustomerSales } from "./[customerId]/sales/route";
import { POST as postCustomer } from "./route";

vi.mock("../../../src/lib/services", () => ({
  createServices: vi.fn()
}));

let store: InMemoryStockStore;

beforeEach(() => {
  store = new InMemoryStockStore();
  vi.mocked(createServices).mockReturnValue(servicesFor(store));
});

describe("/api/customers", () => {
  it("creates a customer from a form post", async () => {
    const response = await postCustomer(
      new Request("http://localhost/api/customers", {
        method: "POST",
        headers: { "content-type": "application/x-www-form-urlencoded" },
        body: "name=+Ana+Souza+&email=ana%40example.com&phone=555-0101"
      })
    );

    expect(response.status).toBe(201);
    expect((await response.json()).customer).toMatchObject({
      name: "Ana Souza",
      email: "ana@example.com",
      phone: "555-0101"
    });
  });

  it("answers an invalid email with a 400 field error", async () => {
    const response = await postCustomer(
      jsonRequest("http://localhost/api/customers", "POST", { name: "Ana", email: "nope", phone: "555-0101" })
    );

    expect(response.status).toBe(400);
    expect(Object.keys((await response.json()).error.fields)).toEqual(["email"]);
  });
});

describe("/api/customers/:id", () => {
  it("refuses to delete a customer with sales and lists those sales", async () => {
    const customer = store.seedCustomer({ name: "Ana Souza" });
    const malbec = store.seedProduct({ name: "Malbec Reserva", price: 19.99 }, 10);
    await servicesFor(store).sales.createSale({
      customer_id: customer.id,
      items: [{ product_id: malbec.id, quantity: 1 }]
    });

    const url = `http://localhost/api/customers/${customer.id}`;
    const deleted = await deleteCustomer(new Request(url, { method: "DELETE" }));

    expect(deleted.status).toBe(409);
    expect(await deleted.json()).toEqual({
      ok: false,
      error: { code: "CONFLICT", message: `Customer ${customer.id} has 1 sale(s) and cannot be deleted` }
    });

    const sales = await listCustomerSales(new Request(`${url}/sales`));
    expect(sales.status).toBe(200);
    expect((await sales.json()).total).toBe(1);
  });

  it("deletes a customer without sales", async () => {
    const customer = store.seedCustomer();
    const url = `http://localhost/api/customers/${customer.id}`;

    const deleted = await deleteCustomer(new Request(url, { method: "DELETE" }));
    expect(deleted.status).toBe(200);

    const fetched = await getCustomer(new Request(url));
    expect(fetched.status).toBe(404);
  });
});
