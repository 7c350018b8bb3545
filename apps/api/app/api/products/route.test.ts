import { beforeEach, describe, expect, it, vi } from "vitest";
import { InMemoryStockStore } from "@vinstock/testing";
import { jsonRequest, servicesFor } from "../../../src/lib/route-test-support";
import { createServices } from "../../../src/lib/services";
import { DELETE as deleteProduct, GET as getProduct, PATCH as patchProduct } from "./[productId]/route";
import { GET as listProducts, POST as postProduct } from "./route";

vi.mock("../../../src/lib/services", () => ({
  createServices: vi.fn()
}));

let store: InMemoryStockStore;

beforeEach(() => {
  store = new InMemoryStockStore();
  vi.mocked(createServices).mockReturnValue(servicesFor(store));
});

describe("/api/products", () => {
  it("creates a product with an empty stock record and a price in cents", async () => {
    const response = await postProduct(
      jsonRequest("http://localhost/api/products", "POST", {
        name: "Malbec Reserva",
        price: 19.999,
        unit_of_measure: "unit"
      })
    );

    expect(response.status).toBe(201);
    const body = await response.json();
    expect(body.product).toMatchObject({ name: "Malbec Reserva", description: null, price: 20 });
    expect(store.quantityOf(body.product.id)).toBe(0);
  });

  it("answers a taken name with a field error", async () => {
    store.seedProduct({ name: "Malbec Reserva" });

    const response = await postProduct(
      jsonRequest("http://localhost/api/products", "POST", { name: "Malbec Reserva", price: 10, unit_of_measure: "unit" })
    );

    expect(response.status).toBe(422);
    expect(await response.json()).toEqual({
      ok: false,
      error: {
        code: "VALIDATION_ERROR",
        message: "Product name 'Malbec Reserva' is already taken",
        fields: { name: ["has already been taken"] }
      }
    });
  });

  it("rejects a price the money column cannot hold", async () => {
    const response = await postProduct(
      jsonRequest("http://localhost/api/products", "POST", { name: "Malbec Reserva", price: 1e11, unit_of_measure: "unit" })
    );

    expect(response.status).toBe(400);
    expect(Object.keys((await response.json()).error.fields)).toEqual(["price"]);
    expect(store.products).toEqual([]);
  });

  it("lists products matching a search term", async () => {
    store.seedProduct({ name: "Malbec Reserva" });
    store.seedProduct({ name: "Rosé Seco" });

    const response = await listProducts(new Request("http://localhost/api/products?query=malbec"));

    const body = await response.json();
    expect(body.total).toBe(1);
    expect(body.products.map((product: { name: string }) => product.name)).toEqual(["Malbec Reserva"]);
  });
});

describe("/api/products/:id", () => {
  it("updates, then deletes the product", async () => {
    const seeded = store.seedProduct({ name: "Rosé Seco", price: 12.5 });
    const url = `http://localhost/api/products/${seeded.id}`;

    const patched = await patchProduct(jsonRequest(url, "PATCH", { price: 14 }));
    expect(patched.status).toBe(200);
    expect((await patched.json()).product.price).toBe(14);

    const deleted = await deleteProduct(new Request(url, { method: "DELETE" }));
    expect(deleted.status).toBe(200);
    expect(await deleted.json()).toEqual({ ok: true });

    const fetched = await getProduct(new Request(url));
    expect(fetched.status).toBe(404);
  });

  it("rejects an empty update", async () => {
    const seeded = store.seedProduct({ name: "Rosé Seco" });

    const response = await patchProduct(jsonRequest(`http://localhost/api/products/${seeded.id}`, "PATCH", {}));

    expect(response.status).toBe(400);
  });
});
