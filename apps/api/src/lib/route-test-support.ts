// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import { CustomersService, ProductsService } from "@vinstock/modules-catalog";
import { InventoryService } from "@vinstock/modules-inventory";
import { AuditService } from "@vinstock/modules-platform";
import { SalesService } from "@vinstock/modules-sales";
import type { InMemoryStockStore } from "@vinstock/testing";
import type { Services } from "./services";

export const TEST_CORRELATION_ID = "req-test";

/**
 * The same wiring as `createServices`, over an in-memory store.
 */
export function servicesFor(store: InMemoryStockStore): Services {
  const audit = new AuditService(store, { correlation_id: TEST_CORRELATION_ID });
  const inventory = new InventoryService(store, { audit });
  return {
    products: new ProductsService(store, inventory, audit),
    customers: new CustomersService(store, audit),
    inventory,
    sales: new SalesService(store, inventory, { audit })
  };
}

export function jsonRequest(url: string, method: string, body: unknown): Request {
  return new Request(url, {
    method,
    headers: { "content-type": "application/json", "x-correlation-id": TEST_CORRELATION_ID },
    body: JSON.stringify(body)
  });
}
