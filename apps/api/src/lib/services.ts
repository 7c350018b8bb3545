// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import { CustomersService, ProductsService } from "@vinstock/modules-catalog";
import { InventoryService } from "@vinstock/modules-inventory";
import { AuditService } from "@vinstock/modules-platform";
import { SalesService } from "@vinstock/modules-sales";
import { getDbPool } from "./db";
import { getAppEnv } from "./env";
import { MySqlStockStore } from "./mysql-store";

export type Services = {
  products: ProductsService;
  customers: CustomersService;
  inventory: InventoryService;
  sales: SalesService;
};

export type ServiceContext = {
  correlationId: string;
};

/**
 * Builds the services for one request. They share a single store, so a
 * sale and the stock movements it writes run on the same transaction.
 */
export function createServices(context: ServiceContext): Services {
  const env = getAppEnv();
  const store = new MySqlStockStore(getDbPool());
  const audit = new AuditService(store, { correlation_id: context.correlationId });

  const inventory = new InventoryService(store, {
    allowNegativeStock: env.inventory.allowNegativeStock,
    audit
  });

  return {
    products: new ProductsService(store, inventory, audit),
    customers: new CustomersService(store, audit),
    inventory,
    sales: new SalesService(store, inventory, {
      defaultListLimit: env.sales.defaultListLimit,
      audit
    })
  };
}
