// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

export * from "./schemas/audit-logs";
export * from "./schemas/common";
export * from "./schemas/customers";
export * from "./schemas/inventory";
export * from "./schemas/products";
export * from "./schemas/sales";
