// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

export * from "./errors";
export * from "./ledger";
export * from "./money";
export * from "./pricing";
export * from "./sale-status";
export * from "./transaction";
export * from "./validation";
