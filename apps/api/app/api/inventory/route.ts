// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import { InventoryListQuerySchema } from "@vinstock/shared";
import { getRequestCorrelationId, handleRouteError, searchParamsObject } from "../../../src/lib/http";
import { createServices } from "../../../src/lib/services";

export async function GET(request: Request) {
  const correlationId = getRequestCorrelationId(request);

  try {
    const query = InventoryListQuerySchema.parse(searchParamsObject(request));
    const { inventory } = createServices({ correlationId });
    const result = await inventory.listInventory(query);

    return Response.json({ ok: true, ...result }, { status: 200 });
  } catch (error) {
    return handleRouteError(error, "GET /inventory", correlationId);
  }
}
