// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import {
  InventoryMovementCreateRequestSchema,
  InventoryMovementListQuerySchema
} from "@vinstock/shared";
import {
  getRequestCorrelationId,
  handleRouteError,
  readRequestBody,
  searchParamsObject
} from "../../../../src/lib/http";
import { createServices } from "../../../../src/lib/services";

export async function GET(request: Request) {
  const correlationId = getRequestCorrelationId(request);

  try {
    const query = InventoryMovementListQuerySchema.parse(searchParamsObject(request));
    const { inventory } = createServices({ correlationId });
    const result = await inventory.listMovements(query);

    return Response.json({ ok: true, ...result }, { status: 200 });
  } catch (error) {
    return handleRouteError(error, "GET /inventory/movements", correlationId);
  }
}

/**
 * Stock received from suppliers. Sale and reversal movements are only
 * written by the sales endpoints.
 */
export async function POST(request: Request) {
  const correlationId = getRequestCorrelationId(request);

  try {
    const input = InventoryMovementCreateRequestSchema.parse(await readRequestBody(request));
    const { inventory } = createServices({ correlationId });
    const movement = await inventory.recordMovement({
      product_id: input.product_id,
      quantity: input.quantity,
      movement_type: input.movement_type
    });

    return Response.json({ ok: true, movement }, { status: 201 });
  } catch (error) {
    return handleRouteError(error, "POST /inventory/movements", correlationId);
  }
}
