// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import { SaleCreateRequestSchema, SaleListQuerySchema } from "@vinstock/shared";
import {
  getRequestCorrelationId,
  handleRouteError,
  readRequestBody,
  searchParamsObject
} from "../../../src/lib/http";
import { createServices } from "../../../src/lib/services";

export async function GET(request: Request) {
  const correlationId = getRequestCorrelationId(request);

  try {
    const query = SaleListQuerySchema.parse(searchParamsObject(request));
    const { sales } = createServices({ correlationId });
    const result = await sales.listSales(query);

    return Response.json({ ok: true, ...result }, { status: 200 });
  } catch (error) {
    return handleRouteError(error, "GET /sales", correlationId);
  }
}

export async function POST(request: Request) {
  const correlationId = getRequestCorrelationId(request);

  try {
    const input = SaleCreateRequestSchema.parse(await readRequestBody(request));
    const { sales } = createServices({ correlationId });
    const sale = await sales.createSale(input);

    return Response.json({ ok: true, sale }, { status: 201 });
  } catch (error) {
    return handleRouteError(error, "POST /sales", correlationId);
  }
}
