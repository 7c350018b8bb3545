// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import { ProductCreateRequestSchema, ProductListQuerySchema } from "@vinstock/shared";
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
    const query = ProductListQuerySchema.parse(searchParamsObject(request));
    const { products } = createServices({ correlationId });
    const result = await products.listProducts(query);

    return Response.json({ ok: true, ...result }, { status: 200 });
  } catch (error) {
    return handleRouteError(error, "GET /products", correlationId);
  }
}

export async function POST(request: Request) {
  const correlationId = getRequestCorrelationId(request);

  try {
    const input = ProductCreateRequestSchema.parse(await readRequestBody(request));
    const { products } = createServices({ correlationId });
    const product = await products.createProduct(input);

    return Response.json({ ok: true, product }, { status: 201 });
  } catch (error) {
    return handleRouteError(error, "POST /products", correlationId);
  }
}
