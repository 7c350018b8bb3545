// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import { CustomerCreateRequestSchema, CustomerListQuerySchema } from "@vinstock/shared";
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
    const query = CustomerListQuerySchema.parse(searchParamsObject(request));
    const { customers } = createServices({ correlationId });
    const result = await customers.listCustomers(query);

    return Response.json({ ok: true, ...result }, { status: 200 });
  } catch (error) {
    return handleRouteError(error, "GET /customers", correlationId);
  }
}

export async function POST(request: Request) {
  const correlationId = getRequestCorrelationId(request);

  try {
    const input = CustomerCreateRequestSchema.parse(await readRequestBody(request));
    const { customers } = createServices({ correlationId });
    const customer = await customers.createCustomer(input);

    return Response.json({ ok: true, customer }, { status: 201 });
  } catch (error) {
    return handleRouteError(error, "POST /customers", correlationId);
  }
}
