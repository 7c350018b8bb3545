// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

import type { FieldErrors } from "./validation";

/**
 * Invalid or missing input, an unresolvable reference, or a business rule
 * on the input (duplicate sale lines, insufficient stock).
 */
export class ValidationError extends Error {
  readonly fieldErrors: FieldErrors;

  constructor(message: string, fieldErrors: FieldErrors = {}) {
    super(message);
    this.name = "ValidationError";
    this.fieldErrors = fieldErrors;
  }
}

export class NotFoundError extends Error {
  constructor(
    readonly entity: string,
    readonly entityId: string
  ) {
    super(`${entity} ${entityId} not found`);
    this.name = "NotFoundError";
  }
}

/**
 * The entity exists but its current state forbids the operation.
 */
export class StateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StateError";
  }
}

export class ConflictError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConflictError";
  }
}
