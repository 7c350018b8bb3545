// Copyright (c) 2026 Ahmad Faruk (Signal18 ID). All rights reserved.
// Ownership: Ahmad Faruk (Signal18 ID)

export type FieldErrors = Readonly<Record<string, readonly string[]>>;

export type ValidationResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly errors: FieldErrors };

export function addFieldError(errors: FieldErrors, field: string, message: string): FieldErrors {
  const existing = errors[field] ?? [];
  if (existing.includes(message)) {
    return errors;
  }

  return { ...errors, [field]: [...existing, message] };
}

export function hasFieldErrors(errors: FieldErrors): boolean {
  return Object.keys(errors).length > 0;
}

export function valid<T>(value: T): ValidationResult<T> {
  return { ok: true, value };
}

export function invalid<T>(errors: FieldErrors): ValidationResult<T> {
  return { ok: false, errors };
}
