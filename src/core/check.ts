import type { FieldError } from "../types/contracts.js";

export type Check<T> = { ok: true; value: T } | { ok: false; error: string };

export type Validated<T> = { ok: true; value: T } | { ok: false; errors: FieldError[] };

export function pass<T>(value: T): Check<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: string): Check<T> {
  return { ok: false, error };
}

export function oneOf<T extends string>(values: readonly T[], raw: string, label: string): Check<T> {
  const hit = values.find((v) => v === raw);
  if (hit === undefined) return fail(`Invalid ${label}. Must be one of: ${values.join(", ")}`);
  return pass(hit);
}

export function formatFieldErrors(errors: FieldError[]): string[] {
  return errors.map((e) => `${e.field}: ${e.message}`);
}
