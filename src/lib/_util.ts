import { Decimal } from "decimal.js";

export function nowUtc(): string {
  return new Date().toISOString();
}

export function safeJsonParse(s: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    const value: unknown = JSON.parse(s);
    return { ok: true, value };
  } catch (e) {
    return { ok: false, error: errorMessage(e) };
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

// date-only and zone-less values are read as UTC
const ISO_INSTANT = /^(\d{4}-\d{2}-\d{2})(?:[T ](\d{2}:\d{2}(?::\d{2})?)(?:\.(\d+))?(Z|[+-]\d{2}:\d{2})?)?$/i;

export function parseIsoInstant(s: string): Date | null {
  const m = ISO_INSTANT.exec(s.trim());
  if (!m) return null;
  const [, date, time, frac, zone] = m;

  const text = time === undefined
    ? `${date}T00:00:00Z`
    : `${date}T${time}${frac ? "." + frac.slice(0, 3).padEnd(3, "0") : ""}${zone ? zone.toUpperCase() : "Z"}`;

  const ms = Date.parse(text);
  return Number.isFinite(ms) ? new Date(ms) : null;
}

export function roundMoney(v: Decimal): number {
  return v.toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toNumber();
}
