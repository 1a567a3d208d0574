import { Decimal } from "decimal.js";
import { z } from "zod";
import { SUPPORTED_CURRENCIES } from "../presets/iso4217.js";
import {
  TRANSACTION_STATUSES,
  TRANSACTION_TYPES,
  type FieldError,
  type TransactionInput,
  type TransactionStatus,
  type TransactionType
} from "../types/contracts.js";
import { parseIsoInstant } from "../lib/_util.js";
import { fail, oneOf, pass, type Check, type Validated } from "./check.js";

const ACCOUNT_PATTERN = /^ACC-[A-Z0-9]{5}$/;

/** Request shape before business rules run. */
export const TransactionDraftSchema = z.object({
  fromAccount: z.string().nullish(),
  toAccount: z.string().nullish(),
  amount: z.number(),
  currency: z.string(),
  type: z.string(),
  status: z.string().optional(),
  timestamp: z.string().nullish()
});

export type TransactionDraft = z.infer<typeof TransactionDraftSchema>;

export function validateAmount(amount: number): Check<number> {
  if (!Number.isFinite(amount) || amount <= 0) return fail("Amount must be a positive number");
  if (new Decimal(amount).decimalPlaces() > 2) return fail("Amount must have maximum 2 decimal places");
  return pass(amount);
}

export function validateAccount(account: string): Check<string> {
  if (!ACCOUNT_PATTERN.test(account)) {
    return fail("Account must match pattern ACC-XXXXX (5 alphanumeric characters)");
  }
  return pass(account);
}

export function validateCurrency(currency: string): Check<string> {
  if (currency.length !== 3) return fail("Currency code must be exactly 3 characters");
  const upper = currency.toUpperCase();
  if (!SUPPORTED_CURRENCIES.has(upper)) {
    return fail(`Currency must be a valid ISO 4217 code. Received: ${currency}`);
  }
  return pass(upper);
}

export function validateTransactionType(raw: string): Check<TransactionType> {
  return oneOf(TRANSACTION_TYPES, raw, "type");
}

export function validateTransactionStatus(raw: string): Check<TransactionStatus> {
  return oneOf(TRANSACTION_STATUSES, raw, "status");
}

export function validateTimestamp(raw: string): Check<string> {
  const at = parseIsoInstant(raw);
  if (!at) return fail("Timestamp must be an ISO 8601 date");
  return pass(at.toISOString());
}

/**
 * Runs every transaction rule and reports all failures at once.
 * Counterpart-account requirements are only checked once the type is known.
 */
export function validateTransaction(draft: TransactionDraft): Validated<TransactionInput> {
  const errors: FieldError[] = [];
  const record = <T>(field: string, c: Check<T>): T | undefined => {
    if (c.ok) return c.value;
    errors.push({ field, message: c.error });
    return undefined;
  };

  const fromAccount = draft.fromAccount ? record("fromAccount", validateAccount(draft.fromAccount)) : undefined;
  const toAccount = draft.toAccount ? record("toAccount", validateAccount(draft.toAccount)) : undefined;
  const amount = record("amount", validateAmount(draft.amount));
  const currency = record("currency", validateCurrency(draft.currency));
  const type = record("type", validateTransactionType(draft.type));
  const status = draft.status === undefined ? "pending" : record("status", validateTransactionStatus(draft.status));
  const timestamp = draft.timestamp ? record("timestamp", validateTimestamp(draft.timestamp)) : undefined;

  if (type === "deposit" && !draft.toAccount) {
    errors.push({ field: "toAccount", message: "Deposit transactions require toAccount" });
  }
  if (type === "withdrawal" && !draft.fromAccount) {
    errors.push({ field: "fromAccount", message: "Withdrawal transactions require fromAccount" });
  }
  if (type === "transfer" && (!draft.fromAccount || !draft.toAccount)) {
    errors.push({ field: "type", message: "Transfer transactions require both fromAccount and toAccount" });
  }

  if (errors.length || amount === undefined || currency === undefined || type === undefined || status === undefined) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    value: { fromAccount, toAccount, amount, currency, type, status, timestamp }
  };
}
