import { pino, type Logger } from "pino";
import type { TransactionStore } from "../store/store.js";
import type { AccountBalance, AccountSummary, FieldError, Transaction } from "../types/contracts.js";
import { TransactionDraftSchema, validateTransaction } from "../core/transaction_rules.js";
import { accountSummary, calculateBalance } from "../core/reports.js";
import type { TransactionQuery } from "../core/filters.js";

export type TransactionResult =
  | { ok: true; transaction: Transaction }
  | { ok: false; error: "not_found" }
  | { ok: false; error: "validation_failed"; details: FieldError[] };

export function createTransactionService(args: { store: TransactionStore; logger?: Logger }) {
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });

  /** Throws ZodError when the body has the wrong shape; rule failures come back as a result. */
  async function create(raw: unknown): Promise<TransactionResult> {
    const draft = TransactionDraftSchema.parse(raw);

    const checked = validateTransaction(draft);
    if (!checked.ok) {
      log.debug({ fields: checked.errors.map((e) => e.field) }, "transaction: rejected");
      return { ok: false, error: "validation_failed", details: checked.errors };
    }

    const transaction = await args.store.create(checked.value);
    log.info({ transactionId: transaction.id, type: transaction.type }, "transaction: created");
    return { ok: true, transaction };
  }

  async function get(id: string): Promise<TransactionResult> {
    const transaction = await args.store.get(id);
    if (!transaction) return { ok: false, error: "not_found" };
    return { ok: true, transaction };
  }

  async function list(q: TransactionQuery = {}): Promise<Transaction[]> {
    return args.store.list(q);
  }

  async function balance(accountId: string, currency?: string): Promise<AccountBalance> {
    const all = await args.store.list();
    return {
      accountId,
      balance: calculateBalance(all, accountId, currency),
      currency: currency ? currency.toUpperCase() : "ALL"
    };
  }

  async function summary(accountId: string): Promise<AccountSummary> {
    return accountSummary(await args.store.list(), accountId);
  }

  return { create, get, list, balance, summary };
}

export type TransactionService = ReturnType<typeof createTransactionService>;
