import { Decimal } from "decimal.js";
import type { AccountSummary, Ticket, TicketStats, Transaction } from "../types/contracts.js";
import { roundMoney } from "../lib/_util.js";

/**
 * Net position of an account over completed transactions.
 * A self-transfer debits and credits the same account, netting to zero.
 */
export function calculateBalance(items: readonly Transaction[], accountId: string, currency?: string): number {
  const cur = currency?.toUpperCase();
  let balance = new Decimal(0);

  for (const t of items) {
    if (t.status !== "completed") continue;
    if (cur && t.currency !== cur) continue;

    switch (t.type) {
      case "deposit":
        if (t.toAccount === accountId) balance = balance.plus(t.amount);
        break;
      case "withdrawal":
        if (t.fromAccount === accountId) balance = balance.minus(t.amount);
        break;
      case "transfer":
        if (t.fromAccount === accountId) balance = balance.minus(t.amount);
        if (t.toAccount === accountId) balance = balance.plus(t.amount);
        break;
    }
  }

  return roundMoney(balance);
}

export function accountSummary(items: readonly Transaction[], accountId: string): AccountSummary {
  let deposits = new Decimal(0);
  let withdrawals = new Decimal(0);
  let count = 0;
  let mostRecent: { ms: number; iso: string } | null = null;

  for (const t of items) {
    if (t.fromAccount !== accountId && t.toAccount !== accountId) continue;
    count++;

    const ms = Date.parse(t.timestamp);
    if (Number.isFinite(ms) && (!mostRecent || ms > mostRecent.ms)) mostRecent = { ms, iso: t.timestamp };

    if (t.status !== "completed") continue;

    // a transfer is a deposit for its destination and a withdrawal for its source
    if ((t.type === "deposit" || t.type === "transfer") && t.toAccount === accountId) {
      deposits = deposits.plus(t.amount);
    }
    if ((t.type === "withdrawal" || t.type === "transfer") && t.fromAccount === accountId) {
      withdrawals = withdrawals.plus(t.amount);
    }
  }

  return {
    accountId,
    totalDeposits: roundMoney(deposits),
    totalWithdrawals: roundMoney(withdrawals),
    transactionCount: count,
    mostRecentTransaction: mostRecent ? mostRecent.iso : null
  };
}

export function ticketStats(items: readonly Ticket[]): TicketStats {
  const stats: TicketStats = {
    total: items.length,
    by_category: {
      account_access: 0,
      technical_issue: 0,
      billing_question: 0,
      feature_request: 0,
      bug_report: 0,
      other: 0
    },
    by_priority: { urgent: 0, high: 0, medium: 0, low: 0 },
    by_status: { new: 0, in_progress: 0, waiting_customer: 0, resolved: 0, closed: 0 }
  };

  for (const t of items) {
    stats.by_category[t.category]++;
    stats.by_priority[t.priority]++;
    stats.by_status[t.status]++;
  }

  return stats;
}
