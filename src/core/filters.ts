import {
  TICKET_CATEGORIES,
  TICKET_PRIORITIES,
  TICKET_STATUSES,
  TRANSACTION_TYPES,
  type Ticket,
  type Transaction
} from "../types/contracts.js";
import { parseIsoInstant } from "../lib/_util.js";

export interface TransactionQuery {
  accountId?: string;
  type?: string;
  from?: string;
  to?: string;
}

export interface TicketQuery {
  category?: string;
  priority?: string;
  status?: string;
}

function member<T extends string>(values: readonly T[], raw: string): T | undefined {
  return values.find((v) => v === raw);
}

/**
 * AND-composes the transaction filters. An unknown type matches nothing;
 * an unparsable date bound is ignored. Both bounds are inclusive.
 */
export function filterTransactions(items: readonly Transaction[], q: TransactionQuery): Transaction[] {
  let out = [...items];

  if (q.accountId) {
    const acc = q.accountId;
    out = out.filter((t) => t.fromAccount === acc || t.toAccount === acc);
  }

  if (q.type) {
    const type = member(TRANSACTION_TYPES, q.type.toLowerCase());
    if (!type) return [];
    out = out.filter((t) => t.type === type);
  }

  const from = q.from ? parseIsoInstant(q.from) : null;
  if (from) out = out.filter((t) => Date.parse(t.timestamp) >= from.getTime());

  const to = q.to ? parseIsoInstant(q.to) : null;
  if (to) out = out.filter((t) => Date.parse(t.timestamp) <= to.getTime());

  return out;
}

export function filterTickets(items: readonly Ticket[], q: TicketQuery): Ticket[] {
  let out = [...items];

  if (q.category) {
    const category = member(TICKET_CATEGORIES, q.category);
    if (!category) return [];
    out = out.filter((t) => t.category === category);
  }

  if (q.priority) {
    const priority = member(TICKET_PRIORITIES, q.priority);
    if (!priority) return [];
    out = out.filter((t) => t.priority === priority);
  }

  if (q.status) {
    const status = member(TICKET_STATUSES, q.status);
    if (!status) return [];
    out = out.filter((t) => t.status === status);
  }

  return out;
}
