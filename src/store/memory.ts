import { nanoid } from "nanoid";
import type { TicketStore, TransactionStore } from "./store.js";
import type { Ticket, TicketInput, TicketPatch, Transaction, TransactionInput } from "../types/contracts.js";
import { filterTickets, filterTransactions, type TicketQuery, type TransactionQuery } from "../core/filters.js";
import { nowUtc } from "../lib/_util.js";

// Every method body runs synchronously, so a mutation always completes
// within one event-loop turn and concurrent requests cannot interleave it.

export class MemoryTransactionStore implements TransactionStore {
  private items: Transaction[] = [];

  async create(input: TransactionInput): Promise<Transaction> {
    const tx: Transaction = {
      id: nanoid(),
      amount: input.amount,
      currency: input.currency,
      type: input.type,
      status: input.status,
      timestamp: input.timestamp ?? nowUtc()
    };
    if (input.fromAccount) tx.fromAccount = input.fromAccount;
    if (input.toAccount) tx.toAccount = input.toAccount;

    this.items.push(tx);
    return { ...tx };
  }

  async get(id: string): Promise<Transaction | null> {
    const tx = this.items.find((t) => t.id === id);
    return tx ? { ...tx } : null;
  }

  async list(q: TransactionQuery = {}): Promise<Transaction[]> {
    return filterTransactions(this.items, q).map((t) => ({ ...t }));
  }

  async clear(): Promise<void> {
    this.items = [];
  }
}

export class MemoryTicketStore implements TicketStore {
  // Map keeps insertion order, which is the order list() reports
  private byId = new Map<string, Ticket>();

  async create(input: TicketInput): Promise<Ticket> {
    const now = nowUtc();
    const ticket: Ticket = {
      id: nanoid(),
      subject: input.subject,
      description: input.description,
      customer_id: input.customer_id,
      customer_email: input.customer_email,
      customer_name: input.customer_name,
      category: input.category,
      priority: input.priority,
      tags: [...input.tags],
      metadata: { ...input.metadata },
      status: "new",
      created_at: now,
      updated_at: now,
      resolved_at: null,
      assigned_to: null
    };
    this.byId.set(ticket.id, ticket);
    return clone(ticket);
  }

  async get(id: string): Promise<Ticket | null> {
    const t = this.byId.get(id);
    return t ? clone(t) : null;
  }

  async list(q: TicketQuery = {}): Promise<Ticket[]> {
    return filterTickets([...this.byId.values()], q).map(clone);
  }

  async update(id: string, patch: TicketPatch): Promise<Ticket | null> {
    const cur = this.byId.get(id);
    if (!cur) return null;

    const now = nowUtc();
    const updated: Ticket = { ...cur, updated_at: now };
    if (patch.subject !== undefined) updated.subject = patch.subject;
    if (patch.description !== undefined) updated.description = patch.description;
    if (patch.customer_email !== undefined) updated.customer_email = patch.customer_email;
    if (patch.customer_name !== undefined) updated.customer_name = patch.customer_name;
    if (patch.category !== undefined) updated.category = patch.category;
    if (patch.priority !== undefined) updated.priority = patch.priority;
    if (patch.tags !== undefined) updated.tags = [...patch.tags];
    if (patch.assigned_to !== undefined) updated.assigned_to = patch.assigned_to;
    if (patch.status !== undefined) {
      updated.status = patch.status;
      // resolved_at is written once, on the first move to resolved
      if (patch.status === "resolved" && updated.resolved_at === null) updated.resolved_at = now;
    }

    this.byId.set(id, updated);
    return clone(updated);
  }

  async delete(id: string): Promise<boolean> {
    return this.byId.delete(id);
  }

  async clear(): Promise<void> {
    this.byId.clear();
  }
}

function clone(t: Ticket): Ticket {
  return { ...t, tags: [...t.tags], metadata: { ...t.metadata } };
}
