import { describe, it } from "node:test";
import assert from "node:assert";
import { filterTickets, filterTransactions } from "./filters.js";
import type { Ticket, Transaction } from "../types/contracts.js";

const txs: Transaction[] = [
  { id: "t1", toAccount: "ACC-AAAAA", amount: 10, currency: "USD", type: "deposit", status: "completed", timestamp: "2024-01-01T00:00:00.000Z" },
  { id: "t2", fromAccount: "ACC-AAAAA", toAccount: "ACC-BBBBB", amount: 5, currency: "USD", type: "transfer", status: "completed", timestamp: "2024-01-15T12:00:00.000Z" },
  { id: "t3", fromAccount: "ACC-BBBBB", amount: 1, currency: "USD", type: "withdrawal", status: "pending", timestamp: "2024-02-01T00:00:00.000Z" }
];

const ids = (items: Array<{ id: string }>) => items.map((i) => i.id);

describe("filterTransactions", () => {
  it("matches an account on either side", () => {
    assert.deepStrictEqual(ids(filterTransactions(txs, { accountId: "ACC-BBBBB" })), ["t2", "t3"]);
  });

  it("matches type case-insensitively", () => {
    assert.deepStrictEqual(ids(filterTransactions(txs, { type: "DEPOSIT" })), ["t1"]);
  });

  it("returns nothing for an unknown type", () => {
    assert.deepStrictEqual(filterTransactions(txs, { type: "refund" }), []);
  });

  it("treats both date bounds as inclusive", () => {
    const out = filterTransactions(txs, { from: "2024-01-15T12:00:00Z", to: "2024-02-01" });
    assert.deepStrictEqual(ids(out), ["t2", "t3"]);
  });

  it("ignores an unparsable date bound", () => {
    assert.deepStrictEqual(ids(filterTransactions(txs, { from: "last week" })), ["t1", "t2", "t3"]);
  });

  it("composes filters with AND", () => {
    assert.deepStrictEqual(ids(filterTransactions(txs, { accountId: "ACC-AAAAA", type: "transfer" })), ["t2"]);
  });
});

function ticket(id: string, over: Partial<Ticket>): Ticket {
  return {
    id,
    subject: "s",
    description: "description text",
    customer_id: "c",
    customer_email: "c@example.com",
    customer_name: "C",
    category: "other",
    priority: "medium",
    tags: [],
    metadata: { source: "api" },
    status: "new",
    created_at: "2024-01-01T00:00:00.000Z",
    updated_at: "2024-01-01T00:00:00.000Z",
    resolved_at: null,
    assigned_to: null,
    ...over
  };
}

describe("filterTickets", () => {
  const tickets = [
    ticket("a", { category: "bug_report", priority: "high" }),
    ticket("b", { category: "bug_report", priority: "low", status: "resolved" }),
    ticket("c", { category: "billing_question", priority: "high" })
  ];

  it("composes category, priority and status", () => {
    assert.deepStrictEqual(ids(filterTickets(tickets, { category: "bug_report" })), ["a", "b"]);
    assert.deepStrictEqual(ids(filterTickets(tickets, { category: "bug_report", priority: "high" })), ["a"]);
    assert.deepStrictEqual(ids(filterTickets(tickets, { status: "resolved" })), ["b"]);
  });

  it("returns nothing for a value outside the enum", () => {
    assert.deepStrictEqual(filterTickets(tickets, { priority: "critical" }), []);
  });
});
