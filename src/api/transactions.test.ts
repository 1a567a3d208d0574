import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import { startTestApp, readObject, postJson } from "./testing.js";

describe("transaction routes", () => {
  let ctx: Awaited<ReturnType<typeof startTestApp>>;

  before(async () => {
    ctx = await startTestApp();
  });

  after(async () => {
    await ctx.close();
  });

  it("creates a transaction and reads it back", async () => {
    const res = await postJson(`${ctx.baseUrl}/api/transactions`, {
      toAccount: "ACC-12345",
      amount: 100.99,
      currency: "usd",
      type: "deposit",
      status: "completed",
      timestamp: "2024-01-15T10:30:00Z"
    });
    assert.strictEqual(res.status, 201);
    const created = await readObject(res);
    assert.strictEqual(created.currency, "USD");
    assert.strictEqual(created.timestamp, "2024-01-15T10:30:00.000Z");

    const got = await fetch(`${ctx.baseUrl}/api/transactions/${String(created.id)}`);
    assert.strictEqual(got.status, 200);
    assert.deepStrictEqual(await got.json(), created);
  });

  it("rejects business-rule failures with 400 and every detail", async () => {
    const res = await postJson(`${ctx.baseUrl}/api/transactions`, {
      fromAccount: "ACC-123",
      amount: 100.999,
      currency: "USD",
      type: "withdrawal"
    });
    assert.strictEqual(res.status, 400);
    assert.deepStrictEqual(await res.json(), {
      error: "Validation failed",
      details: [
        { field: "fromAccount", message: "Account must match pattern ACC-XXXXX (5 alphanumeric characters)" },
        { field: "amount", message: "Amount must have maximum 2 decimal places" }
      ]
    });
  });

  it("rejects a wrongly shaped body with 422", async () => {
    const res = await postJson(`${ctx.baseUrl}/api/transactions`, { amount: "ten", currency: "USD", type: "deposit" });
    assert.strictEqual(res.status, 422);
    const body = await readObject(res);
    assert.strictEqual(body.error, "Validation failed");
    assert.deepStrictEqual(body.details, [{ field: "amount", message: "Expected number, received string", type: "invalid_type" }]);
  });

  it("rejects malformed JSON with 422", async () => {
    const res = await fetch(`${ctx.baseUrl}/api/transactions`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{ not json"
    });
    assert.strictEqual(res.status, 422);
    assert.deepStrictEqual(await res.json(), {
      error: "Validation failed",
      details: [{ field: "body", message: "Malformed JSON body", type: "json_invalid" }]
    });
  });

  it("returns 404 for an unknown id", async () => {
    const res = await fetch(`${ctx.baseUrl}/api/transactions/does-not-exist`);
    assert.strictEqual(res.status, 404);
    assert.deepStrictEqual(await res.json(), { error: "Transaction not found" });
  });

  it("moves a completed transfer between balances and summarizes the account", async () => {
    await postJson(`${ctx.baseUrl}/api/transactions`, {
      toAccount: "ACC-SRC01",
      amount: 80,
      currency: "USD",
      type: "deposit",
      status: "completed"
    });
    await postJson(`${ctx.baseUrl}/api/transactions`, {
      fromAccount: "ACC-SRC01",
      toAccount: "ACC-DST01",
      amount: 50,
      currency: "USD",
      type: "transfer",
      status: "completed"
    });

    const src = await fetch(`${ctx.baseUrl}/api/accounts/ACC-SRC01/balance`);
    assert.deepStrictEqual(await src.json(), { accountId: "ACC-SRC01", balance: 30, currency: "ALL" });

    const dst = await fetch(`${ctx.baseUrl}/api/accounts/ACC-DST01/balance?currency=usd`);
    assert.deepStrictEqual(await dst.json(), { accountId: "ACC-DST01", balance: 50, currency: "USD" });

    const summary = await readObject(await fetch(`${ctx.baseUrl}/api/accounts/ACC-SRC01/summary`));
    assert.strictEqual(summary.totalDeposits, 80);
    assert.strictEqual(summary.totalWithdrawals, 50);
    assert.strictEqual(summary.transactionCount, 2);
  });

  it("filters the list by account and type", async () => {
    const res = await fetch(`${ctx.baseUrl}/api/transactions?accountId=ACC-DST01&type=transfer`);
    assert.strictEqual(res.status, 200);
    const items: unknown = await res.json();
    assert.ok(Array.isArray(items));
    assert.strictEqual(items.length, 1);

    const none = await fetch(`${ctx.baseUrl}/api/transactions?type=refund`);
    assert.deepStrictEqual(await none.json(), []);
  });
});
