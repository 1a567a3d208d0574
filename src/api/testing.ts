import type { Server } from "node:http";
import { pino } from "pino";
import { makeApp } from "../app.js";
import { loadConfig } from "../config.js";
import { MemoryTicketStore, MemoryTransactionStore } from "../store/memory.js";
import { isPlainObject } from "../lib/_util.js";

/** Boots the app on an ephemeral port with fresh stores; used by the HTTP tests. */
export async function startTestApp(env: Record<string, string> = {}) {
  const stores = { transactions: new MemoryTransactionStore(), tickets: new MemoryTicketStore() };
  const config = loadConfig({ RATE_LIMIT_MAX: "0", ...env });
  const app = makeApp({ stores, config, logger: pino({ level: "silent" }) });

  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  const addr = server.address();
  if (addr === null || typeof addr === "string") throw new Error("server has no TCP address");

  return {
    stores,
    baseUrl: `http://127.0.0.1:${addr.port}`,
    close: () => new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())))
  };
}

export async function readObject(res: Response): Promise<Record<string, unknown>> {
  const body: unknown = await res.json();
  if (!isPlainObject(body)) throw new Error(`expected a JSON object, got ${JSON.stringify(body)}`);
  return body;
}

export function postJson(url: string, body: unknown, method = "POST"): Promise<Response> {
  return fetch(url, { method, headers: { "Content-Type": "application/json" }, body: JSON.stringify(body) });
}
