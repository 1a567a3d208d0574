import { z } from "zod";
import raw from "./demo_data.json" with { type: "json" };
import type { Stores } from "../store/store.js";
import { validateTicket } from "../core/ticket_rules.js";
import { TransactionDraftSchema, validateTransaction } from "../core/transaction_rules.js";
import { formatFieldErrors } from "../core/check.js";

const DemoDataSchema = z.object({
  tickets: z.array(z.record(z.unknown())),
  transactions: z.array(TransactionDraftSchema)
});

/**
 * Inserts the sample records through the same rules the API applies.
 * A record the rules reject throws; the fixture is expected to stay valid.
 */
export async function seedDemoData(stores: Stores): Promise<{ tickets: number; transactions: number }> {
  const data = DemoDataSchema.parse(raw);

  for (const [i, t] of data.tickets.entries()) {
    const checked = validateTicket(t);
    if (!checked.ok) throw new Error(`demo ticket ${i}: ${formatFieldErrors(checked.errors).join("; ")}`);
    await stores.tickets.create(checked.value);
  }

  for (const [i, t] of data.transactions.entries()) {
    const checked = validateTransaction(t);
    if (!checked.ok) throw new Error(`demo transaction ${i}: ${formatFieldErrors(checked.errors).join("; ")}`);
    await stores.transactions.create(checked.value);
  }

  return { tickets: data.tickets.length, transactions: data.transactions.length };
}
