import { pino, type Logger } from "pino";
import type { TicketStore } from "../store/store.js";
import type { FieldError, Ticket, TicketStats } from "../types/contracts.js";
import {
  TicketDraftSchema,
  TicketPatchDraftSchema,
  validateTicket,
  validateTicketPatch
} from "../core/ticket_rules.js";
import { ticketStats } from "../core/reports.js";
import type { TicketQuery } from "../core/filters.js";

export type TicketResult =
  | { ok: true; ticket: Ticket }
  | { ok: false; error: "not_found" }
  | { ok: false; error: "validation_failed"; details: FieldError[] };

export function createTicketService(args: { store: TicketStore; logger?: Logger }) {
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });

  async function create(raw: unknown): Promise<TicketResult> {
    const draft = TicketDraftSchema.parse(raw);

    const checked = validateTicket(draft);
    if (!checked.ok) return { ok: false, error: "validation_failed", details: checked.errors };

    const ticket = await args.store.create(checked.value);
    log.info({ ticketId: ticket.id, category: ticket.category }, "ticket: created");
    return { ok: true, ticket };
  }

  async function get(id: string): Promise<TicketResult> {
    const ticket = await args.store.get(id);
    if (!ticket) return { ok: false, error: "not_found" };
    return { ok: true, ticket };
  }

  async function list(q: TicketQuery = {}): Promise<Ticket[]> {
    return args.store.list(q);
  }

  async function update(id: string, raw: unknown): Promise<TicketResult> {
    const draft = TicketPatchDraftSchema.parse(raw);

    const checked = validateTicketPatch(draft);
    if (!checked.ok) return { ok: false, error: "validation_failed", details: checked.errors };

    const ticket = await args.store.update(id, checked.value);
    if (!ticket) return { ok: false, error: "not_found" };

    log.info({ ticketId: id, fields: Object.keys(checked.value) }, "ticket: updated");
    return { ok: true, ticket };
  }

  async function remove(id: string): Promise<{ ok: true } | { ok: false; error: "not_found" }> {
    if (!(await args.store.delete(id))) return { ok: false, error: "not_found" };
    log.info({ ticketId: id }, "ticket: deleted");
    return { ok: true };
  }

  async function stats(): Promise<TicketStats> {
    return ticketStats(await args.store.list());
  }

  return { create, get, list, update, remove, stats };
}

export type TicketService = ReturnType<typeof createTicketService>;
