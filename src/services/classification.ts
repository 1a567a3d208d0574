import { pino, type Logger } from "pino";
import type { TicketStore } from "../store/store.js";
import type { ClassificationResult } from "../types/contracts.js";
import { classifyTicket } from "../core/classify.js";
import { supportPreset, type SupportPreset } from "../presets/support.v1.js";

export type ClassifyResult = { ok: true; result: ClassificationResult } | { ok: false; error: "not_found" };

export function createClassificationService(args: {
  store: TicketStore;
  preset?: SupportPreset;
  logger?: Logger;
}) {
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
  const preset = args.preset ?? supportPreset;

  async function classify(id: string): Promise<ClassifyResult> {
    const ticket = await args.store.get(id);
    if (!ticket) return { ok: false, error: "not_found" };
    return { ok: true, result: classifyTicket(ticket, preset) };
  }

  async function classifyAll(): Promise<ClassificationResult[]> {
    const tickets = await args.store.list();
    return tickets.map((t) => classifyTicket(t, preset));
  }

  /** Writes the suggested category and priority back; false when the ticket is gone. */
  async function applyClassification(id: string, result: ClassificationResult): Promise<boolean> {
    const updated = await args.store.update(id, {
      category: result.suggested_category,
      priority: result.suggested_priority
    });
    if (!updated) return false;

    log.info(
      { ticketId: id, category: result.suggested_category, priority: result.suggested_priority, confidence: result.confidence },
      "classify: applied"
    );
    return true;
  }

  async function classifyAndApply(id: string): Promise<ClassifyResult> {
    const classified = await classify(id);
    if (!classified.ok) return classified;
    if (!(await applyClassification(id, classified.result))) return { ok: false, error: "not_found" };
    return classified;
  }

  return { classify, classifyAll, applyClassification, classifyAndApply };
}

export type ClassificationService = ReturnType<typeof createClassificationService>;
