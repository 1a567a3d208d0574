import { Router } from "express";
import { z } from "zod";
import type { TicketService } from "../services/tickets.js";
import type { ClassificationService } from "../services/classification.js";
import { sendFailure } from "./errors.js";

const ListQuerySchema = z.object({
  category: z.string().optional(),
  priority: z.string().optional(),
  status: z.string().optional()
});

export function makeTicketRoutes(args: { tickets: TicketService; classification: ClassificationService }) {
  const r = Router();

  r.post("/", async (req, res) => {
    const out = await args.tickets.create(req.body);
    if (!out.ok) {
      sendFailure(res, out, "Ticket");
      return;
    }
    res.status(201).json(out.ticket);
  });

  r.get("/", async (req, res) => {
    const items = await args.tickets.list(ListQuerySchema.parse(req.query));
    res.json({ items, total: items.length });
  });

  // fixed paths go before /:id
  r.get("/stats", async (_req, res) => {
    res.json(await args.tickets.stats());
  });

  r.post("/classify-all", async (_req, res) => {
    res.json(await args.classification.classifyAll());
  });

  r.get("/:id", async (req, res) => {
    const out = await args.tickets.get(req.params.id);
    if (!out.ok) {
      sendFailure(res, out, "Ticket");
      return;
    }
    res.json(out.ticket);
  });

  r.patch("/:id", async (req, res) => {
    const out = await args.tickets.update(req.params.id, req.body);
    if (!out.ok) {
      sendFailure(res, out, "Ticket");
      return;
    }
    res.json(out.ticket);
  });

  r.delete("/:id", async (req, res) => {
    const out = await args.tickets.remove(req.params.id);
    if (!out.ok) {
      sendFailure(res, out, "Ticket");
      return;
    }
    res.status(204).end();
  });

  r.post("/:id/classify", async (req, res) => {
    const out = await args.classification.classify(req.params.id);
    if (!out.ok) {
      sendFailure(res, out, "Ticket");
      return;
    }
    res.json(out.result);
  });

  r.post("/:id/apply-classification", async (req, res) => {
    const out = await args.classification.classifyAndApply(req.params.id);
    if (!out.ok) {
      sendFailure(res, out, "Ticket");
      return;
    }
    res.json({
      message: "Classification applied successfully",
      ticket_id: req.params.id,
      suggested_category: out.result.suggested_category,
      suggested_priority: out.result.suggested_priority,
      confidence: out.result.confidence
    });
  });

  return r;
}
