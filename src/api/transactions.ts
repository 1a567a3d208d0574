import { Router } from "express";
import { z } from "zod";
import type { TransactionService } from "../services/transactions.js";
import { sendFailure } from "./errors.js";

const ListQuerySchema = z.object({
  accountId: z.string().optional(),
  type: z.string().optional(),
  from: z.string().optional(),
  to: z.string().optional()
});

const BalanceQuerySchema = z.object({ currency: z.string().optional() });

export function makeTransactionRoutes(args: { service: TransactionService }) {
  const r = Router();

  r.post("/transactions", async (req, res) => {
    const out = await args.service.create(req.body);
    if (!out.ok) {
      sendFailure(res, out, "Transaction");
      return;
    }
    res.status(201).json(out.transaction);
  });

  r.get("/transactions", async (req, res) => {
    const q = ListQuerySchema.parse(req.query);
    res.json(await args.service.list(q));
  });

  r.get("/transactions/:id", async (req, res) => {
    const out = await args.service.get(req.params.id);
    if (!out.ok) {
      sendFailure(res, out, "Transaction");
      return;
    }
    res.json(out.transaction);
  });

  r.get("/accounts/:id/balance", async (req, res) => {
    const { currency } = BalanceQuerySchema.parse(req.query);
    res.json(await args.service.balance(req.params.id, currency));
  });

  r.get("/accounts/:id/summary", async (req, res) => {
    res.json(await args.service.summary(req.params.id));
  });

  return r;
}
