import express from "express";
import { pino, type Logger } from "pino";
import type { AppConfig } from "./config.js";
import type { Stores } from "./store/store.js";
import { createTransactionService } from "./services/transactions.js";
import { createTicketService } from "./services/tickets.js";
import { createClassificationService } from "./services/classification.js";
import { createImportService } from "./services/imports.js";
import { makeTransactionRoutes } from "./api/transactions.js";
import { makeTicketRoutes } from "./api/tickets.js";
import { makeImportRoutes } from "./api/imports.js";
import { makeRateLimiter } from "./api/rate-limit.js";
import { errorHandler, notFound } from "./api/errors.js";

export const SERVICE_NAME = "ledger-desk";
export const SERVICE_VERSION = "1.0.0";

export function makeApp(args: { stores: Stores; config: AppConfig; logger?: Logger }) {
  const log = args.logger ?? pino({ level: args.config.logLevel });
  const { stores, config } = args;

  const transactions = createTransactionService({ store: stores.transactions, logger: log });
  const tickets = createTicketService({ store: stores.tickets, logger: log });
  const classification = createClassificationService({ store: stores.tickets, logger: log });
  const imports = createImportService({ store: stores.tickets, logger: log });

  const app = express();
  app.disable("x-powered-by");

  if (config.rateLimit.max > 0) app.use(makeRateLimiter(config.rateLimit));
  app.use(express.json({ limit: config.jsonBodyLimit }));

  app.get("/", (_req, res) => {
    res.json({
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      endpoints: {
        transactions: "/api/transactions",
        balance: "/api/accounts/{accountId}/balance",
        summary: "/api/accounts/{accountId}/summary",
        tickets: "/tickets",
        stats: "/tickets/stats",
        import: "/import/{csv|json|xml}"
      },
      status: "operational"
    });
  });

  app.get("/health", (_req, res) => {
    res.json({ status: "healthy", service: SERVICE_NAME, version: SERVICE_VERSION });
  });

  app.use("/api", makeTransactionRoutes({ service: transactions }));
  app.use("/tickets", makeTicketRoutes({ tickets, classification }));
  app.use("/import", makeImportRoutes({ service: imports, maxBytes: config.uploadMaxBytes }));

  app.use(notFound);
  app.use(errorHandler(log));

  return app;
}
