export { makeApp } from "./app.js";
export { loadConfig } from "./config.js";
export type { AppConfig } from "./config.js";
export { createTransactionService } from "./services/transactions.js";
export { createTicketService } from "./services/tickets.js";
export { createClassificationService } from "./services/classification.js";
export { createImportService } from "./services/imports.js";
export { MemoryTicketStore, MemoryTransactionStore } from "./store/memory.js";
export type { Stores, TicketStore, TransactionStore } from "./store/store.js";
export { classifyTicket } from "./core/classify.js";
export { accountSummary, calculateBalance, ticketStats } from "./core/reports.js";
export { validateTicket } from "./core/ticket_rules.js";
export { validateTransaction } from "./core/transaction_rules.js";
export { seedDemoData } from "./lib/demo_data.js";
export type {
  AccountBalance,
  AccountSummary,
  ClassificationResult,
  ImportResult,
  Ticket,
  TicketStats,
  Transaction
} from "./types/contracts.js";
