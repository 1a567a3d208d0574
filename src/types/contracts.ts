export const TRANSACTION_TYPES = ["deposit", "withdrawal", "transfer"] as const;
export const TRANSACTION_STATUSES = ["pending", "completed", "failed"] as const;

export type TransactionType = (typeof TRANSACTION_TYPES)[number];
export type TransactionStatus = (typeof TRANSACTION_STATUSES)[number];

export interface TransactionInput {
  fromAccount?: string;
  toAccount?: string;
  amount: number;
  currency: string; // uppercase ISO 4217
  type: TransactionType;
  status: TransactionStatus;
  timestamp?: string; // ISO
}

export interface Transaction {
  id: string;
  fromAccount?: string;
  toAccount?: string;
  amount: number;
  currency: string;
  type: TransactionType;
  status: TransactionStatus;
  timestamp: string; // ISO
}

export interface AccountBalance {
  accountId: string;
  balance: number;
  currency: string; // "ALL" when unfiltered
}

export interface AccountSummary {
  accountId: string;
  totalDeposits: number;
  totalWithdrawals: number;
  transactionCount: number;
  mostRecentTransaction: string | null;
}

export const TICKET_CATEGORIES = [
  "account_access",
  "technical_issue",
  "billing_question",
  "feature_request",
  "bug_report",
  "other"
] as const;
export const TICKET_PRIORITIES = ["urgent", "high", "medium", "low"] as const;
export const TICKET_STATUSES = ["new", "in_progress", "waiting_customer", "resolved", "closed"] as const;
export const TICKET_SOURCES = ["web_form", "email", "api", "chat", "phone"] as const;
export const DEVICE_TYPES = ["desktop", "mobile", "tablet"] as const;

export type TicketCategory = (typeof TICKET_CATEGORIES)[number];
export type TicketPriority = (typeof TICKET_PRIORITIES)[number];
export type TicketStatus = (typeof TICKET_STATUSES)[number];
export type TicketSource = (typeof TICKET_SOURCES)[number];
export type DeviceType = (typeof DEVICE_TYPES)[number];

export interface TicketMetadata {
  source: TicketSource;
  browser?: string;
  device_type?: DeviceType;
}

export interface TicketInput {
  subject: string;
  description: string;
  customer_id: string;
  customer_email: string;
  customer_name: string;
  category: TicketCategory;
  priority: TicketPriority;
  tags: string[];
  metadata: TicketMetadata;
}

export interface TicketPatch {
  subject?: string;
  description?: string;
  customer_email?: string;
  customer_name?: string;
  category?: TicketCategory;
  priority?: TicketPriority;
  status?: TicketStatus;
  tags?: string[];
  assigned_to?: string | null;
}

export interface Ticket extends TicketInput {
  id: string;
  status: TicketStatus;
  created_at: string; // ISO
  updated_at: string; // ISO
  resolved_at: string | null; // ISO, set once
  assigned_to: string | null;
}

export interface ClassificationResult {
  ticket_id: string;
  suggested_category: TicketCategory;
  suggested_priority: TicketPriority;
  confidence: number; // 0..1
  reasoning: string;
  keywords_found: string[];
}

export interface ImportRowError {
  row: number; // 1-indexed, 0 = whole file
  errors: string[];
}

export interface ImportResult {
  total: number;
  success_count: number;
  error_count: number;
  errors: ImportRowError[];
  imported_ids: string[];
}

export interface TicketStats {
  total: number;
  by_category: Record<TicketCategory, number>;
  by_priority: Record<TicketPriority, number>;
  by_status: Record<TicketStatus, number>;
}

export interface FieldError {
  field: string;
  message: string;
}
