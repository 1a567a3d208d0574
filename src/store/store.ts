import type {
  Ticket,
  TicketInput,
  TicketPatch,
  Transaction,
  TransactionInput
} from "../types/contracts.js";
import type { TicketQuery, TransactionQuery } from "../core/filters.js";

export interface TransactionStore {
  create(input: TransactionInput): Promise<Transaction>;
  get(id: string): Promise<Transaction | null>;
  list(q?: TransactionQuery): Promise<Transaction[]>;
  clear(): Promise<void>;
}

export interface TicketStore {
  create(input: TicketInput): Promise<Ticket>;
  get(id: string): Promise<Ticket | null>;
  list(q?: TicketQuery): Promise<Ticket[]>;
  update(id: string, patch: TicketPatch): Promise<Ticket | null>;
  delete(id: string): Promise<boolean>;
  clear(): Promise<void>;
}

export interface Stores {
  transactions: TransactionStore;
  tickets: TicketStore;
}
