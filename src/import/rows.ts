import type { Logger } from "pino";
import type { ImportResult, ImportRowError } from "../types/contracts.js";
import type { TicketStore } from "../store/store.js";
import { validateTicket } from "../core/ticket_rules.js";
import { formatFieldErrors } from "../core/check.js";
import { errorMessage } from "../lib/_util.js";
import type { CandidateRow, Extraction } from "./extract.js";

export function fileFailure(error: string): ImportResult {
  return {
    total: 0,
    success_count: 0,
    error_count: 0,
    errors: [{ row: 0, errors: [error] }],
    imported_ids: []
  };
}

/**
 * Validates and creates each row on its own; a bad row is reported and
 * skipped without touching the others.
 */
export async function processRows(
  rows: readonly CandidateRow[],
  deps: { store: TicketStore; logger: Logger }
): Promise<ImportResult> {
  const errors: ImportRowError[] = [];
  const imported_ids: string[] = [];

  for (const [i, row] of rows.entries()) {
    const rowNumber = i + 1;

    const checked = validateTicket(row);
    if (!checked.ok) {
      errors.push({ row: rowNumber, errors: formatFieldErrors(checked.errors) });
      continue;
    }

    try {
      const ticket = await deps.store.create(checked.value);
      imported_ids.push(ticket.id);
    } catch (e) {
      deps.logger.warn({ err: e, row: rowNumber }, "import: row create failed");
      errors.push({ row: rowNumber, errors: [`Unexpected error: ${errorMessage(e)}`] });
    }
  }

  return {
    total: rows.length,
    success_count: imported_ids.length,
    error_count: errors.length,
    errors,
    imported_ids
  };
}

export async function importExtraction(
  extraction: Extraction,
  deps: { store: TicketStore; logger: Logger }
): Promise<ImportResult> {
  if (!extraction.ok) return fileFailure(extraction.error);
  return processRows(extraction.rows, deps);
}
