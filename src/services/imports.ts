import { pino, type Logger } from "pino";
import type { TicketStore } from "../store/store.js";
import type { ImportResult } from "../types/contracts.js";
import { extractors, type ImportFormat } from "../import/extract.js";
import { importExtraction } from "../import/rows.js";

export function createImportService(args: { store: TicketStore; logger?: Logger }) {
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });

  async function importFile(format: ImportFormat, bytes: Uint8Array): Promise<ImportResult> {
    const extraction = extractors[format](bytes);
    if (!extraction.ok) log.warn({ format, error: extraction.error }, "import: file rejected");

    const result = await importExtraction(extraction, { store: args.store, logger: log });
    log.info(
      { format, total: result.total, success: result.success_count, failed: result.error_count },
      "import: done"
    );
    return result;
  }

  return {
    importFile,
    importCsv: (bytes: Uint8Array) => importFile("csv", bytes),
    importJson: (bytes: Uint8Array) => importFile("json", bytes),
    importXml: (bytes: Uint8Array) => importFile("xml", bytes)
  };
}

export type ImportService = ReturnType<typeof createImportService>;
