import { parse as parseCsv } from "csv-parse/sync";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { errorMessage, isPlainObject, safeJsonParse } from "../lib/_util.js";

export type ImportFormat = "csv" | "json" | "xml";

export type CandidateRow = Record<string, unknown>;

/** Rows pulled out of an upload, or the reason the file could not be read at all. */
export type Extraction = { ok: true; rows: CandidateRow[] } | { ok: false; error: string };

const XML_ROOT = "tickets";
const XML_ITEM = "ticket";

function decodeUtf8(bytes: Uint8Array): { ok: true; text: string } | { ok: false; error: string } {
  try {
    // fatal: reject malformed sequences instead of substituting U+FFFD; a leading BOM is dropped
    return { ok: true, text: new TextDecoder("utf-8", { fatal: true }).decode(bytes) };
  } catch (e) {
    return { ok: false, error: `Failed to read file: ${errorMessage(e)}` };
  }
}

function cell(row: CandidateRow, key: string): string | undefined {
  const v = row[key];
  return typeof v === "string" && v !== "" ? v : undefined;
}

/** Flat CSV columns folded into the canonical ticket shape. */
export function csvRowToCandidate(row: CandidateRow): CandidateRow {
  const tags = (cell(row, "tags") ?? "")
    .split(",")
    .map((t) => t.trim())
    .filter(Boolean);

  // a missing column takes the default; a blank cell is left for validation to reject
  const metadata: CandidateRow = { source: "source" in row ? row.source : "api" };
  const browser = cell(row, "browser");
  const device = cell(row, "device_type");
  if (browser) metadata.browser = browser;
  if (device) metadata.device_type = device;

  return {
    customer_id: cell(row, "customer_id"),
    customer_email: cell(row, "customer_email"),
    customer_name: cell(row, "customer_name"),
    subject: cell(row, "subject"),
    description: cell(row, "description"),
    category: cell(row, "category"),
    priority: "priority" in row ? row.priority : "medium",
    tags,
    metadata
  };
}

export function extractCsvRows(bytes: Uint8Array): Extraction {
  const decoded = decodeUtf8(bytes);
  if (!decoded.ok) return decoded;

  let records: unknown;
  try {
    // short rows keep only the columns they reach; extra cells are dropped
    records = parseCsv(decoded.text, { columns: true, skip_empty_lines: true, trim: true, relax_column_count: true });
  } catch (e) {
    return { ok: false, error: `Failed to parse CSV: ${errorMessage(e)}` };
  }

  if (!Array.isArray(records)) return { ok: false, error: "Failed to parse CSV: no records" };
  return { ok: true, rows: records.filter(isPlainObject).map(csvRowToCandidate) };
}

export function extractJsonRows(bytes: Uint8Array): Extraction {
  const decoded = decodeUtf8(bytes);
  if (!decoded.ok) return decoded;

  const parsed = safeJsonParse(decoded.text);
  if (!parsed.ok) return { ok: false, error: `Failed to parse JSON: ${parsed.error}` };

  const data = parsed.value;
  if (!Array.isArray(data) || !data.every(isPlainObject)) {
    return { ok: false, error: "JSON must be an array of ticket objects" };
  }
  return { ok: true, rows: data };
}

const xml = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (_name, jpath) => jpath === `${XML_ROOT}.${XML_ITEM}` || jpath === `${XML_ROOT}.${XML_ITEM}.tags.tag`
});

function scalar(v: unknown): string | undefined {
  if (Array.isArray(v)) return scalar(v[v.length - 1]);
  return typeof v === "string" && v !== "" ? v : undefined;
}

export function xmlNodeToCandidate(node: unknown): CandidateRow {
  const out: CandidateRow = {};
  if (!isPlainObject(node)) return out;

  // a repeated child keeps its last occurrence
  for (const [key, raw] of Object.entries(node)) {
    const value: unknown = Array.isArray(raw) ? raw[raw.length - 1] : raw;
    if (key === "tags") {
      const tag = isPlainObject(value) ? value.tag : undefined;
      out.tags = Array.isArray(tag) ? tag.filter((t): t is string => typeof t === "string" && t !== "") : [];
    } else if (key === "metadata") {
      const meta: CandidateRow = {};
      if (isPlainObject(value)) {
        for (const [mk, mv] of Object.entries(value)) meta[mk] = scalar(mv);
      }
      out.metadata = meta;
    } else {
      out[key] = scalar(value);
    }
  }
  return out;
}

export function extractXmlRows(bytes: Uint8Array): Extraction {
  const decoded = decodeUtf8(bytes);
  if (!decoded.ok) return decoded;

  const valid = XMLValidator.validate(decoded.text);
  if (valid !== true) return { ok: false, error: `Failed to parse XML: ${valid.err.msg}` };

  let doc: unknown;
  try {
    doc = xml.parse(decoded.text);
  } catch (e) {
    return { ok: false, error: `Failed to parse XML: ${errorMessage(e)}` };
  }

  const roots = isPlainObject(doc) ? Object.keys(doc) : [];
  if (!isPlainObject(doc) || roots.length !== 1 || roots[0] !== XML_ROOT) {
    return { ok: false, error: `XML root element must be <${XML_ROOT}>` };
  }

  const root = doc[XML_ROOT];
  const items = isPlainObject(root) ? root[XML_ITEM] : undefined;
  return { ok: true, rows: Array.isArray(items) ? items.map(xmlNodeToCandidate) : [] };
}

export const extractors: Record<ImportFormat, (bytes: Uint8Array) => Extraction> = {
  csv: extractCsvRows,
  json: extractJsonRows,
  xml: extractXmlRows
};
