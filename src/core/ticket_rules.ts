import { z } from "zod";
import {
  DEVICE_TYPES,
  TICKET_CATEGORIES,
  TICKET_PRIORITIES,
  TICKET_SOURCES,
  TICKET_STATUSES,
  type DeviceType,
  type FieldError,
  type TicketCategory,
  type TicketInput,
  type TicketMetadata,
  type TicketPatch,
  type TicketPriority,
  type TicketSource,
  type TicketStatus
} from "../types/contracts.js";
import { isPlainObject } from "../lib/_util.js";
import { fail, oneOf, pass, type Check, type Validated } from "./check.js";

// RFC 5322, simplified
const EMAIL_PATTERN =
  /^[a-zA-Z0-9.!#$%&'*+/=?^_`{|}~-]+@[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*$/;

export const SUBJECT_MAX = 200;
export const DESCRIPTION_MIN = 10;
export const DESCRIPTION_MAX = 2000;
export const EMAIL_MAX = 254;

const REQUIRED_FIELDS = [
  "subject",
  "description",
  "customer_id",
  "customer_email",
  "customer_name",
  "category",
  "metadata"
] as const;

/** POST /tickets body shape before business rules run. */
export const TicketDraftSchema = z.object({
  subject: z.string(),
  description: z.string(),
  customer_id: z.string(),
  customer_email: z.string(),
  customer_name: z.string(),
  category: z.string(),
  priority: z.string().optional(),
  tags: z.array(z.string()).optional(),
  metadata: z.object({
    source: z.string(),
    browser: z.string().nullish(),
    device_type: z.string().nullish()
  })
});

/** PATCH /tickets/:id body shape; every field optional. */
export const TicketPatchDraftSchema = z.object({
  subject: z.string().optional(),
  description: z.string().optional(),
  customer_email: z.string().optional(),
  customer_name: z.string().optional(),
  category: z.string().optional(),
  priority: z.string().optional(),
  status: z.string().optional(),
  tags: z.array(z.string()).optional(),
  assigned_to: z.string().nullable().optional()
});

export type TicketPatchDraft = z.infer<typeof TicketPatchDraftSchema>;

// code points, so an astral character counts once
const charCount = (s: string): number => [...s].length;

export function validateEmail(email: string): Check<string> {
  if (!email) return fail("Email is required");
  if (email.length > EMAIL_MAX) return fail(`Email address too long (max ${EMAIL_MAX} characters)`);
  if (!EMAIL_PATTERN.test(email)) return fail("Invalid email format");
  return pass(email);
}

export function validateSubject(subject: string): Check<string> {
  if (!subject) return fail("Subject is required");
  if (charCount(subject) > SUBJECT_MAX) return fail(`Subject must not exceed ${SUBJECT_MAX} characters`);
  return pass(subject);
}

export function validateDescription(description: string): Check<string> {
  if (!description) return fail("Description is required");
  if (charCount(description) < DESCRIPTION_MIN) {
    return fail(`Description must be at least ${DESCRIPTION_MIN} characters`);
  }
  if (charCount(description) > DESCRIPTION_MAX) {
    return fail(`Description must not exceed ${DESCRIPTION_MAX} characters`);
  }
  return pass(description);
}

export function validateCategory(raw: string): Check<TicketCategory> {
  return oneOf(TICKET_CATEGORIES, raw, "category");
}

export function validatePriority(raw: string): Check<TicketPriority> {
  return oneOf(TICKET_PRIORITIES, raw, "priority");
}

export function validateStatus(raw: string): Check<TicketStatus> {
  return oneOf(TICKET_STATUSES, raw, "status");
}

export function validateSource(raw: string): Check<TicketSource> {
  return oneOf(TICKET_SOURCES, raw, "source");
}

export function validateDeviceType(raw: string): Check<DeviceType> {
  const hit = DEVICE_TYPES.find((d) => d === raw);
  if (hit === undefined) return fail("device_type must be 'desktop', 'mobile', or 'tablet'");
  return pass(hit);
}

export function validateTags(raw: unknown): Check<string[]> {
  if (!Array.isArray(raw)) return fail("Tags must be an array");
  const tags: string[] = [];
  for (const [i, tag] of raw.entries()) {
    if (typeof tag !== "string") return fail(`Tag at index ${i} must be a string`);
    if (!tag.trim()) return fail(`Tag at index ${i} cannot be empty`);
    tags.push(tag);
  }
  return pass(tags);
}

export function validateMetadata(raw: unknown): Check<TicketMetadata> {
  if (!isPlainObject(raw)) return fail("Metadata must be an object");
  if (raw.source === undefined || raw.source === null) return fail("Metadata must include 'source' field");

  const source = validateSource(String(raw.source));
  if (!source.ok) return source;

  const meta: TicketMetadata = { source: source.value };

  if (raw.browser !== undefined && raw.browser !== null && raw.browser !== "") {
    if (typeof raw.browser !== "string") return fail("browser must be a string");
    meta.browser = raw.browser;
  }

  if (raw.device_type !== undefined && raw.device_type !== null && raw.device_type !== "") {
    const device = validateDeviceType(typeof raw.device_type === "string" ? raw.device_type : "");
    if (!device.ok) return device;
    meta.device_type = device.value;
  }

  return pass(meta);
}

// whitespace-only strings are present; the length and grammar checks judge them
function isMissing(v: unknown): boolean {
  return v === undefined || v === null || v === "";
}

/**
 * Whole-record validation for a candidate ticket, collecting every failure.
 * Accepts untyped rows so the import pipeline can feed parsed files straight in.
 */
export function validateTicket(data: Record<string, unknown>): Validated<TicketInput> {
  const errors: FieldError[] = [];

  for (const field of REQUIRED_FIELDS) {
    if (isMissing(data[field])) errors.push({ field, message: `${field} is required` });
  }

  const text = (field: string, check?: (s: string) => Check<string>): string | undefined => {
    const v = data[field];
    if (isMissing(v)) return undefined;
    if (typeof v !== "string") {
      errors.push({ field, message: `${field} must be a string` });
      return undefined;
    }
    if (!check) return v;
    const c = check(v);
    if (c.ok) return c.value;
    errors.push({ field, message: c.error });
    return undefined;
  };

  const enumField = <T>(field: string, check: (s: string) => Check<T>): T | undefined => {
    const v = data[field];
    if (v === undefined || v === null) return undefined;
    const c = check(typeof v === "string" ? v : String(v));
    if (c.ok) return c.value;
    errors.push({ field, message: c.error });
    return undefined;
  };

  const subject = text("subject", validateSubject);
  const description = text("description", validateDescription);
  const customer_id = text("customer_id");
  const customer_email = text("customer_email", validateEmail);
  const customer_name = text("customer_name");
  const category = isMissing(data.category) ? undefined : enumField("category", validateCategory);
  const priority = enumField("priority", validatePriority) ?? "medium";

  let tags: string[] = [];
  if (data.tags !== undefined && data.tags !== null) {
    const c = validateTags(data.tags);
    if (c.ok) tags = c.value;
    else errors.push({ field: "tags", message: c.error });
  }

  let metadata: TicketMetadata | undefined;
  if (data.metadata !== undefined && data.metadata !== null) {
    const c = validateMetadata(data.metadata);
    if (c.ok) metadata = c.value;
    else errors.push({ field: "metadata", message: c.error });
  }

  if (
    errors.length ||
    subject === undefined ||
    description === undefined ||
    customer_id === undefined ||
    customer_email === undefined ||
    customer_name === undefined ||
    category === undefined ||
    metadata === undefined
  ) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    value: { subject, description, customer_id, customer_email, customer_name, category, priority, tags, metadata }
  };
}

/** Validates only the fields a partial update carries. */
export function validateTicketPatch(draft: TicketPatchDraft): Validated<TicketPatch> {
  const errors: FieldError[] = [];
  const patch: TicketPatch = {};

  const take = <T>(field: string, c: Check<T>, set: (v: T) => void) => {
    if (c.ok) set(c.value);
    else errors.push({ field, message: c.error });
  };

  if (draft.subject !== undefined) take("subject", validateSubject(draft.subject), (v) => (patch.subject = v));
  if (draft.description !== undefined) {
    take("description", validateDescription(draft.description), (v) => (patch.description = v));
  }
  if (draft.customer_email !== undefined) {
    take("customer_email", validateEmail(draft.customer_email), (v) => (patch.customer_email = v));
  }
  if (draft.customer_name !== undefined) {
    if (draft.customer_name !== "") patch.customer_name = draft.customer_name;
    else errors.push({ field: "customer_name", message: "customer_name is required" });
  }
  if (draft.category !== undefined) take("category", validateCategory(draft.category), (v) => (patch.category = v));
  if (draft.priority !== undefined) take("priority", validatePriority(draft.priority), (v) => (patch.priority = v));
  if (draft.status !== undefined) take("status", validateStatus(draft.status), (v) => (patch.status = v));
  if (draft.tags !== undefined) take("tags", validateTags(draft.tags), (v) => (patch.tags = v));
  if (draft.assigned_to !== undefined) patch.assigned_to = draft.assigned_to;

  return errors.length ? { ok: false, errors } : { ok: true, value: patch };
}
