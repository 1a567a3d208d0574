import type {
  ClassificationResult,
  Ticket,
  TicketCategory,
  TicketPriority
} from "../types/contracts.js";
import { supportPreset, type SupportPreset } from "../presets/support.v1.js";

export type ClassifiableTicket = Pick<Ticket, "id" | "subject" | "description">;

const NO_MATCH_CONFIDENCE = 0.3;
const REPRODUCTION_CONFIDENCE = 0.8;
const CONFIDENCE_FLOOR = 0.3;

export function findKeywords(text: string, keywords: readonly string[]): string[] {
  const hay = text.toLowerCase();
  return keywords.filter((k) => hay.includes(k.toLowerCase()));
}

function scoreFor(matchCount: number): number {
  return Math.min(1, 0.6 + 0.1 * matchCount);
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function classifyCategory(
  text: string,
  preset: SupportPreset = supportPreset
): { category: TicketCategory; confidence: number; keywords: string[] } {
  const matches: Array<{ category: TicketCategory; keywords: string[] }> = [];
  for (const rule of preset.categories) {
    const found = findKeywords(text, rule.any);
    if (found.length) matches.push({ category: rule.category, keywords: found });
  }

  if (matches.length === 0) {
    return { category: "other", confidence: NO_MATCH_CONFIDENCE, keywords: [] };
  }

  if (matches.length === 1) {
    const [only] = matches;
    return { category: only.category, confidence: scoreFor(only.keywords.length), keywords: only.keywords };
  }

  const bug = matches.find((m) => m.category === "bug_report");
  if (bug && findKeywords(text, preset.reproduction).length) {
    return { category: "bug_report", confidence: REPRODUCTION_CONFIDENCE, keywords: bug.keywords };
  }

  // strict ">" keeps the first-declared category on ties
  let best = matches[0];
  for (const m of matches.slice(1)) {
    if (m.keywords.length > best.keywords.length) best = m;
  }

  const confidence = Math.max(CONFIDENCE_FLOOR, scoreFor(best.keywords.length) - 0.1 * (matches.length - 1));
  return { category: best.category, confidence, keywords: best.keywords };
}

export function classifyPriority(
  text: string,
  preset: SupportPreset = supportPreset
): { priority: TicketPriority; keywords: string[] } {
  for (const level of preset.priorities) {
    const found = findKeywords(text, level.any);
    if (found.length) return { priority: level.priority, keywords: found };
  }
  return { priority: "medium", keywords: [] };
}

function explain(category: TicketCategory, catKeywords: string[], priority: TicketPriority, prioKeywords: string[]) {
  const first = catKeywords.length
    ? `Category '${category}' suggested based on keywords: ${catKeywords.slice(0, 3).join(", ")}`
    : `No specific keywords found, defaulting to '${category}'`;
  const second = prioKeywords.length
    ? `Priority '${priority}' suggested based on keywords: ${prioKeywords.slice(0, 3).join(", ")}`
    : `No priority keywords found, defaulting to '${priority}'`;
  return `${first}. ${second}`;
}

export function classifyTicket(ticket: ClassifiableTicket, preset: SupportPreset = supportPreset): ClassificationResult {
  const text = `${ticket.subject} ${ticket.description}`;
  const cat = classifyCategory(text, preset);
  const prio = classifyPriority(text, preset);

  return {
    ticket_id: ticket.id,
    suggested_category: cat.category,
    suggested_priority: prio.priority,
    confidence: round2(cat.confidence),
    reasoning: explain(cat.category, cat.keywords, prio.priority, prio.keywords),
    keywords_found: [...cat.keywords, ...prio.keywords]
  };
}
