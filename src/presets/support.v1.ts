import { z } from "zod";
import raw from "./support.v1.json" with { type: "json" };
import { TICKET_CATEGORIES, TICKET_PRIORITIES } from "../types/contracts.js";

const Keywords = z.array(z.string().trim().min(1)).min(1);

const SupportPresetSchema = z.object({
  // order matters: earlier categories win ties
  categories: z.array(z.object({ category: z.enum(TICKET_CATEGORIES), any: Keywords })),
  // scanned top to bottom, first level with a hit wins
  priorities: z.array(z.object({ priority: z.enum(TICKET_PRIORITIES), any: Keywords })),
  reproduction: Keywords
});

export type SupportPreset = z.infer<typeof SupportPresetSchema>;

export const supportPreset: SupportPreset = SupportPresetSchema.parse(raw);
