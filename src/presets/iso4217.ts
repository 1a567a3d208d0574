import { z } from "zod";
import raw from "./iso4217.json" with { type: "json" };

const CurrencyList = z.array(z.string().regex(/^[A-Z]{3}$/));

export const SUPPORTED_CURRENCIES: ReadonlySet<string> = new Set(CurrencyList.parse(raw));
