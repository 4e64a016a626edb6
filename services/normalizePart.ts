// services/normalizePart.ts
import type { PartParameter, PriceBreak } from "../types.js";

export function derivePartName(mpn: string, supplierSku: string): string {
  return mpn.trim() || supplierSku.trim();
}

export function optionalText(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

export function text(value: unknown): string {
  return optionalText(value) ?? "";
}

/**
 * Parses supplier price strings such as "0,094 €", "$1,234.50" or 0.12.
 * When both separators appear the last one is the decimal separator.
 * A lone comma is decimal, except after a non-zero integer part and before
 * exactly three digits ("$1,234"), where it groups thousands.
 */
export function parsePrice(raw: unknown): number | undefined {
  if (typeof raw === "number") {
    return Number.isFinite(raw) && raw >= 0 ? raw : undefined;
  }
  if (typeof raw !== "string") return undefined;

  let cleaned = raw.replace(/[^\d.,]/g, "");
  if (!cleaned) return undefined;

  const lastComma = cleaned.lastIndexOf(",");
  const lastDot = cleaned.lastIndexOf(".");

  if (lastComma !== -1 && lastDot !== -1) {
    const decimal = lastComma > lastDot ? "," : ".";
    const thousands = decimal === "," ? "." : ",";
    cleaned = cleaned.split(thousands).join("").replace(decimal, ".");
  } else if (lastComma !== -1) {
    const commas = cleaned.split(",").length - 1;
    const grouped = commas > 1 || /^0*[1-9]\d*,\d{3}$/.test(cleaned);
    cleaned = grouped ? cleaned.split(",").join("") : cleaned.replace(",", ".");
  } else if (cleaned.split(".").length > 2) {
    cleaned = cleaned.split(".").join("");
  }

  const value = Number.parseFloat(cleaned);
  return Number.isFinite(value) && value >= 0 ? value : undefined;
}

/** Positive integer quantity; "1,000" and "1.000" both read as 1000. */
export function parseQuantity(raw: unknown): number | undefined {
  if (typeof raw === "number") {
    return Number.isInteger(raw) && raw > 0 ? raw : undefined;
  }
  if (typeof raw !== "string") return undefined;
  const digits = raw.trim().replace(/[,.\s'](?=\d{3}\b)/g, "");
  if (!/^\d+$/.test(digits)) return undefined;
  const value = Number.parseInt(digits, 10);
  return value > 0 ? value : undefined;
}

export function parseStock(raw: unknown): number | undefined {
  if (typeof raw === "number") {
    return Number.isInteger(raw) && raw >= 0 ? raw : undefined;
  }
  if (typeof raw !== "string") return undefined;
  const digits = raw.replace(/[,.\s](?=\d{3}\b)/g, "").match(/\d+/);
  return digits ? Number.parseInt(digits[0], 10) : undefined;
}

export function parseLeadTimeWeeks(raw: unknown): number | undefined {
  if (typeof raw === "number") {
    return Number.isFinite(raw) && raw >= 0 ? raw : undefined;
  }
  if (typeof raw !== "string") return undefined;
  const match = raw.match(/(\d+(?:\.\d+)?)\s*(day|week)?/i);
  if (!match) return undefined;
  const value = Number.parseFloat(match[1]);
  if (match[2]?.toLowerCase() === "day") return Math.ceil(value / 7);
  return value;
}

export function cleanCategoryHint(segments: unknown[]): string[] {
  return segments
    .map(segment => optionalText(segment))
    .filter((segment): segment is string => segment !== undefined);
}

/** Drops empty entries; repeated names are folded into one comma-joined value. */
export function cleanParameters(
  entries: { name: unknown; value: unknown }[]
): PartParameter[] {
  const parameters: PartParameter[] = [];
  const byName = new Map<string, PartParameter>();
  for (const entry of entries) {
    const name = optionalText(entry.name);
    const value = optionalText(entry.value);
    if (!name || !value || value === "-") continue;

    const existing = byName.get(name.toLowerCase());
    if (existing) {
      if (!existing.value.split(", ").includes(value)) {
        existing.value = `${existing.value}, ${value}`;
      }
      continue;
    }
    const parameter = { name, value };
    byName.set(name.toLowerCase(), parameter);
    parameters.push(parameter);
  }
  return parameters;
}

export interface PriceBreakNormalization {
  priceBreaks: PriceBreak[];
  dropped: number;
}

/**
 * Enforces one currency per part and strictly increasing quantities.
 * The preferred currency wins when the supplier reports it; otherwise the
 * currency of the first break is kept. No conversion is ever applied.
 */
export function normalizePriceBreaks(
  raw: { quantity: unknown; price: unknown; currency: unknown }[],
  preferredCurrency: string
): PriceBreakNormalization {
  const candidates: PriceBreak[] = [];
  for (const entry of raw) {
    const quantity = parseQuantity(entry.quantity);
    const price = parsePrice(entry.price);
    const currency = optionalText(entry.currency)?.toUpperCase();
    if (quantity === undefined) continue;
    if (price === undefined || !currency) continue;
    candidates.push({ quantity, price, currency });
  }

  const preferred = preferredCurrency.toUpperCase();
  const currency = candidates.some(pb => pb.currency === preferred)
    ? preferred
    : candidates[0]?.currency;

  const seen = new Set<number>();
  const priceBreaks = candidates
    .filter(pb => pb.currency === currency)
    .filter(pb => {
      if (seen.has(pb.quantity)) return false;
      seen.add(pb.quantity);
      return true;
    })
    .sort((a, b) => a.quantity - b.quantity);

  return { priceBreaks, dropped: raw.length - priceBreaks.length };
}
