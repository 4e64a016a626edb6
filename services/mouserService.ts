// services/mouserService.ts
import { z } from "zod";
import type { CanonicalPart } from "../types.js";
import type { ImporterConfig } from "./config.js";
import { ImporterError } from "./errors.js";
import { FetchLike, defaultFetch, preview, sendRequest } from "./http.js";
import {
  cleanCategoryHint,
  cleanParameters,
  derivePartName,
  normalizePriceBreaks,
  optionalText,
  parseLeadTimeWeeks,
  parseStock,
  text
} from "./normalizePart.js";
import { SupplierAdapter, SupplierFetchResult, selectCandidate } from "./supplierAdapter.js";

/* -----------------------------
   Raw payload
----------------------------- */

const MouserPriceBreakSchema = z.object({
  Quantity: z.union([z.number(), z.string()]).nullish(),
  Price: z.union([z.number(), z.string()]).nullish(),
  Currency: z.string().nullish()
});

const MouserAttributeSchema = z.object({
  AttributeName: z.string().nullish(),
  AttributeValue: z.string().nullish()
});

const MouserPartSchema = z.object({
  Availability: z.string().nullish(),
  AvailabilityInStock: z.string().nullish(),
  Category: z.string().nullish(),
  DataSheetUrl: z.string().nullish(),
  Description: z.string().nullish(),
  ImagePath: z.string().nullish(),
  LeadTime: z.string().nullish(),
  Manufacturer: z.string().nullish(),
  ManufacturerPartNumber: z.string().nullish(),
  MouserPartNumber: z.string().nullish(),
  ProductDetailUrl: z.string().nullish(),
  ProductAttributes: z.array(MouserAttributeSchema).nullish(),
  PriceBreaks: z.array(MouserPriceBreakSchema).nullish()
});

const MouserResponseSchema = z.object({
  Errors: z
    .array(z.object({ Code: z.string().nullish(), Message: z.string().nullish() }))
    .nullish(),
  SearchResults: z
    .object({
      NumberOfResult: z.number().nullish(),
      Parts: z.array(MouserPartSchema).nullish()
    })
    .nullish()
});

export type MouserPart = z.infer<typeof MouserPartSchema>;

/* -----------------------------
   Normalization
----------------------------- */

export interface NormalizeContext {
  currency: string;
  companyId: number | null;
}

export function normalizeMouserPart(
  raw: MouserPart,
  ctx: NormalizeContext
): { part: CanonicalPart; warnings: string[] } {
  const warnings: string[] = [];
  const mpn = text(raw.ManufacturerPartNumber);
  const supplierSku = text(raw.MouserPartNumber);

  const { priceBreaks, dropped } = normalizePriceBreaks(
    (raw.PriceBreaks ?? []).map(pb => ({
      quantity: pb.Quantity,
      price: pb.Price,
      currency: pb.Currency
    })),
    ctx.currency
  );
  if (dropped > 0) {
    warnings.push(`Ignored ${dropped} Mouser price break(s) that were invalid or in another currency`);
  }

  const part: CanonicalPart = {
    name: derivePartName(mpn, supplierSku),
    description: text(raw.Description),
    manufacturer: text(raw.Manufacturer),
    mpn,
    supplier: "mouser",
    supplierCompanyId: ctx.companyId ?? undefined,
    supplierSku,
    supplierLink: optionalText(raw.ProductDetailUrl),
    categoryHint: cleanCategoryHint((raw.Category ?? "").split(/\s*->\s*/)),
    datasheetUrl: optionalText(raw.DataSheetUrl),
    imageUrl: optionalText(raw.ImagePath),
    stock: parseStock(raw.AvailabilityInStock ?? raw.Availability),
    leadTimeWeeks: parseLeadTimeWeeks(raw.LeadTime),
    parameters: cleanParameters(
      (raw.ProductAttributes ?? []).map(attr => ({
        name: attr.AttributeName,
        value: attr.AttributeValue
      }))
    ),
    priceBreaks
  };

  return { part, warnings };
}

/* -----------------------------
   Adapter
----------------------------- */

const KEY_ERROR = /api ?key|unique identifier|unauthori[sz]ed/i;

export class MouserAdapter implements SupplierAdapter {
  readonly id = "mouser" as const;
  readonly displayName = "Mouser";

  constructor(
    private readonly config: ImporterConfig,
    private readonly fetchImpl: FetchLike = defaultFetch
  ) {}

  async fetch(partNumber: string): Promise<SupplierFetchResult> {
    const apiKey = this.config.mouser.apiKey;
    if (!apiKey) {
      throw new ImporterError("Misconfigured", "MOUSER_API_KEY is not configured");
    }

    const url = `${this.config.mouser.apiUrl}?apiKey=${encodeURIComponent(apiKey)}`;
    const res = await sendRequest(
      this.fetchImpl,
      url,
      {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "application/json" },
        body: JSON.stringify({
          SearchByPartNumberRequest: {
            mouserPartNumber: partNumber,
            partSearchOptions: "Exact"
          }
        })
      },
      { service: "Mouser", timeoutMs: this.config.requestTimeoutMs, unavailable: "SupplierUnavailable" }
    );

    if (res.status === 401 || res.status === 403) {
      throw new ImporterError("Misconfigured", "Mouser rejected the configured API key");
    }
    if (res.status >= 400) {
      throw new ImporterError(
        "SupplierUnavailable",
        `Mouser responded with ${res.status}: ${preview(res.text)}`
      );
    }

    const parsed = MouserResponseSchema.safeParse(res.body);
    if (!parsed.success) {
      throw new ImporterError("SupplierUnavailable", "Unexpected Mouser response shape", {
        cause: parsed.error
      });
    }

    const errors = parsed.data.Errors ?? [];
    if (errors.length > 0) {
      const message = errors.map(e => e.Message || e.Code || "unknown error").join("; ");
      if (KEY_ERROR.test(message)) {
        throw new ImporterError("Misconfigured", `Mouser rejected the configured API key: ${message}`);
      }
      throw new ImporterError("SupplierUnavailable", `Mouser reported: ${message}`);
    }

    const parts = parsed.data.SearchResults?.Parts ?? [];
    const selected = selectCandidate(parts, partNumber, p => [
      p.MouserPartNumber ?? undefined,
      p.ManufacturerPartNumber ?? undefined
    ]);
    if (!selected) {
      throw new ImporterError("NotFound", `Mouser has no part matching '${partNumber}'`);
    }

    console.log(`[mouser] ${partNumber}: ${parts.length} result(s)`);

    const { part, warnings } = normalizeMouserPart(selected, {
      currency: this.config.defaultCurrency,
      companyId: this.config.mouser.companyId
    });

    return {
      part,
      resultCount: parsed.data.SearchResults?.NumberOfResult ?? parts.length,
      warnings
    };
  }
}
