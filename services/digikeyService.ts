// services/digikeyService.ts
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
import { TokenCache, TokenIssuer } from "./tokenCache.js";

/* -----------------------------
   Raw payloads
----------------------------- */

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().optional()
});

interface DigiKeyCategory {
  Name?: string | null;
  ChildCategories?: DigiKeyCategory[] | null;
}

const DigiKeyCategorySchema: z.ZodType<DigiKeyCategory> = z.lazy(() =>
  z.object({
    Name: z.string().nullish(),
    ChildCategories: z.array(DigiKeyCategorySchema).nullish()
  })
);

const DigiKeyVariationSchema = z.object({
  DigiKeyProductNumber: z.string().nullish(),
  StandardPricing: z
    .array(
      z.object({
        BreakQuantity: z.number().nullish(),
        UnitPrice: z.number().nullish()
      })
    )
    .nullish()
});

const DigiKeyProductSchema = z.object({
  Description: z
    .object({
      ProductDescription: z.string().nullish(),
      DetailedDescription: z.string().nullish()
    })
    .nullish(),
  Manufacturer: z.object({ Name: z.string().nullish() }).nullish(),
  ManufacturerProductNumber: z.string().nullish(),
  ProductUrl: z.string().nullish(),
  DatasheetUrl: z.string().nullish(),
  PhotoUrl: z.string().nullish(),
  QuantityAvailable: z.number().nullish(),
  ManufacturerLeadWeeks: z.union([z.string(), z.number()]).nullish(),
  Parameters: z
    .array(
      z.object({
        ParameterText: z.string().nullish(),
        ValueText: z.string().nullish()
      })
    )
    .nullish(),
  Category: DigiKeyCategorySchema.nullish(),
  ProductVariations: z.array(DigiKeyVariationSchema).nullish()
});

const ProductDetailsResponseSchema = z.object({
  Product: DigiKeyProductSchema,
  SearchLocaleUsed: z.object({ Currency: z.string().nullish() }).nullish()
});

export type DigiKeyProductDetails = z.infer<typeof ProductDetailsResponseSchema>;

/* -----------------------------
   Normalization
----------------------------- */

function categoryChain(category: DigiKeyCategory | null | undefined): string[] {
  const chain: string[] = [];
  let node = category;
  while (node) {
    if (node.Name) chain.push(node.Name);
    node = node.ChildCategories?.[0];
  }
  return chain;
}

function absoluteUrl(value: string | null | undefined): string | undefined {
  const url = optionalText(value);
  if (url?.startsWith("//")) return `https:${url}`;
  return url;
}

export function normalizeDigiKeyProduct(
  raw: DigiKeyProductDetails,
  partNumber: string,
  ctx: { currency: string; requestedCurrency: string; companyId: number | null }
): { part: CanonicalPart; warnings: string[] } {
  const warnings: string[] = [];
  const product = raw.Product;
  const mpn = text(product.ManufacturerProductNumber);

  const variations = product.ProductVariations ?? [];
  const variation = selectCandidate(variations, partNumber, v => [
    v.DigiKeyProductNumber ?? undefined
  ]);
  const supplierSku = text(variation?.DigiKeyProductNumber);
  const reportedCurrency = raw.SearchLocaleUsed?.Currency || ctx.requestedCurrency;

  const { priceBreaks, dropped } = normalizePriceBreaks(
    (variation?.StandardPricing ?? []).map(pb => ({
      quantity: pb.BreakQuantity,
      price: pb.UnitPrice,
      currency: reportedCurrency
    })),
    ctx.currency
  );
  if (dropped > 0) {
    warnings.push(`Ignored ${dropped} Digi-Key price break(s) that were invalid or duplicated`);
  }

  const part: CanonicalPart = {
    name: derivePartName(mpn, supplierSku),
    description:
      text(product.Description?.ProductDescription) ||
      text(product.Description?.DetailedDescription),
    manufacturer: text(product.Manufacturer?.Name),
    mpn,
    supplier: "digikey",
    supplierCompanyId: ctx.companyId ?? undefined,
    supplierSku,
    supplierLink: absoluteUrl(product.ProductUrl),
    categoryHint: cleanCategoryHint(categoryChain(product.Category)),
    datasheetUrl: absoluteUrl(product.DatasheetUrl),
    imageUrl: absoluteUrl(product.PhotoUrl),
    stock: parseStock(product.QuantityAvailable),
    leadTimeWeeks: parseLeadTimeWeeks(product.ManufacturerLeadWeeks),
    parameters: cleanParameters(
      (product.Parameters ?? []).map(p => ({ name: p.ParameterText, value: p.ValueText }))
    ),
    priceBreaks
  };

  return { part, warnings };
}

/* -----------------------------
   OAuth2 client credentials
----------------------------- */

function credentials(config: ImporterConfig): { clientId: string; clientSecret: string } {
  const { clientId, clientSecret } = config.digikey;
  if (!clientId || !clientSecret) {
    throw new ImporterError(
      "Misconfigured",
      "DIGIKEY_CLIENT_ID and DIGIKEY_CLIENT_SECRET must be configured"
    );
  }
  return { clientId, clientSecret };
}

export function createDigiKeyTokenIssuer(
  config: ImporterConfig,
  fetchImpl: FetchLike = defaultFetch
): TokenIssuer {
  return async () => {
    const { clientId, clientSecret } = credentials(config);
    const body = new URLSearchParams({
      client_id: clientId,
      client_secret: clientSecret,
      grant_type: "client_credentials"
    });

    const res = await sendRequest(
      fetchImpl,
      config.digikey.tokenUrl,
      {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: body.toString()
      },
      { service: "Digi-Key token", timeoutMs: config.requestTimeoutMs, unavailable: "SupplierUnavailable" }
    );

    if (res.status === 400 || res.status === 401 || res.status === 403) {
      throw new ImporterError("Misconfigured", "Digi-Key rejected the configured client credentials");
    }
    if (res.status >= 400) {
      throw new ImporterError(
        "SupplierUnavailable",
        `Digi-Key token endpoint responded with ${res.status}: ${preview(res.text)}`
      );
    }

    const parsed = TokenResponseSchema.safeParse(res.body);
    if (!parsed.success) {
      throw new ImporterError("SupplierUnavailable", "Unexpected Digi-Key token response", {
        cause: parsed.error
      });
    }

    console.log("[digikey] access token refreshed");
    return {
      accessToken: parsed.data.access_token,
      expiresIn: parsed.data.expires_in ?? 1800
    };
  };
}

/* -----------------------------
   Adapter
----------------------------- */

export class DigiKeyAdapter implements SupplierAdapter {
  readonly id = "digikey" as const;
  readonly displayName = "Digi-Key";
  private readonly tokens: TokenCache;

  constructor(
    private readonly config: ImporterConfig,
    tokens?: TokenCache,
    private readonly fetchImpl: FetchLike = defaultFetch
  ) {
    this.tokens = tokens ?? new TokenCache(createDigiKeyTokenIssuer(config, fetchImpl));
  }

  async fetch(partNumber: string): Promise<SupplierFetchResult> {
    const { clientId } = credentials(this.config);

    let token = await this.tokens.get();
    let res = await this.requestDetails(partNumber, clientId, token);

    if (res.status === 401) {
      console.warn("[digikey] token rejected, refreshing once");
      this.tokens.invalidate(token);
      token = await this.tokens.get();
      res = await this.requestDetails(partNumber, clientId, token);
      if (res.status === 401) {
        throw new ImporterError(
          "Misconfigured",
          "Digi-Key rejected a freshly issued token; check the application's API subscriptions"
        );
      }
    }

    if (res.status === 404) {
      throw new ImporterError("NotFound", `Digi-Key has no part matching '${partNumber}'`);
    }
    if (res.status >= 400) {
      throw new ImporterError(
        "SupplierUnavailable",
        `Digi-Key responded with ${res.status}: ${preview(res.text)}`
      );
    }

    const parsed = ProductDetailsResponseSchema.safeParse(res.body);
    if (!parsed.success) {
      throw new ImporterError("SupplierUnavailable", "Unexpected Digi-Key response shape", {
        cause: parsed.error
      });
    }

    const { part, warnings } = normalizeDigiKeyProduct(parsed.data, partNumber, {
      currency: this.config.defaultCurrency,
      requestedCurrency: this.config.digikey.currency,
      companyId: this.config.digikey.companyId
    });

    return { part, resultCount: 1, warnings };
  }

  private requestDetails(partNumber: string, clientId: string, token: string) {
    const url = `${this.config.digikey.productDetailsUrl}/${encodeURIComponent(partNumber)}/productdetails`;
    return sendRequest(
      this.fetchImpl,
      url,
      {
        method: "GET",
        headers: {
          Authorization: `Bearer ${token}`,
          "X-DIGIKEY-Client-Id": clientId,
          "X-DIGIKEY-Locale-Currency": this.config.digikey.currency,
          "X-DIGIKEY-Locale-Language": this.config.digikey.language,
          "X-DIGIKEY-Locale-Site": this.config.digikey.location,
          Accept: "application/json"
        }
      },
      { service: "Digi-Key", timeoutMs: this.config.requestTimeoutMs, unavailable: "SupplierUnavailable" }
    );
  }
}
