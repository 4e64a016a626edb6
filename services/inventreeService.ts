// services/inventreeService.ts
import { z } from "zod";
import type { DestinationConfig } from "./config.js";
import { ImporterError } from "./errors.js";
import { FetchLike, defaultFetch, preview, sendRequest } from "./http.js";

/* -----------------------------
   Types
----------------------------- */

export interface DestinationCategory {
  pk: number;
  name: string;
  parent: number | null;
}

export interface ParameterTemplate {
  pk: number;
  name: string;
}

export interface Company {
  pk: number;
  name: string;
}

export interface NewPart {
  name: string;
  description: string;
  category: number;
  link?: string;
  purchaseable: boolean;
  trackable: boolean;
}

export interface NewManufacturerPart {
  part: number;
  manufacturer: number;
  mpn: string;
}

export interface NewSupplierPart {
  part: number;
  supplier: number;
  sku: string;
  mpn?: string;
  manufacturerPart?: number;
  link?: string;
  description?: string;
}

/**
 * The REST operations the importer needs from the parts-management service.
 * Tests substitute an in-memory implementation.
 */
export interface DestinationClient {
  listCategories(): Promise<DestinationCategory[]>;
  createCategory(name: string, parent: number | null): Promise<DestinationCategory>;
  createPart(part: NewPart): Promise<{ pk: number }>;
  /** Manufacturer companies whose name contains `name`. */
  findManufacturers(name: string): Promise<Company[]>;
  createManufacturer(name: string): Promise<Company>;
  createManufacturerPart(link: NewManufacturerPart): Promise<{ pk: number }>;
  createSupplierPart(link: NewSupplierPart): Promise<{ pk: number }>;
  listParameterTemplates(): Promise<ParameterTemplate[]>;
  createParameterTemplate(name: string): Promise<ParameterTemplate>;
  createParameter(part: number, template: number, value: string): Promise<{ pk: number }>;
  createPriceBreak(
    part: number,
    quantity: number,
    price: number,
    currency: string
  ): Promise<{ pk: number }>;
}

/* -----------------------------
   InvenTree REST client
----------------------------- */

const CreatedSchema = z.object({ pk: z.number() });

const CategorySchema = z.object({
  pk: z.number(),
  name: z.string(),
  parent: z.number().nullable()
});

const TemplateSchema = z.object({ pk: z.number(), name: z.string() });

const CompanySchema = z.object({ pk: z.number(), name: z.string() });

function listOf<T extends z.ZodTypeAny>(item: T) {
  return z.union([z.array(item), z.object({ results: z.array(item) }).transform(page => page.results)]);
}

export class InvenTreeClient implements DestinationClient {
  constructor(
    private readonly config: DestinationConfig,
    private readonly timeoutMs: number,
    private readonly fetchImpl: FetchLike = defaultFetch
  ) {}

  listCategories(): Promise<DestinationCategory[]> {
    return this.get("/api/part/category/", listOf(CategorySchema));
  }

  createCategory(name: string, parent: number | null): Promise<DestinationCategory> {
    return this.post("/api/part/category/", { name, parent }, CategorySchema);
  }

  createPart(part: NewPart): Promise<{ pk: number }> {
    return this.post(
      "/api/part/",
      {
        name: part.name,
        description: part.description,
        category: part.category,
        link: part.link ?? "",
        purchaseable: part.purchaseable,
        trackable: part.trackable,
        active: true
      },
      CreatedSchema
    );
  }

  findManufacturers(name: string): Promise<Company[]> {
    return this.get(
      `/api/company/?is_manufacturer=true&search=${encodeURIComponent(name)}`,
      listOf(CompanySchema)
    );
  }

  createManufacturer(name: string): Promise<Company> {
    return this.post(
      "/api/company/",
      { name, is_manufacturer: true, is_supplier: false, is_customer: false },
      CompanySchema
    );
  }

  createManufacturerPart(link: NewManufacturerPart): Promise<{ pk: number }> {
    return this.post(
      "/api/company/part/manufacturer/",
      { part: link.part, manufacturer: link.manufacturer, MPN: link.mpn },
      CreatedSchema
    );
  }

  createSupplierPart(link: NewSupplierPart): Promise<{ pk: number }> {
    return this.post(
      "/api/company/part/",
      {
        part: link.part,
        supplier: link.supplier,
        SKU: link.sku,
        MPN: link.mpn ?? "",
        ...(link.manufacturerPart !== undefined ? { manufacturer_part: link.manufacturerPart } : {}),
        link: link.link ?? "",
        description: link.description ?? ""
      },
      CreatedSchema
    );
  }

  listParameterTemplates(): Promise<ParameterTemplate[]> {
    return this.get("/api/part/parameter/template/", listOf(TemplateSchema));
  }

  createParameterTemplate(name: string): Promise<ParameterTemplate> {
    return this.post("/api/part/parameter/template/", { name }, TemplateSchema);
  }

  createParameter(part: number, template: number, value: string): Promise<{ pk: number }> {
    return this.post("/api/part/parameter/", { part, template, data: value }, CreatedSchema);
  }

  createPriceBreak(
    part: number,
    quantity: number,
    price: number,
    currency: string
  ): Promise<{ pk: number }> {
    return this.post(
      "/api/part/internal-price/",
      { part, quantity, price, price_currency: currency },
      CreatedSchema
    );
  }

  /* -----------------------------
     Transport
  ----------------------------- */

  private credentials(): { baseUrl: string; token: string } {
    const { baseUrl, token } = this.config;
    if (!baseUrl || !token) {
      throw new ImporterError("Misconfigured", "INVENTREE_BASE_URL and INVENTREE_TOKEN are required");
    }
    return { baseUrl, token };
  }

  private get<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.output<S>> {
    return this.call("GET", path, undefined, schema);
  }

  private post<S extends z.ZodTypeAny>(
    path: string,
    payload: Record<string, unknown>,
    schema: S
  ): Promise<z.output<S>> {
    return this.call("POST", path, payload, schema);
  }

  private async call<S extends z.ZodTypeAny>(
    method: "GET" | "POST",
    path: string,
    payload: Record<string, unknown> | undefined,
    schema: S
  ): Promise<z.output<S>> {
    const { baseUrl, token } = this.credentials();
    const res = await sendRequest(
      this.fetchImpl,
      `${baseUrl}${path}`,
      {
        method,
        headers: {
          Authorization: `Token ${token}`,
          "Content-Type": "application/json",
          Accept: "application/json"
        },
        body: payload ? JSON.stringify(payload) : undefined
      },
      { service: "InvenTree", timeoutMs: this.timeoutMs, unavailable: "DestinationUnavailable" }
    );

    if (res.status === 401 || res.status === 403) {
      throw new ImporterError("Misconfigured", "InvenTree rejected the configured token");
    }
    if (res.status >= 400) {
      throw new ImporterError(
        "DestinationRejected",
        `InvenTree ${method} ${path} failed with ${res.status}: ${preview(res.text)}`
      );
    }

    const parsed = schema.safeParse(res.body);
    if (!parsed.success) {
      throw new ImporterError("DestinationUnavailable", `Unexpected InvenTree response for ${path}`, {
        cause: parsed.error
      });
    }
    return parsed.data;
  }
}
