import { z } from "zod";
import {
  ImportPreview,
  ImportResult,
  PartOverrides,
  SubResourceOutcome,
  SupplierId,
  isSupplierId
} from "../types.js";

// Wire format of the scanner UI: snake_case, empty values omitted or null.

const supplierField = z
  .string()
  .transform(value => value.toLowerCase().replace(/[^a-z]/g, ""))
  .refine((value): value is SupplierId => isSupplierId(value), {
    message: "supplier must be 'mouser' or 'digikey'"
  });

const optionalString = z
  .string()
  .nullish()
  .transform(value => value ?? undefined);

const optionalStringList = z
  .array(z.string())
  .nullish()
  .transform(value => value ?? undefined);

export const PreviewRequestSchema = z.object({
  supplier: supplierField,
  part_number: z.string()
});

// Only fields that reach the destination are accepted; anything else
// (name, stock, image_url, supplier identity, ...) is stripped.
const OverridesSchema = z
  .object({
    description: optionalString,
    manufacturer: optionalString,
    mpn: optionalString,
    supplier_sku: optionalString,
    supplier_link: optionalString,
    datasheet_url: optionalString,
    category_path: optionalStringList,
    category_id: z.number().int().positive().nullish(),
    parameters: z
      .array(z.object({ name: z.string(), value: z.union([z.string(), z.number()]) }))
      .nullish(),
    price_breaks: z
      .array(
        z.object({
          quantity: z.number().int().positive(),
          price: z.number().nonnegative(),
          currency: z.string().min(1)
        })
      )
      .nullish()
  })
  .transform(
    (o): PartOverrides => ({
      description: o.description,
      manufacturer: o.manufacturer,
      mpn: o.mpn,
      supplierSku: o.supplier_sku,
      supplierLink: o.supplier_link,
      datasheetUrl: o.datasheet_url,
      categoryPath: o.category_path,
      categoryId: o.category_id ?? undefined,
      parameters: o.parameters?.map(p => ({ name: p.name, value: String(p.value) })),
      priceBreaks: o.price_breaks ?? undefined
    })
  );

export const ImportRequestSchema = z.object({
  supplier: supplierField,
  part_number: z.string(),
  overrides: OverridesSchema.optional().transform((value): PartOverrides => value ?? {}),
  purchaseable: z.boolean().default(true),
  trackable: z.boolean().default(false)
});

export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}

/* -----------------------------
   Responses
----------------------------- */

export function previewToWire(preview: ImportPreview) {
  const { part } = preview;
  return {
    supplier: preview.supplier,
    supplier_name: preview.supplierName,
    part_number: preview.partNumber,
    match_count: preview.matchCount,
    supplier_result_count: preview.supplierResultCount,
    matched_category: preview.matchedCategory,
    warnings: preview.warnings,
    part: {
      name: part.name,
      description: part.description,
      manufacturer: part.manufacturer,
      mpn: part.mpn,
      supplier: part.supplier,
      supplier_company_id: part.supplierCompanyId ?? null,
      supplier_sku: part.supplierSku,
      supplier_link: part.supplierLink ?? null,
      category_hint: part.categoryHint,
      category_path: preview.matchedCategory ?? [],
      datasheet_url: part.datasheetUrl ?? null,
      image_url: part.imageUrl ?? null,
      stock: part.stock ?? null,
      lead_time_weeks: part.leadTimeWeeks ?? null,
      parameters: part.parameters,
      price_breaks: part.priceBreaks
    }
  };
}

function subResourceToWire(s: SubResourceOutcome) {
  return {
    kind: s.kind,
    label: s.label,
    ok: s.ok,
    id: s.id ?? null,
    error: s.error ?? null
  };
}

export function resultToWire(result: ImportResult) {
  return {
    outcome: result.outcome,
    part_id: result.partId,
    supplier_part_id: result.supplierPartId,
    category_path: result.categoryPath,
    sub_resources: result.subResources.map(subResourceToWire),
    failures: result.failures.map(subResourceToWire),
    warnings: result.warnings,
    error: result.error ?? null
  };
}
