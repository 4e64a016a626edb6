export const SUPPLIERS = ["mouser", "digikey"] as const;

export type SupplierId = (typeof SUPPLIERS)[number];

export function isSupplierId(value: string): value is SupplierId {
  return (SUPPLIERS as readonly string[]).includes(value);
}

export interface PartParameter {
  name: string;
  value: string;
}

export interface PriceBreak {
  quantity: number;
  price: number;
  currency: string;
}

/**
 * Supplier-agnostic view of a purchasable component.
 * Built fresh on every fetch; optional catalog fields are left undefined
 * rather than filled with "" or 0.
 */
export interface CanonicalPart {
  /** Always derived from `mpn` (see `derivePartName`). */
  name: string;
  description: string;
  manufacturer: string;
  mpn: string;
  supplier: SupplierId;
  supplierCompanyId?: number;
  supplierSku: string;
  supplierLink?: string;
  /** Category path as reported by the supplier, most general first. */
  categoryHint: string[];
  datasheetUrl?: string;
  imageUrl?: string;
  stock?: number;
  leadTimeWeeks?: number;
  parameters: PartParameter[];
  /** Quantities strictly increasing, one currency. */
  priceBreaks: PriceBreak[];
}

/** Resolved path in the destination category tree, or null when nothing matched. */
export type CategoryMatch = string[] | null;

export interface ImportPreview {
  supplier: SupplierId;
  supplierName: string;
  partNumber: string;
  matchCount: number;
  supplierResultCount: number;
  part: CanonicalPart;
  matchedCategory: CategoryMatch;
  warnings: string[];
}

export type PartOverrides = Partial<CanonicalPart> & {
  categoryPath?: string[];
  /** Destination category id; takes precedence over `categoryPath`. */
  categoryId?: number;
};

/** Where the part goes: an existing category id, or a root-anchored path. */
export type CategoryChoice =
  | { source: "id"; categoryId: number }
  | { source: "override" | "match"; path: string[] };

export interface PartFlags {
  purchaseable: boolean;
  trackable: boolean;
}

export interface ImportRequest {
  supplier: SupplierId;
  partNumber: string;
  overrides: PartOverrides;
  /** Defaults to purchaseable, not trackable. */
  flags?: Partial<PartFlags>;
}

export type ImportOutcome = "success" | "partial" | "failed";

export type SubResourceKind = "manufacturer_part" | "supplier_part" | "parameter" | "price_break";

export interface SubResourceOutcome {
  kind: SubResourceKind;
  label: string;
  ok: boolean;
  id?: number;
  error?: string;
}

export interface ImportResult {
  outcome: ImportOutcome;
  partId: number | null;
  supplierPartId: number | null;
  categoryPath: string[];
  subResources: SubResourceOutcome[];
  failures: SubResourceOutcome[];
  /** Notes on operator input that was adjusted before writing. */
  warnings: string[];
  error?: string;
}
