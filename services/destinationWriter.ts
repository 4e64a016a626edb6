// services/destinationWriter.ts
import type {
  CanonicalPart,
  CategoryChoice,
  ImportResult,
  PartFlags,
  SubResourceOutcome
} from "../types.js";
import type { CategoryTree } from "./categoryMatcher.js";
import { ImporterError, errorMessage } from "./errors.js";
import type { Company, DestinationClient, ParameterTemplate } from "./inventreeService.js";

export interface CommitReport {
  result: ImportResult;
  /** Set when the outcome is `failed` or `partial`. */
  failure?: ImporterError;
}

export interface CommitOptions {
  autoCreateCategories: boolean;
  flags: PartFlags;
}

export const DEFAULT_PART_FLAGS: PartFlags = { purchaseable: true, trackable: false };

/**
 * Resolves a root-anchored category path to an id, creating missing
 * segments only when auto-creation is enabled.
 */
export async function resolveCategoryPath(
  destination: DestinationClient,
  tree: CategoryTree,
  path: string[],
  options: Pick<CommitOptions, "autoCreateCategories">
): Promise<number> {
  if (path.length === 0) {
    throw new ImporterError("CategoryNotFound", "A destination category is required to import a part");
  }

  let parent: number | null = null;
  for (let i = 0; i < path.length; i++) {
    const existing = tree.child(parent, path[i]);
    if (existing) {
      parent = existing.pk;
      continue;
    }
    if (!options.autoCreateCategories) {
      throw new ImporterError(
        "CategoryNotFound",
        `Category '${path.slice(0, i + 1).join(" / ")}' does not exist in the destination system`
      );
    }
    const created = await destination.createCategory(path[i], parent);
    console.log(`[inventree] created category '${path.slice(0, i + 1).join(" / ")}' (${created.pk})`);
    parent = created.pk;
  }

  if (parent === null) {
    throw new ImporterError("CategoryNotFound", `Category '${path.join(" / ")}' could not be resolved`);
  }
  return parent;
}

async function resolveCategory(
  destination: DestinationClient,
  tree: CategoryTree,
  choice: CategoryChoice,
  options: CommitOptions
): Promise<{ id: number; path: string[] }> {
  if (choice.source !== "id") {
    const id = await resolveCategoryPath(destination, tree, choice.path, options);
    return { id, path: choice.path };
  }
  const path = tree.pathOf(choice.categoryId);
  if (path.length === 0) {
    throw new ImporterError(
      "CategoryNotFound",
      `Category ${choice.categoryId} does not exist in the destination system`
    );
  }
  return { id: choice.categoryId, path };
}

function failed(kind: SubResourceOutcome["kind"], label: string, err: unknown): SubResourceOutcome {
  const error = errorMessage(err);
  console.error(`[inventree] ${kind} '${label}' failed:`, error);
  return { kind, label, ok: false, error };
}

async function manufacturerNamed(destination: DestinationClient, name: string): Promise<Company> {
  const wanted = name.toLowerCase();
  const existing = (await destination.findManufacturers(name)).find(
    company => company.name.trim().toLowerCase() === wanted
  );
  if (existing) return existing;
  const created = await destination.createManufacturer(name);
  console.log(`[inventree] created manufacturer '${name}' (${created.pk})`);
  return created;
}

/** Skipped when the part has no manufacturer or no MPN. */
async function createManufacturerPart(
  destination: DestinationClient,
  partId: number,
  part: CanonicalPart
): Promise<SubResourceOutcome | null> {
  const manufacturer = part.manufacturer.trim();
  const mpn = part.mpn.trim();
  if (!manufacturer || !mpn) return null;

  const label = `${manufacturer} ${mpn}`;
  try {
    const company = await manufacturerNamed(destination, manufacturer);
    const created = await destination.createManufacturerPart({
      part: partId,
      manufacturer: company.pk,
      mpn
    });
    return { kind: "manufacturer_part", label, ok: true, id: created.pk };
  } catch (err) {
    return failed("manufacturer_part", label, err);
  }
}

async function createSupplierLink(
  destination: DestinationClient,
  partId: number,
  part: CanonicalPart,
  manufacturerPart: number | undefined
): Promise<SubResourceOutcome> {
  const label = part.supplierSku || part.mpn;
  if (part.supplierCompanyId === undefined) {
    return failed("supplier_part", label, "No destination company configured for this supplier");
  }
  if (!part.supplierSku) {
    return failed("supplier_part", label, "Supplier SKU is empty");
  }
  try {
    const created = await destination.createSupplierPart({
      part: partId,
      supplier: part.supplierCompanyId,
      sku: part.supplierSku,
      mpn: part.mpn || undefined,
      manufacturerPart,
      link: part.supplierLink,
      description: part.description
    });
    return { kind: "supplier_part", label, ok: true, id: created.pk };
  } catch (err) {
    return failed("supplier_part", label, err);
  }
}

async function createParameters(
  destination: DestinationClient,
  partId: number,
  part: CanonicalPart
): Promise<SubResourceOutcome[]> {
  if (part.parameters.length === 0) return [];

  let templates: Map<string, ParameterTemplate>;
  try {
    const listed = await destination.listParameterTemplates();
    templates = new Map(listed.map(t => [t.name.toLowerCase(), t]));
  } catch (err) {
    return part.parameters.map(p => failed("parameter", p.name, err));
  }

  const outcomes: SubResourceOutcome[] = [];
  for (const parameter of part.parameters) {
    try {
      let template = templates.get(parameter.name.toLowerCase());
      if (!template) {
        template = await destination.createParameterTemplate(parameter.name);
        templates.set(parameter.name.toLowerCase(), template);
      }
      const created = await destination.createParameter(partId, template.pk, parameter.value);
      outcomes.push({ kind: "parameter", label: parameter.name, ok: true, id: created.pk });
    } catch (err) {
      outcomes.push(failed("parameter", parameter.name, err));
    }
  }
  return outcomes;
}

async function createPriceBreaks(
  destination: DestinationClient,
  partId: number,
  part: CanonicalPart
): Promise<SubResourceOutcome[]> {
  const outcomes: SubResourceOutcome[] = [];
  for (const pb of part.priceBreaks) {
    const label = `${pb.quantity} @ ${pb.price} ${pb.currency}`;
    try {
      const created = await destination.createPriceBreak(partId, pb.quantity, pb.price, pb.currency);
      outcomes.push({ kind: "price_break", label, ok: true, id: created.pk });
    } catch (err) {
      outcomes.push(failed("price_break", label, err));
    }
  }
  return outcomes;
}

/**
 * Creates the part and its sub-resources in order. A failed part creation
 * aborts with nothing written; later failures are collected, never rolled
 * back, and reported as a partial outcome.
 */
export async function commitPart(
  destination: DestinationClient,
  tree: CategoryTree,
  part: CanonicalPart,
  category: CategoryChoice,
  options: CommitOptions
): Promise<CommitReport> {
  const { id: categoryId, path: categoryPath } = await resolveCategory(
    destination,
    tree,
    category,
    options
  );

  let partId: number;
  try {
    const created = await destination.createPart({
      name: part.name,
      description: part.description,
      category: categoryId,
      link: part.datasheetUrl,
      purchaseable: options.flags.purchaseable,
      trackable: options.flags.trackable
    });
    partId = created.pk;
  } catch (err) {
    const failure =
      err instanceof ImporterError
        ? err
        : new ImporterError("DestinationUnavailable", errorMessage(err), { cause: err });
    console.error(`[inventree] part '${part.name}' was not created:`, failure.message);
    return {
      result: {
        outcome: "failed",
        partId: null,
        supplierPartId: null,
        categoryPath,
        subResources: [],
        failures: [],
        warnings: [],
        error: failure.message
      },
      failure
    };
  }
  console.log(`[inventree] created part '${part.name}' (${partId})`);

  const manufacturerPart = await createManufacturerPart(destination, partId, part);
  const supplierLink = await createSupplierLink(
    destination,
    partId,
    part,
    manufacturerPart?.ok ? manufacturerPart.id : undefined
  );
  const parameters = await createParameters(destination, partId, part);
  const priceBreaks = await createPriceBreaks(destination, partId, part);

  const subResources = [
    ...(manufacturerPart ? [manufacturerPart] : []),
    supplierLink,
    ...parameters,
    ...priceBreaks
  ];
  const failures = subResources.filter(s => !s.ok);

  const result: ImportResult = {
    outcome: failures.length > 0 ? "partial" : "success",
    partId,
    supplierPartId: supplierLink.ok && supplierLink.id !== undefined ? supplierLink.id : null,
    categoryPath,
    subResources,
    failures,
    warnings: []
  };

  if (failures.length === 0) return { result };

  const failure = new ImporterError(
    "PartialWriteFailure",
    `Part ${partId} was created, but ${failures.length} sub-resource(s) failed: ` +
      failures.map(f => `${f.kind} '${f.label}'`).join(", ")
  );
  result.error = failure.message;
  return { result, failure };
}
