// services/runImportPipeline.ts
import type { CategoryChoice, ImportPreview, ImportRequest, ImportResult, SupplierId } from "../types.js";
import { DEFAULT_PART_FLAGS, commitPart } from "./destinationWriter.js";
import { ImporterError } from "./errors.js";
import { chooseCategory, mergeOverrides } from "./overrideMerger.js";
import { PipelineDeps, buildPreview, fetchAndMatch } from "./previewBuilder.js";

export type PreviewRun =
  | { state: "ready"; preview: ImportPreview }
  | { state: "error"; error: ImporterError };

export type ImportRun =
  | { state: "success"; result: ImportResult }
  | { state: "partial"; result: ImportResult; error: ImporterError }
  | { state: "error"; error: ImporterError; result?: ImportResult };

function logFailure(op: string, supplier: SupplierId, partNumber: string, err: ImporterError) {
  const line = `[importer] ${op} ${supplier}/${partNumber} -> ${err.kind}: ${err.message}`;
  if (err.kind === "NotFound" || err.kind === "InvalidRequest") {
    console.warn(line);
  } else {
    console.error(line);
  }
}

function describeCategory(category: CategoryChoice): string {
  return category.source === "id"
    ? `category #${category.categoryId}`
    : `${category.path.join(" / ")} (${category.source})`;
}

/**
 * PREVIEW: fetch and match only. Terminal states are `ready` and `error`.
 */
export async function runPreview(
  deps: PipelineDeps,
  supplier: SupplierId,
  partNumber: string
): Promise<PreviewRun> {
  try {
    const preview = await buildPreview(deps, supplier, partNumber);
    console.log(
      `[importer] preview ${supplier}/${preview.partNumber}: category ${
        preview.matchedCategory ? preview.matchedCategory.join(" / ") : "none"
      }, ${preview.warnings.length} warning(s)`
    );
    return { state: "ready", preview };
  } catch (err) {
    if (!(err instanceof ImporterError)) throw err;
    logFailure("preview", supplier, partNumber, err);
    return { state: "error", error: err };
  }
}

/**
 * IMPORT: re-fetch from the supplier, apply operator overrides, then commit.
 * Terminal states are `success`, `partial` and `error`.
 */
export async function runImport(deps: PipelineDeps, request: ImportRequest): Promise<ImportRun> {
  const { supplier, overrides } = request;

  try {
    const fetched = await fetchAndMatch(deps, supplier, request.partNumber, {
      tolerateDestination: false
    });
    const { part, warnings } = mergeOverrides(fetched.fetched.part, overrides);

    if (part.supplierCompanyId === undefined) {
      throw new ImporterError(
        "Misconfigured",
        `INVENTREE_${supplier.toUpperCase()}_COMPANY_ID is not configured`
      );
    }

    const category = chooseCategory(fetched.match.path, overrides);
    if (!category) {
      throw new ImporterError(
        "CategoryNotFound",
        "No destination category matched this part; choose a category path before importing"
      );
    }

    console.log(
      `[importer] importing ${supplier}/${fetched.partNumber} as '${part.name}' into ${describeCategory(
        category
      )}`
    );

    const report = await commitPart(deps.destination, fetched.tree, part, category, {
      autoCreateCategories: deps.config.destination.autoCreateCategories,
      flags: { ...DEFAULT_PART_FLAGS, ...request.flags }
    });
    report.result.warnings = warnings;

    if (report.result.outcome === "success") {
      return { state: "success", result: report.result };
    }
    if (!report.failure) {
      throw new ImporterError("DestinationUnavailable", "Import ended without a failure report");
    }
    logFailure("import", supplier, fetched.partNumber, report.failure);
    if (report.result.outcome === "partial") {
      return { state: "partial", result: report.result, error: report.failure };
    }
    return { state: "error", error: report.failure, result: report.result };
  } catch (err) {
    if (!(err instanceof ImporterError)) throw err;
    logFailure("import", supplier, request.partNumber, err);
    return { state: "error", error: err };
  }
}
