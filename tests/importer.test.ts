import { importHandler, previewHandler } from "../api/importer.js";
import { ImporterError } from "../services/errors.js";
import type { PipelineDeps } from "../services/previewBuilder.js";
import type { CanonicalPart } from "../types.js";
import { CATEGORY_TREE, FakeSupplier, InMemoryDestination, samplePart, silenceConsole, testConfig } from "./fakes.js";

function depsWith(result: CanonicalPart | ImporterError = samplePart()) {
  const destination = new InMemoryDestination(CATEGORY_TREE.map(c => ({ ...c })));
  const digikey = new FakeSupplier(
    "digikey",
    samplePart({ supplier: "digikey", supplierCompanyId: 8, supplierSku: "311-10.0KHRCT-ND" }),
    "Digi-Key"
  );
  const deps: PipelineDeps = {
    config: testConfig(),
    suppliers: { mouser: new FakeSupplier("mouser", result), digikey },
    destination
  };
  return { deps, destination, digikey };
}

beforeEach(() => {
  silenceConsole();
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe("previewHandler", () => {
  it("rejects a malformed body with 400", async () => {
    const { deps } = depsWith();

    const out = await previewHandler(deps, {});

    expect(out).toEqual({
      status: 400,
      body: {
        error: "Invalid request",
        kind: "InvalidRequest",
        details: ["supplier: Required", "part_number: Required"]
      }
    });
  });

  it("rejects an unknown supplier", async () => {
    const { deps } = depsWith();

    const out = await previewHandler(deps, { supplier: "farnell", part_number: "X" });

    expect(out.status).toBe(400);
    expect(out.body).toMatchObject({ details: ["supplier: supplier must be 'mouser' or 'digikey'"] });
  });

  it("accepts display spellings of the supplier", async () => {
    const { deps, digikey } = depsWith();

    const out = await previewHandler(deps, { supplier: "Digi-Key", part_number: "311-10.0KHRCT-ND" });

    expect(out.status).toBe(200);
    expect(digikey.calls).toEqual(["311-10.0KHRCT-ND"]);
    expect(out.body).toMatchObject({
      supplier: "digikey",
      supplier_name: "Digi-Key",
      part: { supplier_sku: "311-10.0KHRCT-ND", supplier_company_id: 8 }
    });
  });

  it("serializes the preview in snake_case", async () => {
    const { deps } = depsWith();

    const out = await previewHandler(deps, { supplier: "mouser", part_number: "RC0603FR-0710KL" });

    expect(out.status).toBe(200);
    expect(out.body).toMatchObject({
      part_number: "RC0603FR-0710KL",
      match_count: 3,
      supplier_result_count: 1,
      matched_category: ["Electronics", "Resistors", "Thick Film Resistors - SMD"],
      part: {
        mpn: "RC0603FR-0710KL",
        category_path: ["Electronics", "Resistors", "Thick Film Resistors - SMD"],
        datasheet_url: "https://datasheets.test/yageo.pdf",
        lead_time_weeks: 12,
        price_breaks: [
          { quantity: 1, price: 0.09, currency: "EUR" },
          { quantity: 10, price: 0.02, currency: "EUR" },
          { quantity: 100, price: 0.006, currency: "EUR" }
        ]
      }
    });
  });

  it("maps NotFound to 404", async () => {
    const { deps } = depsWith(new ImporterError("NotFound", "Mouser has no part 'XYZ'"));

    const out = await previewHandler(deps, { supplier: "mouser", part_number: "XYZ" });

    expect(out).toEqual({ status: 404, body: { error: "Mouser has no part 'XYZ'", kind: "NotFound" } });
  });

  it("hides supplier outage details from the operator", async () => {
    const { deps } = depsWith(
      new ImporterError("SupplierUnavailable", "Mouser request failed: connect ECONNREFUSED")
    );

    const out = await previewHandler(deps, { supplier: "mouser", part_number: "RC0603FR-0710KL" });

    expect(out).toEqual({
      status: 503,
      body: {
        error: "The supplier could not be reached. Please try again later.",
        kind: "SupplierUnavailable"
      }
    });
  });
});

describe("importHandler", () => {
  it("returns 201 with the created ids", async () => {
    const { deps } = depsWith();

    const out = await importHandler(deps, { supplier: "mouser", part_number: "RC0603FR-0710KL" });

    expect(out.status).toBe(201);
    expect(out.body).toMatchObject({
      outcome: "success",
      part_id: 100,
      supplier_part_id: 103,
      failures: [],
      warnings: [],
      error: null
    });
  });

  it("maps snake_case overrides and ignores null fields", async () => {
    const { deps, destination } = depsWith();

    const out = await importHandler(deps, {
      supplier: "mouser",
      part_number: "RC0603FR-0710KL",
      overrides: { description: null, category_path: ["Electronics", "Capacitors"] }
    });

    expect(out.status).toBe(201);
    expect(destination.parts[0]).toMatchObject({
      description: "Thick Film Resistors - SMD 10K OHM 1%",
      category: 4
    });
  });

  it("accepts a category id and part flags", async () => {
    const { deps, destination } = depsWith();

    const out = await importHandler(deps, {
      supplier: "mouser",
      part_number: "RC0603FR-0710KL",
      overrides: { category_id: 4 },
      purchaseable: false,
      trackable: true
    });

    expect(out.status).toBe(201);
    expect(out.body).toMatchObject({ category_path: ["Electronics", "Capacitors"] });
    expect(destination.parts[0]).toMatchObject({ category: 4, purchaseable: false, trackable: true });
  });

  it("ignores override fields that are never written", async () => {
    const { deps, destination } = depsWith();

    const out = await importHandler(deps, {
      supplier: "mouser",
      part_number: "RC0603FR-0710KL",
      overrides: { name: "Custom", stock: 5, image_url: "https://images.test/x.jpg", supplier_company_id: 99 }
    });

    expect(out.status).toBe(201);
    expect(destination.parts[0].name).toBe("RC0603FR-0710KL");
    expect(destination.supplierParts[0].supplier).toBe(7);
  });

  it("returns 207 on a partial write", async () => {
    const { deps, destination } = depsWith();
    destination.failingParameters.add("Tolerance");

    const out = await importHandler(deps, { supplier: "mouser", part_number: "RC0603FR-0710KL" });

    expect(out.status).toBe(207);
    expect(out.body).toMatchObject({
      outcome: "partial",
      part_id: 100,
      failures: [
        {
          kind: "parameter",
          label: "Tolerance",
          ok: false,
          id: null,
          error: "InvenTree rejected parameter 'Tolerance'"
        }
      ]
    });
  });

  it("returns 422 when the category path is unknown", async () => {
    const { deps } = depsWith();

    const out = await importHandler(deps, {
      supplier: "mouser",
      part_number: "RC0603FR-0710KL",
      overrides: { category_path: ["Nowhere"] }
    });

    expect(out).toEqual({
      status: 422,
      body: {
        error: "Category 'Nowhere' does not exist in the destination system",
        kind: "CategoryNotFound",
        result: null
      }
    });
  });

  it("includes the failed result when the part is rejected", async () => {
    const { deps, destination } = depsWith();
    destination.createPartError = new ImporterError("DestinationRejected", "InvenTree rejected part: name exists");

    const out = await importHandler(deps, { supplier: "mouser", part_number: "RC0603FR-0710KL" });

    expect(out.status).toBe(502);
    expect(out.body).toMatchObject({
      kind: "DestinationRejected",
      result: { outcome: "failed", part_id: null, sub_resources: [] }
    });
  });

  it("validates override values", async () => {
    const { deps } = depsWith();

    const out = await importHandler(deps, {
      supplier: "mouser",
      part_number: "RC0603FR-0710KL",
      overrides: { category_id: "four" }
    });

    expect(out.status).toBe(400);
  });
});
