import { MouserAdapter, MouserPart, normalizeMouserPart } from "../services/mouserService.js";
import { jsonResponse, routedFetch, silenceConsole, testConfig } from "./fakes.js";

const RAW_PART: MouserPart = {
  Availability: "12,345 In Stock",
  Category: "Thick Film Resistors - SMD",
  DataSheetUrl: "",
  Description: "Thick Film Resistors - SMD 10K OHM 1%",
  ImagePath: "https://images.test/rc0603.jpg",
  LeadTime: "12 Weeks",
  Manufacturer: "YAGEO",
  ManufacturerPartNumber: "RC0603FR-0710KL",
  MouserPartNumber: "603-RC0603FR-0710KL",
  ProductDetailUrl: "https://www.mouser.test/ProductDetail/603-RC0603FR-0710KL",
  ProductAttributes: [
    { AttributeName: "Resistance", AttributeValue: "10 kOhms" },
    { AttributeName: "Packaging", AttributeValue: "Reel" },
    { AttributeName: "Packaging", AttributeValue: "Cut Tape" }
  ],
  PriceBreaks: [
    { Quantity: 1, Price: "0,09 €", Currency: "EUR" },
    { Quantity: 10, Price: "0,02 €", Currency: "EUR" },
    { Quantity: 100, Price: "0,006 €", Currency: "EUR" }
  ]
};

function searchResponse(parts: MouserPart[]) {
  return jsonResponse(200, {
    Errors: [],
    SearchResults: { NumberOfResult: parts.length, Parts: parts }
  });
}

describe("Mouser adapter", () => {
  beforeEach(() => {
    silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("normalizeMouserPart", () => {
    it("maps the search result onto the canonical part", () => {
      const { part, warnings } = normalizeMouserPart(RAW_PART, { currency: "EUR", companyId: 7 });

      expect(part).toEqual({
        name: "RC0603FR-0710KL",
        description: "Thick Film Resistors - SMD 10K OHM 1%",
        manufacturer: "YAGEO",
        mpn: "RC0603FR-0710KL",
        supplier: "mouser",
        supplierCompanyId: 7,
        supplierSku: "603-RC0603FR-0710KL",
        supplierLink: "https://www.mouser.test/ProductDetail/603-RC0603FR-0710KL",
        categoryHint: ["Thick Film Resistors - SMD"],
        datasheetUrl: undefined,
        imageUrl: "https://images.test/rc0603.jpg",
        stock: 12345,
        leadTimeWeeks: 12,
        parameters: [
          { name: "Resistance", value: "10 kOhms" },
          { name: "Packaging", value: "Reel, Cut Tape" }
        ],
        priceBreaks: [
          { quantity: 1, price: 0.09, currency: "EUR" },
          { quantity: 10, price: 0.02, currency: "EUR" },
          { quantity: 100, price: 0.006, currency: "EUR" }
        ]
      });
      expect(warnings).toEqual([]);
    });

    it("splits arrow-separated category paths", () => {
      const { part } = normalizeMouserPart(
        { ...RAW_PART, Category: "Passive Components -> Resistors ->  " },
        { currency: "EUR", companyId: null }
      );

      expect(part.categoryHint).toEqual(["Passive Components", "Resistors"]);
      expect(part.supplierCompanyId).toBeUndefined();
    });
  });

  describe("fetch", () => {
    it("posts an exact part-number search with the API key", async () => {
      const { fetchImpl, calls } = routedFetch(() => searchResponse([RAW_PART]));
      const adapter = new MouserAdapter(testConfig(), fetchImpl);

      const result = await adapter.fetch("RC0603FR-0710KL");

      expect(calls).toHaveLength(1);
      expect(calls[0].url).toBe("https://api.mouser.com/api/v1/search/partnumber?apiKey=test-key");
      expect(JSON.parse(String(calls[0].init?.body))).toEqual({
        SearchByPartNumberRequest: { mouserPartNumber: "RC0603FR-0710KL", partSearchOptions: "Exact" }
      });
      expect(result.part.mpn).toBe("RC0603FR-0710KL");
      expect(result.resultCount).toBe(1);
    });

    it("prefers the candidate whose MPN equals the query", async () => {
      const other = { ...RAW_PART, ManufacturerPartNumber: "RC0603FR-0710KP", MouserPartNumber: "603-OTHER" };
      const { fetchImpl } = routedFetch(() => searchResponse([other, RAW_PART]));
      const adapter = new MouserAdapter(testConfig(), fetchImpl);

      const result = await adapter.fetch("rc0603fr-0710kl");

      expect(result.part.supplierSku).toBe("603-RC0603FR-0710KL");
      expect(result.resultCount).toBe(2);
    });

    it("reports NotFound when the search is empty", async () => {
      const { fetchImpl } = routedFetch(() => searchResponse([]));
      const adapter = new MouserAdapter(testConfig(), fetchImpl);

      await expect(adapter.fetch("NOPE-123")).rejects.toMatchObject({ kind: "NotFound" });
    });

    it("reports Misconfigured without calling out when the key is missing", async () => {
      const { fetchImpl, calls } = routedFetch(() => searchResponse([RAW_PART]));
      const adapter = new MouserAdapter(testConfig({ MOUSER_API_KEY: "changeme" }), fetchImpl);

      await expect(adapter.fetch("RC0603FR-0710KL")).rejects.toMatchObject({ kind: "Misconfigured" });
      expect(calls).toHaveLength(0);
    });

    it("reports a rejected key as Misconfigured", async () => {
      const { fetchImpl } = routedFetch(() =>
        jsonResponse(200, { Errors: [{ Code: "Invalid", Message: "Invalid unique identifier." }] })
      );
      const adapter = new MouserAdapter(testConfig(), fetchImpl);

      await expect(adapter.fetch("RC0603FR-0710KL")).rejects.toMatchObject({ kind: "Misconfigured" });
    });

    it("reports 5xx answers and network errors as SupplierUnavailable", async () => {
      const down = new MouserAdapter(
        testConfig(),
        routedFetch(() => jsonResponse(503, { message: "maintenance" })).fetchImpl
      );
      await expect(down.fetch("RC0603FR-0710KL")).rejects.toMatchObject({ kind: "SupplierUnavailable" });

      const offline = new MouserAdapter(testConfig(), async () => {
        throw new Error("socket hang up");
      });
      await expect(offline.fetch("RC0603FR-0710KL")).rejects.toThrow(
        "Mouser request failed: socket hang up"
      );
    });
  });
});
