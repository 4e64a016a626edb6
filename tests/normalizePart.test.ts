import {
  cleanParameters,
  derivePartName,
  normalizePriceBreaks,
  parseLeadTimeWeeks,
  parsePrice,
  parseQuantity,
  parseStock
} from "../services/normalizePart.js";

describe("normalizePart", () => {
  describe("parsePrice", () => {
    it("reads a lone comma as the decimal separator", () => {
      expect(parsePrice("0,094 €")).toBe(0.094);
    });

    it("uses the last separator as decimal when both appear", () => {
      expect(parsePrice("$1,234.50")).toBe(1234.5);
      expect(parsePrice("1.234,56 €")).toBe(1234.56);
    });

    it("treats repeated commas as thousands separators", () => {
      expect(parsePrice("1,234,567")).toBe(1234567);
    });

    it("reads a lone comma before three digits as grouping after a non-zero integer", () => {
      expect(parsePrice("$1,234")).toBe(1234);
      expect(parsePrice("0,006 €")).toBe(0.006);
      expect(parsePrice("12,50 €")).toBe(12.5);
    });

    it("passes numbers through and rejects garbage", () => {
      expect(parsePrice(0.12)).toBe(0.12);
      expect(parsePrice(-1)).toBeUndefined();
      expect(parsePrice("free")).toBeUndefined();
      expect(parsePrice(null)).toBeUndefined();
    });
  });

  describe("parseQuantity", () => {
    it("strips grouping separators from string quantities", () => {
      expect(parseQuantity("1,000")).toBe(1000);
      expect(parseQuantity("2.500")).toBe(2500);
      expect(parseQuantity(" 25 ")).toBe(25);
    });

    it("rejects fractions, zero and text", () => {
      expect(parseQuantity("1.5")).toBeUndefined();
      expect(parseQuantity(0)).toBeUndefined();
      expect(parseQuantity("10 pcs")).toBeUndefined();
    });
  });

  describe("parseStock", () => {
    it("parses availability strings with thousands separators", () => {
      expect(parseStock("12,345 In Stock")).toBe(12345);
    });

    it("keeps zero and drops text without digits", () => {
      expect(parseStock(0)).toBe(0);
      expect(parseStock("None")).toBeUndefined();
      expect(parseStock(undefined)).toBeUndefined();
    });
  });

  describe("parseLeadTimeWeeks", () => {
    it("handles weeks, days and bare numbers", () => {
      expect(parseLeadTimeWeeks("12 Weeks")).toBe(12);
      expect(parseLeadTimeWeeks("21 Days")).toBe(3);
      expect(parseLeadTimeWeeks("16")).toBe(16);
      expect(parseLeadTimeWeeks(8)).toBe(8);
      expect(parseLeadTimeWeeks("n/a")).toBeUndefined();
    });
  });

  describe("normalizePriceBreaks", () => {
    it("keeps grouped string quantities whole", () => {
      const { priceBreaks } = normalizePriceBreaks(
        [
          { quantity: "1", price: "$0.10", currency: "USD" },
          { quantity: "1,000", price: "$0.05", currency: "USD" }
        ],
        "USD"
      );

      expect(priceBreaks).toEqual([
        { quantity: 1, price: 0.1, currency: "USD" },
        { quantity: 1000, price: 0.05, currency: "USD" }
      ]);
    });

    it("keeps one currency, drops duplicates and sorts by quantity", () => {
      const { priceBreaks, dropped } = normalizePriceBreaks(
        [
          { quantity: 100, price: "0,01 €", currency: "EUR" },
          { quantity: 1, price: "0,09 €", currency: "EUR" },
          { quantity: 10, price: "0,02 €", currency: "EUR" },
          { quantity: 10, price: "0,03 €", currency: "EUR" },
          { quantity: 1, price: "$0.10", currency: "USD" },
          { quantity: 0, price: "1", currency: "EUR" }
        ],
        "EUR"
      );

      expect(priceBreaks).toEqual([
        { quantity: 1, price: 0.09, currency: "EUR" },
        { quantity: 10, price: 0.02, currency: "EUR" },
        { quantity: 100, price: 0.01, currency: "EUR" }
      ]);
      expect(dropped).toBe(3);
    });

    it("keeps the reported currency when the preferred one is absent", () => {
      const { priceBreaks } = normalizePriceBreaks(
        [
          { quantity: 1, price: 0.1, currency: "usd" },
          { quantity: 10, price: 0.08, currency: "USD" }
        ],
        "EUR"
      );

      expect(priceBreaks.map(pb => pb.currency)).toEqual(["USD", "USD"]);
    });
  });

  it("folds repeated parameter names and drops empty values", () => {
    expect(
      cleanParameters([
        { name: "Packaging", value: "Reel" },
        { name: "Packaging", value: "Cut Tape" },
        { name: "packaging", value: "Reel" },
        { name: "Resistance", value: "10 kOhms" },
        { name: "", value: "orphan" },
        { name: "Tolerance", value: "-" }
      ])
    ).toEqual([
      { name: "Packaging", value: "Reel, Cut Tape" },
      { name: "Resistance", value: "10 kOhms" }
    ]);
  });

  it("derives the name from the MPN, falling back to the SKU", () => {
    expect(derivePartName(" RC0603FR-0710KL ", "603-RC0603FR-0710KL")).toBe("RC0603FR-0710KL");
    expect(derivePartName("", "603-RC0603FR-0710KL")).toBe("603-RC0603FR-0710KL");
  });
});
