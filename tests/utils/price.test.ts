import { describe, it, expect } from "vitest";
import { normalizePrice, parsePriceValue } from "../../src/utils/price";
import { InvalidDataError } from "../../src/utils/errors";

describe("normalizePrice", () => {
  it("drops the fractional part and every non-digit", () => {
    expect(normalizePrice("5'990.00 руб.")).toBe("5990");
  });

  it("keeps only the part before the first dot", () => {
    expect(normalizePrice("12.34$")).toBe("12");
    expect(normalizePrice("1.999")).toBe("1");
  });

  it("returns an empty string when there are no digits", () => {
    expect(normalizePrice("abc")).toBe("");
  });

  it("does not round", () => {
    expect(normalizePrice("9.99")).toBe("9");
  });
});

describe("parsePriceValue", () => {
  it("parses the normalized digits", () => {
    expect(parsePriceValue("1'500.00 руб.")).toBe(1500);
  });

  it("fails when nothing numeric is left", () => {
    expect(() => parsePriceValue("по запросу")).toThrow(InvalidDataError);
  });
});
