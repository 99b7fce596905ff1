/**
 * PriceParser Test
 */

import { describe, it, expect } from "@jest/globals";
import {
  parsePriceText,
  parsePriceValue,
} from "@/extractors/common/PriceParser";

describe("parsePriceText", () => {
  it("reads the number out of currency text", () => {
    expect(parsePriceText("$24.99")).toBe(24.99);
    expect(parsePriceText("Sale price 19.90 USD")).toBe(19.9);
  });

  it("treats a comma as the decimal point", () => {
    expect(parsePriceText("24,99 €")).toBe(24.99);
  });

  it("takes the first price of a range", () => {
    expect(parsePriceText("From $19.99 to $29.99")).toBe(19.99);
  });

  it("returns undefined when nothing parses", () => {
    expect(parsePriceText("Sold out")).toBeUndefined();
    expect(parsePriceText("")).toBeUndefined();
    expect(parsePriceText(undefined)).toBeUndefined();
    expect(parsePriceText("1,299.00")).toBeUndefined();
  });
});

describe("parsePriceValue", () => {
  it("passes numbers through", () => {
    expect(parsePriceValue(42.5)).toBe(42.5);
  });

  it("strips currency symbols from strings", () => {
    expect(parsePriceValue("$35.00")).toBe(35);
    expect(parsePriceValue("29,90€")).toBe(29.9);
  });

  it("returns undefined for other values", () => {
    expect(parsePriceValue("call us")).toBeUndefined();
    expect(parsePriceValue(null)).toBeUndefined();
    expect(parsePriceValue({ amount: 10 })).toBeUndefined();
  });
});
