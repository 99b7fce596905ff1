/**
 * Price parsing helpers
 *
 * Listing prices arrive as free text ("$24.99", "24,99 €", "From 19.90").
 * The first numeric run is taken and a comma is read as the decimal point.
 */

const NUMERIC_RUN = /\d[\d.,]*/;

/**
 * Parse the first price-looking number in a text
 *
 * @returns the value, or undefined when nothing parses
 */
export function parsePriceText(text: string | null | undefined): number | undefined {
  if (!text) return undefined;

  const match = text.replace(/,/g, ".").match(NUMERIC_RUN);
  if (!match) return undefined;

  return toFiniteNumber(match[0]);
}

/**
 * Parse a price field from a JSON payload (number or currency string)
 */
export function parsePriceValue(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value !== "string") return undefined;

  const cleaned = value
    .replace(/,/g, ".")
    .replace(/[$€]/g, "")
    .trim();
  return toFiniteNumber(cleaned);
}

function toFiniteNumber(text: string): number | undefined {
  if (text === "") return undefined;
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : undefined;
}
