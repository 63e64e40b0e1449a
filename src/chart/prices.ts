import { PriceParseError } from "../core/errors";

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Parse one price as a number after dropping thousands separators.
 * "1,234" → 1234
 * @param product - Product the price belongs to, named in the error
 * @throws PriceParseError when the text is not a decimal number
 */
export function parsePriceText(text: string, product = "(unknown)"): number {
  const cleaned = text.trim().replace(/^(['"])(.*)\1$/, "$2").replace(/,/g, "");
  if (!DECIMAL.test(cleaned)) {
    throw new PriceParseError(product, text);
  }
  return Number(cleaned);
}

/**
 * Parse a serialized price list such as "[120.5,130.0]".
 * Brackets are optional; "[]" is an empty list, while '[""]' holds one blank
 * price and fails like any other malformed token.
 */
export function parsePriceList(serialized: string, product: string): number[] {
  const inner = serialized.trim().replace(/^\[/, "").replace(/\]$/, "").trim();
  if (inner === "") return [];
  return inner.split(",").map((token) => parsePriceText(token, product));
}
