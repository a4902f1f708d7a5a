import { accepted, rejected, type ParseResult } from "./parseResult";

/** Parses a JSON object of account id -> non-negative integer balance. */
export function parseOpeningBalances(
  raw: string | undefined
): ParseResult<Record<string, number>> {
  if (!raw || raw.trim() === "") {
    return accepted<Record<string, number>>({});
  }

  let parsed: unknown;

  try {
    parsed = JSON.parse(raw);
  } catch {
    return rejected("must be valid JSON");
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return rejected("must be a JSON object");
  }

  const entries: [string, number][] = [];
  for (const [account, amount] of Object.entries(parsed)) {
    if (typeof amount !== "number" || !Number.isSafeInteger(amount) || amount < 0) {
      return rejected(`balance for "${account}" must be a non-negative integer`);
    }
    entries.push([account, amount]);
  }

  // Own properties only; assignment would route "__proto__" to the prototype setter.
  return accepted(Object.fromEntries(entries));
}
