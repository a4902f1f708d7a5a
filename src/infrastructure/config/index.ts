import { parseOpeningBalances } from "../http/parsers/parseOpeningBalances";

export interface LedgerConfig {
  openingBalances: Record<string, number>;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const openingBalances = parseOpeningBalances(env.OPENING_BALANCES);
  if (!openingBalances.success) {
    throw new Error(`OPENING_BALANCES ${openingBalances.error}`);
  }

  return { openingBalances: openingBalances.data };
}
