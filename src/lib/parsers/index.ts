import { UnsupportedBankError } from "../errors";
import { bankAParser } from "./bank-a";
import { bankBParser } from "./bank-b";
import { bankCParser } from "./bank-c";
import { BANK_IDS, isBankId, type BankId, type BankParser } from "./types";

export const parserRegistry: Readonly<Record<BankId, BankParser>> = Object.freeze({
  BankA: bankAParser,
  BankB: bankBParser,
  BankC: bankCParser,
});

export const SUPPORTED_BANKS: readonly BankId[] = BANK_IDS;

// Exact, case-sensitive match; "banka" is not "BankA".
export function resolveParser(name: string): BankParser {
  if (!isBankId(name)) {
    throw new UnsupportedBankError(name, SUPPORTED_BANKS);
  }
  return parserRegistry[name];
}

export type { BankId, BankParser };
export type { ParseResult, RowError, Transaction } from "./types";
