import { z } from "zod";
import { coerced, mapRows, readRows } from "./rows";
import { createTransaction, isBankId, type BankId, type ParseResult } from "./types";
import { parseAmount, parseDateISO } from "./utils";

export const UNIFIED_FORMAT = "Unified";

export const UNIFIED_COLUMNS = ["date", "description", "amount", "source_bank"] as const;

function parseBankId(input: string): BankId {
  const value = input.trim();
  if (!isBankId(value)) {
    throw new Error(`invalid source_bank "${input}"`);
  }
  return value;
}

const rowSchema = z.object({
  date: coerced(parseDateISO),
  description: z.string(),
  amount: coerced((value) => parseAmount(value, { signed: true })),
  source_bank: coerced(parseBankId),
});

// Reads the unified CSV back into transactions. This is not a bank type and
// the registry never resolves it; each row keeps the bank in its source_bank.
export function parseUnified(input: string | Buffer, source = "<unified>"): ParseResult {
  const rows = readRows(input, UNIFIED_FORMAT, UNIFIED_COLUMNS, source);
  return mapRows(
    rows,
    rowSchema,
    (row) =>
      createTransaction({
        date: row.date,
        description: row.description,
        amount: row.amount,
        sourceBank: row.source_bank,
      }),
    UNIFIED_FORMAT,
    source
  );
}
