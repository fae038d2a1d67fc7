import { stringify } from "csv-stringify/sync";
import { UNIFIED_COLUMNS } from "./parsers/unified";
import { formatAmount, formatDateISO } from "./parsers/utils";
import type { Transaction } from "./parsers";

export function toUnifiedRow(tx: Transaction): string[] {
  return [formatDateISO(tx.date), tx.description, formatAmount(tx.amount), tx.sourceBank];
}

export function formatTransactionsCsv(transactions: readonly Transaction[]): string {
  return stringify([[...UNIFIED_COLUMNS], ...transactions.map(toUnifiedRow)], {
    record_delimiter: "unix",
  });
}
