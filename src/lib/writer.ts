import { writeFileSync } from "node:fs";
import { formatTransactionsCsv } from "./csv";
import { OutputFileError } from "./errors";
import { buildWorkbook } from "./excel";
import type { Transaction } from "./parsers";

export type Destination = { kind: "stdout" } | { kind: "file"; path: string };

export interface TextOutput {
  write(chunk: string): unknown;
}

export function isSpreadsheetPath(path: string): boolean {
  return path.toLowerCase().endsWith(".xlsx");
}

// The whole output is rendered before anything touches the destination.
export async function writeTransactions(
  transactions: readonly Transaction[],
  destination: Destination,
  stdout: TextOutput = process.stdout
): Promise<void> {
  if (destination.kind === "stdout") {
    stdout.write(formatTransactionsCsv(transactions));
    return;
  }

  const content = isSpreadsheetPath(destination.path)
    ? await buildWorkbook(transactions)
    : formatTransactionsCsv(transactions);

  try {
    writeFileSync(destination.path, content);
  } catch (error) {
    throw new OutputFileError(destination.path, error);
  }
}
