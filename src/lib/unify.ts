import { readFileSync } from "node:fs";
import { InputFileError } from "./errors";
import { resolveParser, type BankParser, type RowError, type Transaction } from "./parsers";

export type UnifyInput = {
  bank: string;
  path: string;
};

export type UnifyOptions = {
  onRowError?: (error: RowError) => void;
};

export type UnifyResult = {
  transactions: Transaction[];
  rowErrors: RowError[];
};

function readInput(path: string): Buffer {
  try {
    return readFileSync(path);
  } catch (error) {
    throw new InputFileError(path, error);
  }
}

export function unify(
  inputs: readonly UnifyInput[],
  options: UnifyOptions = {}
): UnifyResult {
  // Resolve every bank type before reading anything, so a typo in the last
  // pair fails the run without touching the earlier files.
  const jobs: { parser: BankParser; path: string }[] = inputs.map((input) => ({
    parser: resolveParser(input.bank),
    path: input.path,
  }));

  const transactions: Transaction[] = [];
  const rowErrors: RowError[] = [];

  for (const { parser, path } of jobs) {
    const result = parser.parse(readInput(path), { source: path });
    transactions.push(...result.transactions);
    for (const rowError of result.rowErrors) {
      rowErrors.push(rowError);
      options.onRowError?.(rowError);
    }
  }

  return { transactions, rowErrors };
}
