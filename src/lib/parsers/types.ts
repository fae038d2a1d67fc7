export const BANK_IDS = ["BankA", "BankB", "BankC"] as const;

export type BankId = (typeof BANK_IDS)[number];

export type Transaction = Readonly<{
  date: Date;
  description: string;
  amount: number;
  sourceBank: BankId;
}>;

export type RowError = {
  // Bank type, or "Unified" for the unified reader.
  format: string;
  source: string;
  row: number;
  message: string;
};

export type ParseOptions = {
  // Shown in diagnostics; usually the file path.
  source?: string;
};

export type ParseResult = {
  transactions: Transaction[];
  rowErrors: RowError[];
};

export interface BankParser {
  bankId: BankId;
  columns: readonly string[];
  parse: (input: string | Buffer, options?: ParseOptions) => ParseResult;
}

export function createTransaction(fields: Transaction): Transaction {
  return Object.freeze({
    date: new Date(fields.date.getTime()),
    description: fields.description.trim(),
    amount: fields.amount,
    sourceBank: fields.sourceBank,
  });
}

export function sameTransaction(a: Transaction, b: Transaction): boolean {
  return (
    a.date.getTime() === b.date.getTime() &&
    a.description === b.description &&
    a.amount === b.amount &&
    a.sourceBank === b.sourceBank
  );
}

export function isBankId(value: string): value is BankId {
  return BANK_IDS.some((id) => id === value);
}
