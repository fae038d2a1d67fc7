import { parse } from "csv-parse/sync";
import { z } from "zod";
import { StructuralParseError } from "../errors";
import {
  createTransaction,
  type BankId,
  type BankParser,
  type ParseResult,
  type RowError,
  type Transaction,
} from "./types";

export type RowFields = Pick<Transaction, "date" | "description" | "amount">;

export type RowSchema = z.ZodType<RowFields, z.ZodTypeDef, unknown>;

export type SourceRow = {
  // 1-based record number; the header is row 1.
  row: number;
  values: Record<string, string>;
};

const recordsSchema = z.array(z.array(z.string()));

// Wraps a throwing converter so its message becomes a zod issue.
export function coerced<T>(convert: (value: string) => T) {
  return z.string().transform((value, ctx) => {
    try {
      return convert(value);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error instanceof Error ? error.message : String(error),
      });
      return z.NEVER;
    }
  });
}

export function readRows(
  input: string | Buffer,
  format: string,
  columns: readonly string[],
  source: string
): SourceRow[] {
  let records: string[][];
  try {
    records = recordsSchema.parse(
      parse(input, {
        bom: true,
        skip_empty_lines: true,
        trim: true,
        relax_column_count: true,
      })
    );
  } catch (error) {
    const reason = error instanceof Error ? error.message : "unreadable CSV";
    throw new StructuralParseError(format, source, null, reason);
  }

  const [header, ...data] = records;
  if (!header) {
    throw new StructuralParseError(format, source, null, "missing header row");
  }
  const headerMatches =
    header.length === columns.length &&
    header.every((name, position) => name === columns[position]);
  if (!headerMatches) {
    throw new StructuralParseError(
      format,
      source,
      1,
      `unexpected header "${header.join(",")}" (expected "${columns.join(",")}")`
    );
  }

  return data.map((record, index) => {
    const row = index + 2;
    if (record.length !== columns.length) {
      throw new StructuralParseError(
        format,
        source,
        row,
        `expected ${columns.length} columns, found ${record.length}`
      );
    }
    const values: Record<string, string> = {};
    columns.forEach((column, position) => {
      values[column] = record[position];
    });
    return { row, values };
  });
}

export function mapRows<T>(
  rows: SourceRow[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  build: (fields: T) => Transaction,
  format: string,
  source: string
): ParseResult {
  const transactions: Transaction[] = [];
  const rowErrors: RowError[] = [];

  for (const { row, values } of rows) {
    const result = schema.safeParse(values);
    if (!result.success) {
      rowErrors.push({
        format,
        source,
        row,
        message: result.error.issues.map((issue) => issue.message).join("; "),
      });
      continue;
    }
    transactions.push(build(result.data));
  }

  return { transactions, rowErrors };
}

export function defineCsvParser(definition: {
  bankId: BankId;
  columns: readonly string[];
  schema: RowSchema;
}): BankParser {
  const { bankId, columns, schema } = definition;
  return {
    bankId,
    columns,
    parse(input, options) {
      const source = options?.source ?? "<input>";
      const rows = readRows(input, bankId, columns, source);
      return mapRows(
        rows,
        schema,
        (fields) => createTransaction({ ...fields, sourceBank: bankId }),
        bankId,
        source
      );
    },
  };
}
