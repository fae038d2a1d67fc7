import { z } from "zod";
import { coerced, defineCsvParser } from "./rows";
import { parseAmount, parseDateDashed } from "./utils";

// date,description,amounts
// 01-10-2019,Grocery store,-99.20
// The sign lives in the amount itself: a leading "-" marks a debit.
const rowSchema = z
  .object({
    date: coerced(parseDateDashed),
    description: z.string(),
    amounts: coerced((value) => parseAmount(value, { signed: true })),
  })
  .transform((row) => ({
    date: row.date,
    description: row.description,
    amount: row.amounts,
  }));

export const bankBParser = defineCsvParser({
  bankId: "BankB",
  columns: ["date", "description", "amounts"],
  schema: rowSchema,
});
