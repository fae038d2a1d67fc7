import { z } from "zod";
import { coerced, defineCsvParser } from "./rows";
import {
  applyDirection,
  parseAmount,
  parseDateMonthDayYear,
  parseDirection,
} from "./utils";

// timestamp,type,amount,description
// Oct 1 2019,remove,99.20,Grocery store
const rowSchema = z
  .object({
    timestamp: coerced(parseDateMonthDayYear),
    type: coerced(parseDirection),
    amount: coerced((value) => parseAmount(value, { signed: false })),
    description: z.string(),
  })
  .transform((row) => ({
    date: row.timestamp,
    description: row.description,
    amount: applyDirection(row.amount, row.type),
  }));

export const bankAParser = defineCsvParser({
  bankId: "BankA",
  columns: ["timestamp", "type", "amount", "description"],
  schema: rowSchema,
});
