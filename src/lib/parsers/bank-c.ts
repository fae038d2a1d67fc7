import { z } from "zod";
import { coerced, defineCsvParser } from "./rows";
import {
  applyDirection,
  parseDateDayMonthYear,
  parseDirection,
  parseWholeNumber,
} from "./utils";

// date_readable,type,euro,cents,memo
// 1 Oct 2019,remove,99,20,Grocery store
const rowSchema = z
  .object({
    date_readable: coerced(parseDateDayMonthYear),
    type: coerced(parseDirection),
    euro: coerced((value) => parseWholeNumber(value, "euro")),
    cents: coerced((value) => parseWholeNumber(value, "cents", 99)),
    memo: z.string(),
  })
  .transform((row, ctx) => {
    const cents = row.euro * 100 + row.cents;
    if (!Number.isSafeInteger(cents)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `invalid amount "${row.euro}" euro "${row.cents}" cents`,
      });
      return z.NEVER;
    }
    return {
      date: row.date_readable,
      description: row.memo,
      amount: applyDirection(cents / 100, row.type),
    };
  });

export const bankCParser = defineCsvParser({
  bankId: "BankC",
  columns: ["date_readable", "type", "euro", "cents", "memo"],
  schema: rowSchema,
});
