import { describe, expect, it } from "vitest";
import { readFileSync } from "node:fs";
import { bankBParser } from "@/lib/parsers/bank-b";
import { formatDateISO } from "@/lib/parsers/utils";

describe("bankBParser", () => {
  it("takes the sign from the amount itself", () => {
    const text = readFileSync("tests/fixtures/bank-b.csv", "utf-8");
    const { transactions, rowErrors } = bankBParser.parse(text);

    expect(rowErrors).toEqual([]);
    expect(transactions.map((tx) => tx.amount)).toEqual([-99.4, 2123.5, 12]);
    expect(transactions.map((tx) => formatDateISO(tx.date))).toEqual([
      "2019-10-03",
      "2019-10-04",
      "2019-10-05",
    ]);
    expect(transactions.every((tx) => tx.sourceBank === "BankB")).toBe(true);
  });

  it("keeps quoted descriptions intact", () => {
    const text = readFileSync("tests/fixtures/bank-b.csv", "utf-8");
    const { transactions } = bankBParser.parse(text);
    expect(transactions[2].description).toBe("Transfer, savings");
  });

  it("reads day-month-year dates, not month-day-year", () => {
    const text = "date,description,amounts\n13-01-2020,Rent,-800\n01-13-2020,Rent,-800\n";
    const { transactions, rowErrors } = bankBParser.parse(text, { source: "b.csv" });

    expect(transactions).toHaveLength(1);
    expect(formatDateISO(transactions[0].date)).toBe("2020-01-13");
    expect(rowErrors).toEqual([
      { format: "BankB", source: "b.csv", row: 3, message: 'invalid date "01-13-2020"' },
    ]);
  });

  it("rejects an unparseable sign", () => {
    const text = "date,description,amounts\n01-01-2020,Odd,--5\n";
    const { rowErrors } = bankBParser.parse(text);
    expect(rowErrors.map((error) => error.message)).toEqual(['invalid amount "--5"']);
  });
});
