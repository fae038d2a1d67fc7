import { describe, expect, it, vi } from "vitest";
import {
  InputFileError,
  StructuralParseError,
  UnsupportedBankError,
} from "@/lib/errors";
import { formatDateISO } from "@/lib/parsers/utils";
import { unify } from "@/lib/unify";

const A = "tests/fixtures/bank-a.csv";
const B = "tests/fixtures/bank-b.csv";
const C = "tests/fixtures/bank-c.csv";

describe("unify", () => {
  it("concatenates files in the order they were given", () => {
    const { transactions, rowErrors } = unify([
      { bank: "BankA", path: A },
      { bank: "BankB", path: B },
    ]);

    expect(rowErrors).toEqual([]);
    expect(transactions).toHaveLength(5);
    expect(transactions.map((tx) => tx.sourceBank)).toEqual([
      "BankA",
      "BankA",
      "BankB",
      "BankB",
      "BankB",
    ]);
    expect(transactions.map((tx) => tx.description)).toEqual([
      "Grocery store",
      "Salary October",
      "Electricity bill",
      "Refund",
      "Transfer, savings",
    ]);
  });

  it("does not sort by date across files", () => {
    const { transactions } = unify([
      { bank: "BankC", path: C },
      { bank: "BankA", path: A },
    ]);
    expect(transactions.map((tx) => formatDateISO(tx.date))).toEqual([
      "2019-10-05",
      "2019-10-06",
      "2019-10-01",
      "2019-10-02",
    ]);
  });

  it("keeps duplicates when the same file is given twice", () => {
    const { transactions } = unify([
      { bank: "BankA", path: A },
      { bank: "BankA", path: A },
    ]);
    expect(transactions).toHaveLength(4);
  });

  it("normalizes signs the same way for every bank", () => {
    const { transactions } = unify([
      { bank: "BankA", path: A },
      { bank: "BankB", path: B },
      { bank: "BankC", path: C },
    ]);
    const debits = transactions.filter((tx) => tx.amount < 0);
    expect(debits.map((tx) => tx.description)).toEqual([
      "Grocery store",
      "Electricity bill",
      "Coffee",
    ]);
  });

  it("rejects an unknown bank type before reading any file", () => {
    expect(() =>
      unify([
        { bank: "BankA", path: "tests/fixtures/does-not-exist.csv" },
        { bank: "BankX", path: B },
      ])
    ).toThrow(UnsupportedBankError);
  });

  it("fails on a missing file", () => {
    const path = "tests/fixtures/does-not-exist.csv";
    expect(() => unify([{ bank: "BankA", path }])).toThrow(
      new InputFileError(path, Object.assign(new Error("missing"), { code: "ENOENT" }))
    );
  });

  it("fails the run on a structural error", () => {
    expect(() =>
      unify([
        { bank: "BankA", path: A },
        { bank: "BankA", path: "tests/fixtures/bank-a-short-row.csv" },
      ])
    ).toThrow(StructuralParseError);
  });

  it("passes skipped rows to the callback and returns them", () => {
    const onRowError = vi.fn();
    const path = "tests/fixtures/bank-a-bad-date.csv";
    const { transactions, rowErrors } = unify([{ bank: "BankA", path }], {
      onRowError,
    });

    expect(transactions).toHaveLength(2);
    const expected = {
      format: "BankA",
      source: path,
      row: 3,
      message: 'invalid date "Foo 1 2019"',
    };
    expect(rowErrors).toEqual([expected]);
    expect(onRowError).toHaveBeenCalledTimes(1);
    expect(onRowError).toHaveBeenCalledWith(expected);
  });
});
