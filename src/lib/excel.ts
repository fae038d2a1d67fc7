import ExcelJS from "exceljs";
import type { Transaction } from "./parsers";
import { formatDateISO } from "./parsers/utils";

export const WORKSHEET_NAME = "Transactions";

export async function buildWorkbook(transactions: readonly Transaction[]): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet(WORKSHEET_NAME);

  worksheet.columns = [
    { header: "date", key: "date", width: 12 },
    { header: "description", key: "description", width: 60 },
    { header: "amount", key: "amount", width: 14 },
    { header: "source_bank", key: "sourceBank", width: 12 },
  ];

  worksheet.getColumn("amount").numFmt = "0.00";

  for (const tx of transactions) {
    worksheet.addRow({
      date: formatDateISO(tx.date),
      description: tx.description,
      amount: tx.amount,
      sourceBank: tx.sourceBank,
    });
  }

  return Buffer.from(await workbook.xlsx.writeBuffer());
}
