import ExcelJS from "exceljs";

import { logger } from "@/lib/logger";
import { formatCategory, formatDateTime, formatPercent, formatPrice } from "@/lib/format";
import { buildCategoryTotals, buildProjectReport } from "@/lib/services/reports";
import { TRANSACTION_CATEGORIES, type ProjectEntity, type TransactionEntity } from "@/types/domain";

export const REPORT_SHEET = "Отчет";
export const SUMMARY_SHEET = "Сводка";
export const TABLE_HEADER_ROW = 7;

const HEADERS = ["Дата", "Категория", "Описание", "Сумма (BYN)"];
const HEADER_FILL: ExcelJS.Fill = { type: "pattern", pattern: "solid", fgColor: { argb: "FF4472C4" } };
const HEADER_FONT: Partial<ExcelJS.Font> = { bold: true, size: 12, color: { argb: "FFFFFFFF" } };
const CENTER: Partial<ExcelJS.Alignment> = { horizontal: "center", vertical: "middle" };
const THIN_BORDER: Partial<ExcelJS.Borders> = {
  top: { style: "thin" },
  left: { style: "thin" },
  bottom: { style: "thin" },
  right: { style: "thin" },
};

interface ExportOptions {
  generatedAt?: Date;
}

function chronological(transactions: TransactionEntity[]): TransactionEntity[] {
  return [...transactions].sort((a, b) =>
    a.createdAt === b.createdAt ? a.id - b.id : a.createdAt < b.createdAt ? -1 : 1
  );
}

export function buildReportWorkbook(
  project: ProjectEntity,
  transactions: TransactionEntity[],
  options: ExportOptions = {}
): ExcelJS.Workbook {
  const generatedAt = options.generatedAt ?? new Date();
  const report = buildProjectReport(project, transactions, []);

  const workbook = new ExcelJS.Workbook();
  workbook.created = generatedAt;
  const ws = workbook.addWorksheet(REPORT_SHEET);

  const title = ws.getCell("A1");
  title.value = "ОТЧЕТ ПО ПРОЕКТУ";
  title.font = { bold: true, size: 14 };
  title.alignment = CENTER;
  ws.mergeCells("A1:E1");

  ws.getCell("A2").value = `Проект: ${project.name}`;
  ws.getCell("A3").value = `Адрес: ${project.address}`;
  ws.getCell("A4").value = `Бюджет: ${formatPrice(project.budget)}`;
  ws.getCell("A5").value = `Дата отчета: ${formatDateTime(generatedAt)}`;

  const header = ws.getRow(TABLE_HEADER_ROW);
  HEADERS.forEach((label, index) => {
    const cell = header.getCell(index + 1);
    cell.value = label;
    cell.fill = HEADER_FILL;
    cell.font = HEADER_FONT;
    cell.border = THIN_BORDER;
    cell.alignment = CENTER;
  });

  let rowNumber = TABLE_HEADER_ROW + 1;
  for (const transaction of chronological(transactions)) {
    const row = ws.getRow(rowNumber);
    row.getCell(1).value = formatDateTime(transaction.createdAt);
    row.getCell(2).value = formatCategory(transaction.category);
    row.getCell(3).value = transaction.description ?? "";
    row.getCell(4).value = transaction.amount;
    for (let col = 1; col <= HEADERS.length; col++) {
      row.getCell(col).border = THIN_BORDER;
    }
    rowNumber += 1;
  }

  const totals = ws.getRow(rowNumber);
  totals.getCell(3).value = "ИТОГО:";
  totals.getCell(3).font = { bold: true };
  totals.getCell(4).value = report.budgetSpent;
  totals.getCell(4).font = { bold: true };
  for (let col = 1; col <= HEADERS.length; col++) {
    totals.getCell(col).border = THIN_BORDER;
  }

  rowNumber += 2;
  ws.getCell(rowNumber, 1).value = "СТАТИСТИКА";
  ws.getCell(rowNumber, 1).font = { bold: true, size: 11 };

  const stats: Array<[string, string]> = [
    ["Потрачено:", formatPrice(report.budgetSpent)],
    ["Осталось:", formatPrice(report.budgetRemaining)],
    ["% использовано:", `${formatPercent(report.percentUsed)}%`],
  ];
  for (const [label, value] of stats) {
    rowNumber += 1;
    ws.getCell(rowNumber, 1).value = label;
    ws.getCell(rowNumber, 2).value = value;
  }

  [15, 15, 30, 15, 15].forEach((width, index) => {
    ws.getColumn(index + 1).width = width;
  });

  return workbook;
}

export function buildSummaryWorkbook(project: ProjectEntity, transactions: TransactionEntity[]): ExcelJS.Workbook {
  const report = buildProjectReport(project, transactions, []);
  const byCategory = buildCategoryTotals(transactions);

  const workbook = new ExcelJS.Workbook();
  const ws = workbook.addWorksheet(SUMMARY_SHEET);

  const title = ws.getCell("A1");
  title.value = `Сводка по проекту: ${project.name}`;
  title.font = { bold: true, size: 14 };
  ws.mergeCells("A1:B1");

  const rows: Array<[string, string]> = [
    ["Бюджет:", formatPrice(report.budgetPlan)],
    ["Потрачено:", formatPrice(report.budgetSpent)],
    ["Осталось:", formatPrice(report.budgetRemaining)],
    ["% использовано:", `${formatPercent(report.percentUsed)}%`],
    ["Количество расходов:", String(report.transactionsCount)],
  ];

  let rowNumber = 3;
  for (const [label, value] of rows) {
    ws.getCell(rowNumber, 1).value = label;
    ws.getCell(rowNumber, 1).font = { bold: true };
    ws.getCell(rowNumber, 2).value = value;
    rowNumber += 1;
  }

  rowNumber += 1;
  ws.getCell(rowNumber, 1).value = "По категориям:";
  ws.getCell(rowNumber, 1).font = { bold: true };
  for (const category of TRANSACTION_CATEGORIES) {
    rowNumber += 1;
    ws.getCell(rowNumber, 1).value = formatCategory(category);
    ws.getCell(rowNumber, 2).value = formatPrice(byCategory[category]);
  }

  ws.getColumn(1).width = 25;
  ws.getColumn(2).width = 20;

  return workbook;
}

async function toBuffer(workbook: ExcelJS.Workbook): Promise<Buffer> {
  const data = await workbook.xlsx.writeBuffer();
  return Buffer.from(data);
}

/** Itemized report. Null when the workbook cannot be produced. */
export async function exportProjectToExcel(
  project: ProjectEntity,
  transactions: TransactionEntity[],
  options: ExportOptions = {}
): Promise<Buffer | null> {
  try {
    const buffer = await toBuffer(buildReportWorkbook(project, transactions, options));
    logger.info("Excel report created", { projectId: project.id, rows: transactions.length, bytes: buffer.length });
    return buffer;
  } catch (error) {
    logger.error("Failed to build Excel report", {
      projectId: project.id,
      message: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

export async function exportProjectSummary(
  project: ProjectEntity,
  transactions: TransactionEntity[]
): Promise<Buffer | null> {
  try {
    const buffer = await toBuffer(buildSummaryWorkbook(project, transactions));
    logger.info("Excel summary created", { projectId: project.id, bytes: buffer.length });
    return buffer;
  } catch (error) {
    logger.error("Failed to build Excel summary", {
      projectId: project.id,
      message: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}
