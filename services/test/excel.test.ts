import ExcelJS from "exceljs";
import { afterEach, describe, expect, it, vi } from "vitest";

import {
  REPORT_SHEET,
  SUMMARY_SHEET,
  buildReportWorkbook,
  buildSummaryWorkbook,
  exportProjectSummary,
  exportProjectToExcel,
} from "@/lib/reports/excel";
import { exportFileName } from "@/handlers/bot/export";
import { makeProject, makeTransaction } from "./helpers";

const project = makeProject({ id: 4, budget: 50000 });
const transactions = [
  makeTransaction({ id: 2, amount: 1250.5, category: "materials", description: "Кирпич", createdAt: "2024-03-02T10:00:00" }),
  makeTransaction({ id: 1, amount: 300, category: "labor", createdAt: "2024-03-01T09:30:00" }),
];
const generatedAt = new Date(2024, 2, 5, 14, 7);

describe("buildReportWorkbook", () => {
  const sheet = buildReportWorkbook(project, transactions, { generatedAt }).getWorksheet(REPORT_SHEET);

  it("writes the project header", () => {
    expect(sheet?.getCell("A1").value).toBe("ОТЧЕТ ПО ПРОЕКТУ");
    expect(sheet?.getCell("A2").value).toBe("Проект: Дом на Лесной");
    expect(sheet?.getCell("A3").value).toBe("Адрес: ул. Лесная, 5");
    expect(sheet?.getCell("A4").value).toBe("Бюджет: 50 000.00 BYN");
    expect(sheet?.getCell("A5").value).toBe("Дата отчета: 05.03.2024 14:07");
  });

  it("lists expenses oldest first under a styled header", () => {
    const header = sheet?.getRow(7);
    expect([1, 2, 3, 4].map((col) => header?.getCell(col).value)).toEqual([
      "Дата",
      "Категория",
      "Описание",
      "Сумма (BYN)",
    ]);
    expect(header?.getCell(1).font?.bold).toBe(true);

    expect([1, 2, 3, 4].map((col) => sheet?.getRow(8).getCell(col).value)).toEqual([
      "01.03.2024 09:30",
      "👷 Работа",
      "",
      300,
    ]);
    expect([1, 2, 3, 4].map((col) => sheet?.getRow(9).getCell(col).value)).toEqual([
      "02.03.2024 10:00",
      "🏗️ Материалы",
      "Кирпич",
      1250.5,
    ]);
  });

  it("closes with totals and statistics", () => {
    expect(sheet?.getCell("C10").value).toBe("ИТОГО:");
    expect(sheet?.getCell("D10").value).toBe(1550.5);
    expect(sheet?.getCell("A12").value).toBe("СТАТИСТИКА");
    expect([13, 14, 15].map((row) => [sheet?.getCell(row, 1).value, sheet?.getCell(row, 2).value])).toEqual([
      ["Потрачено:", "1 550.50 BYN"],
      ["Осталось:", "48 449.50 BYN"],
      ["% использовано:", "3.1%"],
    ]);
    expect(sheet?.getColumn(3).width).toBe(30);
  });
});

describe("buildSummaryWorkbook", () => {
  it("summarises the budget and the category split", () => {
    const sheet = buildSummaryWorkbook(project, transactions).getWorksheet(SUMMARY_SHEET);

    expect(sheet?.getCell("A1").value).toBe("Сводка по проекту: Дом на Лесной");
    expect([3, 4, 5, 6, 7].map((row) => [sheet?.getCell(row, 1).value, sheet?.getCell(row, 2).value])).toEqual([
      ["Бюджет:", "50 000.00 BYN"],
      ["Потрачено:", "1 550.50 BYN"],
      ["Осталось:", "48 449.50 BYN"],
      ["% использовано:", "3.1%"],
      ["Количество расходов:", "2"],
    ]);
    expect(sheet?.getCell("A9").value).toBe("По категориям:");
    expect([10, 11, 12].map((row) => [sheet?.getCell(row, 1).value, sheet?.getCell(row, 2).value])).toEqual([
      ["🏗️ Материалы", "1 250.50 BYN"],
      ["👷 Работа", "300.00 BYN"],
      ["📦 Прочее", "0.00 BYN"],
    ]);
  });
});

describe("xlsx export", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("produces zip-packaged workbooks", async () => {
    const report = await exportProjectToExcel(project, transactions, { generatedAt });
    const summary = await exportProjectSummary(project, []);

    expect(report?.subarray(0, 2).toString("latin1")).toBe("PK");
    expect(summary?.subarray(0, 2).toString("latin1")).toBe("PK");
  });

  it("names files after the project and the export time", () => {
    expect(exportFileName("full", project, generatedAt)).toBe("report_4_20240305_1407.xlsx");
    expect(exportFileName("summary", project, generatedAt)).toBe("summary_4_20240305_1407.xlsx");
  });

  it("returns null when the workbook cannot be built", async () => {
    vi.spyOn(ExcelJS.Workbook.prototype, "addWorksheet").mockImplementation(() => {
      throw new Error("worksheet limit");
    });

    expect(await exportProjectToExcel(project, transactions, { generatedAt })).toBeNull();
    expect(await exportProjectSummary(project, transactions)).toBeNull();
  });
});
