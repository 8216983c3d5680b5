import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { DatabaseHandle } from "@/lib/db/client";
import { formatPercent } from "@/lib/format";
import { createProgressPhoto } from "@/lib/repository/progress-photos";
import { createTransaction } from "@/lib/repository/transactions";
import {
  buildCategoryTotals,
  buildDailyExpenses,
  buildExpenseHistory,
  buildProjectReport,
  buildStageCounts,
  loadProjectOverview,
  loadProjectReport,
  percentUsed,
  sumAmounts,
} from "@/lib/services/reports";
import { createTestDatabase, makePhoto, makeProject, makeTransaction, seedProject, seedUser } from "./helpers";

describe("buildProjectReport", () => {
  it("derives spent, remaining and percent from the transactions", () => {
    const report = buildProjectReport(
      makeProject({ budget: 50000 }),
      [
        makeTransaction({ id: 1, amount: 1250.5, category: "materials" }),
        makeTransaction({ id: 2, amount: 300, category: "labor" }),
      ],
      [makePhoto()]
    );

    expect(report.budgetSpent).toBe(1550.5);
    expect(report.budgetRemaining).toBe(48449.5);
    expect(formatPercent(report.percentUsed)).toBe("3.1");
    expect(report.transactionsCount).toBe(2);
    expect(report.photosCount).toBe(1);
  });

  it("never reports a negative remainder", () => {
    const report = buildProjectReport(makeProject({ budget: 1000 }), [makeTransaction({ amount: 1500 })], []);
    expect(report.budgetRemaining).toBe(0);
    expect(report.percentUsed).toBe(150);
  });

  it("treats a zero budget as zero percent used", () => {
    expect(percentUsed(0, 500)).toBe(0);
  });
});

describe("bucket aggregation", () => {
  it("returns zero buckets for empty input", () => {
    expect(buildCategoryTotals([])).toEqual({ materials: 0, labor: 0, other: 0 });
    expect(buildStageCounts([])).toEqual({ draft: 0, electric: 0, finish: 0 });
  });

  it("bucket totals add up to the overall sum", () => {
    const transactions = [
      makeTransaction({ id: 1, amount: 100, category: "materials" }),
      makeTransaction({ id: 2, amount: 50.25, category: "materials" }),
      makeTransaction({ id: 3, amount: 20, category: "other" }),
    ];
    const totals = buildCategoryTotals(transactions);

    expect(totals).toEqual({ materials: 150.25, labor: 0, other: 20 });
    expect(totals.materials + totals.labor + totals.other).toBe(sumAmounts(transactions));
  });

  it("counts photos per stage", () => {
    const photos = [
      makePhoto({ id: 1, stage: "draft" }),
      makePhoto({ id: 2, stage: "finish" }),
      makePhoto({ id: 3, stage: "draft" }),
    ];
    expect(buildStageCounts(photos)).toEqual({ draft: 2, electric: 0, finish: 1 });
  });
});

describe("buildExpenseHistory", () => {
  it("keeps the 10 newest entries, newest first", () => {
    const transactions = Array.from({ length: 15 }, (_, index) =>
      makeTransaction({
        id: index + 1,
        amount: index + 1,
        createdAt: `2024-01-${String(index + 1).padStart(2, "0")}T10:00:00`,
      })
    );

    const history = buildExpenseHistory(transactions);

    expect(history.entries).toHaveLength(10);
    expect(history.entries.map((entry) => entry.id)).toEqual([15, 14, 13, 12, 11, 10, 9, 8, 7, 6]);
    expect(history.total).toBe(105);
  });

  it("breaks timestamp ties by insertion order", () => {
    const history = buildExpenseHistory([
      makeTransaction({ id: 1, createdAt: "2024-01-01T10:00:00" }),
      makeTransaction({ id: 2, createdAt: "2024-01-01T10:00:00" }),
    ]);
    expect(history.entries.map((entry) => entry.id)).toEqual([2, 1]);
  });
});

describe("buildDailyExpenses", () => {
  it("sums per day with the latest day first", () => {
    const days = buildDailyExpenses([
      makeTransaction({ id: 1, amount: 100, createdAt: "2024-03-01T09:00:00" }),
      makeTransaction({ id: 2, amount: 50.5, createdAt: "2024-03-01T18:30:00" }),
      makeTransaction({ id: 3, amount: 20, createdAt: "2024-03-03T12:00:00" }),
    ]);
    expect(days).toEqual([
      { date: "03.03.2024", amount: 20 },
      { date: "01.03.2024", amount: 150.5 },
    ]);
  });
});

describe("loadProjectOverview", () => {
  let handle: DatabaseHandle;

  beforeEach(() => {
    handle = createTestDatabase();
  });

  afterEach(() => {
    handle.close();
  });

  it("recomputes the report from stored rows", async () => {
    const owner = await seedUser(handle.db, 100, "Иван", "foreman");
    const project = await seedProject(handle.db, owner);
    await createTransaction(handle.db, { projectId: project.id, amount: 1250.5, category: "materials" });
    await createTransaction(handle.db, { projectId: project.id, amount: 300, category: "labor" });
    await createProgressPhoto(handle.db, { projectId: project.id, photoId: "photo-1", stage: "draft" });

    const overview = await loadProjectOverview(handle.db, project.id);

    expect(overview?.transactions).toHaveLength(2);
    expect(overview?.photos).toHaveLength(1);
    expect(overview?.report).toMatchObject({
      projectId: project.id,
      budgetPlan: 50000,
      budgetSpent: 1550.5,
      budgetRemaining: 48449.5,
      transactionsCount: 2,
      photosCount: 1,
    });
  });

  it("resolves null for an unknown project", async () => {
    expect(await loadProjectOverview(handle.db, 404)).toBeNull();
    expect(await loadProjectReport(handle.db, 404)).toBeNull();
  });
});
