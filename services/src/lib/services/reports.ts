import { format, parseISO } from "date-fns";

import type { Db } from "@/lib/db/client";
import { getProject } from "@/lib/repository/projects";
import { listProjectTransactions } from "@/lib/repository/transactions";
import { listProjectPhotos } from "@/lib/repository/progress-photos";
import type {
  CategoryTotals,
  DailyExpense,
  ExpenseHistory,
  ProgressPhotoEntity,
  ProjectEntity,
  ProjectReport,
  StageCounts,
  TransactionEntity,
} from "@/types/domain";

export const HISTORY_LIMIT = 10;

const roundCents = (value: number) => Math.round(value * 100) / 100;

export function sumAmounts(transactions: Pick<TransactionEntity, "amount">[]): number {
  return roundCents(transactions.reduce((sum, transaction) => sum + transaction.amount, 0));
}

export function percentUsed(budget: number, spent: number): number {
  if (budget === 0) {
    return 0;
  }
  return (spent / budget) * 100;
}

export function buildProjectReport(
  project: ProjectEntity,
  transactions: TransactionEntity[],
  photos: ProgressPhotoEntity[]
): ProjectReport {
  const spent = sumAmounts(transactions);
  return {
    projectId: project.id,
    name: project.name,
    address: project.address,
    createdAt: project.createdAt,
    budgetPlan: project.budget,
    budgetSpent: spent,
    budgetRemaining: Math.max(0, roundCents(project.budget - spent)),
    percentUsed: percentUsed(project.budget, spent),
    transactionsCount: transactions.length,
    photosCount: photos.length,
  };
}

export function buildCategoryTotals(transactions: TransactionEntity[]): CategoryTotals {
  const totals: CategoryTotals = { materials: 0, labor: 0, other: 0 };
  for (const transaction of transactions) {
    totals[transaction.category] = roundCents(totals[transaction.category] + transaction.amount);
  }
  return totals;
}

export function buildStageCounts(photos: ProgressPhotoEntity[]): StageCounts {
  const counts: StageCounts = { draft: 0, electric: 0, finish: 0 };
  for (const photo of photos) {
    counts[photo.stage] += 1;
  }
  return counts;
}

/** Most recent first, capped at `limit`, with the total of the rows shown. */
export function buildExpenseHistory(transactions: TransactionEntity[], limit = HISTORY_LIMIT): ExpenseHistory {
  const entries = [...transactions]
    .sort((a, b) => (a.createdAt === b.createdAt ? b.id - a.id : a.createdAt < b.createdAt ? 1 : -1))
    .slice(0, limit);
  return { entries, total: sumAmounts(entries) };
}

/** Per-day totals in local time, newest day first. */
export function buildDailyExpenses(transactions: TransactionEntity[]): DailyExpense[] {
  const byDay = new Map<string, number>();
  for (const transaction of transactions) {
    const key = format(parseISO(transaction.createdAt), "yyyy-MM-dd");
    byDay.set(key, roundCents((byDay.get(key) ?? 0) + transaction.amount));
  }
  return [...byDay.entries()]
    .sort(([a], [b]) => (a < b ? 1 : a > b ? -1 : 0))
    .map(([day, amount]) => ({ date: format(parseISO(day), "dd.MM.yyyy"), amount }));
}

export interface ProjectOverview {
  project: ProjectEntity;
  transactions: TransactionEntity[];
  photos: ProgressPhotoEntity[];
  report: ProjectReport;
}

export async function loadProjectOverview(db: Db, projectId: number): Promise<ProjectOverview | null> {
  const project = await getProject(db, projectId);
  if (!project) {
    return null;
  }

  const [transactions, photos] = await Promise.all([
    listProjectTransactions(db, projectId),
    listProjectPhotos(db, projectId),
  ]);

  return {
    project,
    transactions,
    photos,
    report: buildProjectReport(project, transactions, photos),
  };
}

export async function loadProjectReport(db: Db, projectId: number): Promise<ProjectReport | null> {
  const overview = await loadProjectOverview(db, projectId);
  return overview?.report ?? null;
}
