import { and, desc, eq } from "drizzle-orm";

import type { Db } from "@/lib/db/client";
import { transactions } from "@/lib/db/schema";
import type { TransactionCategory, TransactionEntity, TransactionStatus } from "@/types/domain";

export interface CreateTransactionInput {
  projectId: number;
  amount: number;
  category: TransactionCategory;
  description?: string | null;
  photoUrl?: string | null;
  status?: TransactionStatus;
  createdById?: number | null;
}

export function buildTransactionRow(input: CreateTransactionInput) {
  return {
    projectId: input.projectId,
    amount: input.amount,
    category: input.category,
    description: input.description ?? null,
    photoUrl: input.photoUrl ?? null,
    status: input.status ?? "approved",
    createdById: input.createdById ?? null,
    createdAt: new Date().toISOString(),
  } satisfies typeof transactions.$inferInsert;
}

export async function createTransaction(db: Db, input: CreateTransactionInput): Promise<TransactionEntity> {
  return db.insert(transactions).values(buildTransactionRow(input)).returning().get();
}

export async function getTransaction(db: Db, transactionId: number): Promise<TransactionEntity | null> {
  return db.select().from(transactions).where(eq(transactions.id, transactionId)).get() ?? null;
}

/** Newest first. */
export async function listProjectTransactions(db: Db, projectId: number): Promise<TransactionEntity[]> {
  return db
    .select()
    .from(transactions)
    .where(eq(transactions.projectId, projectId))
    .orderBy(desc(transactions.createdAt), desc(transactions.id))
    .all();
}

export async function listTransactionsByCategory(
  db: Db,
  projectId: number,
  category: TransactionCategory
): Promise<TransactionEntity[]> {
  return db
    .select()
    .from(transactions)
    .where(and(eq(transactions.projectId, projectId), eq(transactions.category, category)))
    .orderBy(desc(transactions.createdAt), desc(transactions.id))
    .all();
}

export async function listRecentTransactions(
  db: Db,
  projectId: number,
  limit: number
): Promise<TransactionEntity[]> {
  return db
    .select()
    .from(transactions)
    .where(eq(transactions.projectId, projectId))
    .orderBy(desc(transactions.createdAt), desc(transactions.id))
    .limit(limit)
    .all();
}

export async function updateTransactionStatus(
  db: Db,
  transactionId: number,
  status: TransactionStatus
): Promise<boolean> {
  const updated = db
    .update(transactions)
    .set({ status })
    .where(eq(transactions.id, transactionId))
    .returning({ id: transactions.id })
    .get();
  return updated !== undefined;
}

export async function deleteTransaction(db: Db, transactionId: number): Promise<boolean> {
  const deleted = db
    .delete(transactions)
    .where(eq(transactions.id, transactionId))
    .returning({ id: transactions.id })
    .get();
  return deleted !== undefined;
}
