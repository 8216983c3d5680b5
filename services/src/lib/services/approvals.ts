import { eq } from "drizzle-orm";

import type { Db } from "@/lib/db/client";
import { transactions } from "@/lib/db/schema";
import { logger } from "@/lib/logger";
import {
  createChangeOrder,
  getChangeOrder,
  listChangeOrdersByStatus,
  resolveChangeOrder,
} from "@/lib/repository/change-orders";
import { buildTransactionRow, type CreateTransactionInput } from "@/lib/repository/transactions";
import {
  REJECTION_REASONS,
  type ChangeOrderDetail,
  type ChangeOrderEntity,
  type ChangeOrderStatus,
  type RejectionReasonCode,
  type TransactionEntity,
} from "@/types/domain";

export type ResolutionOutcome =
  | { status: "resolved"; order: ChangeOrderDetail }
  | { status: "not_found" }
  | { status: "already_resolved"; order: ChangeOrderDetail }
  | { status: "self_review"; order: ChangeOrderDetail };

export interface ApprovalRequest {
  transaction: TransactionEntity;
  changeOrder: ChangeOrderEntity;
}

/** Inserts a pending expense and its change order in one transaction. */
export async function requestExpenseApproval(
  db: Db,
  input: Omit<CreateTransactionInput, "status" | "createdById"> & { requesterId: number }
): Promise<ApprovalRequest> {
  const { requesterId, ...expense } = input;
  const result = db.transaction((tx) => {
    const transaction = tx
      .insert(transactions)
      .values(buildTransactionRow({ ...expense, status: "pending", createdById: requesterId }))
      .returning()
      .get();
    const changeOrder = createChangeOrder(tx, { transactionId: transaction.id, requestedById: requesterId });
    return { transaction, changeOrder };
  });

  logger.info("Change order requested", {
    changeOrderId: result.changeOrder.id,
    transactionId: result.transaction.id,
    projectId: result.transaction.projectId,
  });
  return result;
}

export async function approveChangeOrder(
  db: Db,
  changeOrderId: number,
  approverId: number
): Promise<ResolutionOutcome> {
  return resolve(db, changeOrderId, approverId, "approved", null);
}

export async function rejectChangeOrder(
  db: Db,
  changeOrderId: number,
  approverId: number,
  reason: RejectionReasonCode
): Promise<ResolutionOutcome> {
  return resolve(db, changeOrderId, approverId, "rejected", REJECTION_REASONS[reason]);
}

export async function listChangeOrders(db: Db, status: ChangeOrderStatus): Promise<ChangeOrderDetail[]> {
  return listChangeOrdersByStatus(db, status);
}

async function resolve(
  db: Db,
  changeOrderId: number,
  approverId: number,
  status: "approved" | "rejected",
  rejectionReason: string | null
): Promise<ResolutionOutcome> {
  const existing = await getChangeOrder(db, changeOrderId);
  if (!existing) {
    return { status: "not_found" };
  }
  if (existing.status !== "pending") {
    return { status: "already_resolved", order: existing };
  }
  if (existing.requestedById === approverId) {
    return { status: "self_review", order: existing };
  }

  const updated = db.transaction((tx) => {
    const order = resolveChangeOrder(tx, changeOrderId, { status, approvedById: approverId, rejectionReason });
    if (!order) {
      return null;
    }
    tx.update(transactions).set({ status }).where(eq(transactions.id, order.transactionId)).run();
    return order;
  });

  const current = await getChangeOrder(db, changeOrderId);
  if (!current) {
    return { status: "not_found" };
  }
  if (!updated) {
    logger.warn("Change order already resolved", { changeOrderId, status: current.status });
    return { status: "already_resolved", order: current };
  }

  logger.info("Change order resolved", { changeOrderId, status, approverId, rejectionReason });
  return { status: "resolved", order: current };
}
