import { and, desc, eq, inArray } from "drizzle-orm";

import type { Db } from "@/lib/db/client";
import { changeOrders, transactions, users } from "@/lib/db/schema";
import type {
  ChangeOrderDetail,
  ChangeOrderEntity,
  ChangeOrderStatus,
  UserEntity,
} from "@/types/domain";

export function createChangeOrder(
  db: Db,
  input: { transactionId: number; requestedById: number }
): ChangeOrderEntity {
  const now = new Date().toISOString();
  return db
    .insert(changeOrders)
    .values({
      transactionId: input.transactionId,
      requestedById: input.requestedById,
      status: "pending",
      createdAt: now,
      updatedAt: now,
    })
    .returning()
    .get();
}

export async function getChangeOrder(db: Db, changeOrderId: number): Promise<ChangeOrderDetail | null> {
  const order = db.select().from(changeOrders).where(eq(changeOrders.id, changeOrderId)).get();
  if (!order) {
    return null;
  }
  const [detail] = await attachDetails(db, [order]);
  return detail ?? null;
}

export async function listChangeOrdersByStatus(
  db: Db,
  status: ChangeOrderStatus
): Promise<ChangeOrderDetail[]> {
  const orders = db
    .select()
    .from(changeOrders)
    .where(eq(changeOrders.status, status))
    .orderBy(desc(changeOrders.createdAt), desc(changeOrders.id))
    .all();
  return attachDetails(db, orders);
}

export async function listProjectChangeOrders(db: Db, projectId: number): Promise<ChangeOrderDetail[]> {
  const rows = db
    .select({ order: changeOrders })
    .from(changeOrders)
    .innerJoin(transactions, eq(changeOrders.transactionId, transactions.id))
    .where(eq(transactions.projectId, projectId))
    .orderBy(desc(changeOrders.createdAt), desc(changeOrders.id))
    .all();
  return attachDetails(
    db,
    rows.map((row) => row.order)
  );
}

export interface ResolveChangeOrderInput {
  status: Exclude<ChangeOrderStatus, "pending">;
  approvedById: number;
  rejectionReason?: string | null;
}

/**
 * Moves a pending change order to a terminal status. Resolves null when the
 * order is missing or no longer pending; terminal rows are never rewritten.
 */
export function resolveChangeOrder(
  db: Db,
  changeOrderId: number,
  input: ResolveChangeOrderInput
): ChangeOrderEntity | null {
  const updated = db
    .update(changeOrders)
    .set({
      status: input.status,
      approvedById: input.approvedById,
      rejectionReason: input.status === "rejected" ? input.rejectionReason ?? null : null,
      updatedAt: new Date().toISOString(),
    })
    .where(and(eq(changeOrders.id, changeOrderId), eq(changeOrders.status, "pending")))
    .returning()
    .get();
  return updated ?? null;
}

async function attachDetails(db: Db, orders: ChangeOrderEntity[]): Promise<ChangeOrderDetail[]> {
  if (orders.length === 0) {
    return [];
  }

  const transactionIds = [...new Set(orders.map((order) => order.transactionId))];
  const userIds = [
    ...new Set(
      orders.flatMap((order) => [order.requestedById, order.approvedById]).filter((id): id is number => id !== null)
    ),
  ];

  const transactionRows = db.select().from(transactions).where(inArray(transactions.id, transactionIds)).all();
  const userRows = userIds.length > 0 ? db.select().from(users).where(inArray(users.id, userIds)).all() : [];

  const transactionMap = new Map(transactionRows.map((row) => [row.id, row]));
  const userMap = new Map<number, UserEntity>(userRows.map((row) => [row.id, row]));

  const details: ChangeOrderDetail[] = [];
  for (const order of orders) {
    const transaction = transactionMap.get(order.transactionId);
    if (!transaction) {
      continue;
    }
    details.push({
      ...order,
      transaction,
      requester: order.requestedById !== null ? userMap.get(order.requestedById) ?? null : null,
      approver: order.approvedById !== null ? userMap.get(order.approvedById) ?? null : null,
    });
  }
  return details;
}
