import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { DatabaseHandle } from "@/lib/db/client";
import { listProjectChangeOrders } from "@/lib/repository/change-orders";
import { getTransaction } from "@/lib/repository/transactions";
import {
  approveChangeOrder,
  listChangeOrders,
  rejectChangeOrder,
  requestExpenseApproval,
} from "@/lib/services/approvals";
import type { ProjectEntity, UserEntity } from "@/types/domain";
import { createTestDatabase, seedProject, seedUser } from "./helpers";

describe("change order workflow", () => {
  let handle: DatabaseHandle;
  let foreman: UserEntity;
  let client: UserEntity;
  let project: ProjectEntity;

  beforeEach(async () => {
    handle = createTestDatabase();
    foreman = await seedUser(handle.db, 100, "Иван", "foreman");
    client = await seedUser(handle.db, 200, "Ольга", "client");
    project = await seedProject(handle.db, foreman);
  });

  afterEach(() => {
    handle.close();
  });

  const request = () =>
    requestExpenseApproval(handle.db, {
      projectId: project.id,
      amount: 4200,
      category: "labor",
      description: "Демонтаж перегородок",
      requesterId: foreman.id,
    });

  it("stores the expense as pending together with its change order", async () => {
    const { transaction, changeOrder } = await request();

    expect(transaction).toMatchObject({
      projectId: project.id,
      amount: 4200,
      category: "labor",
      status: "pending",
      createdById: foreman.id,
    });
    expect(changeOrder).toMatchObject({
      transactionId: transaction.id,
      requestedById: foreman.id,
      status: "pending",
      approvedById: null,
      rejectionReason: null,
    });
  });

  it("approval by another user settles both rows", async () => {
    const { transaction, changeOrder } = await request();

    const outcome = await approveChangeOrder(handle.db, changeOrder.id, client.id);

    expect(outcome.status).toBe("resolved");
    if (outcome.status !== "resolved") return;
    expect(outcome.order.status).toBe("approved");
    expect(outcome.order.approvedById).toBe(client.id);
    expect(outcome.order.approver?.name).toBe("Ольга");
    expect(outcome.order.requester?.name).toBe("Иван");
    expect((await getTransaction(handle.db, transaction.id))?.status).toBe("approved");
  });

  it("refuses to resolve an order twice", async () => {
    const { changeOrder } = await request();
    await approveChangeOrder(handle.db, changeOrder.id, client.id);

    const again = await approveChangeOrder(handle.db, changeOrder.id, client.id);
    const reject = await rejectChangeOrder(handle.db, changeOrder.id, client.id, "quality");

    expect(again.status).toBe("already_resolved");
    expect(reject.status).toBe("already_resolved");
    if (reject.status !== "already_resolved") return;
    expect(reject.order.status).toBe("approved");
    expect(reject.order.rejectionReason).toBeNull();
  });

  it("records the rejection reason text", async () => {
    const { transaction, changeOrder } = await request();

    const outcome = await rejectChangeOrder(handle.db, changeOrder.id, client.id, "budget");

    expect(outcome.status).toBe("resolved");
    if (outcome.status !== "resolved") return;
    expect(outcome.order.status).toBe("rejected");
    expect(outcome.order.rejectionReason).toBe("Превышен бюджет");
    expect(outcome.order.approvedById).toBe(client.id);
    expect((await getTransaction(handle.db, transaction.id))?.status).toBe("rejected");
  });

  it("does not let the requester review their own order", async () => {
    const { transaction, changeOrder } = await request();

    const outcome = await approveChangeOrder(handle.db, changeOrder.id, foreman.id);

    expect(outcome.status).toBe("self_review");
    expect((await getTransaction(handle.db, transaction.id))?.status).toBe("pending");
  });

  it("reports unknown orders", async () => {
    expect(await approveChangeOrder(handle.db, 999, client.id)).toEqual({ status: "not_found" });
    expect(await rejectChangeOrder(handle.db, 999, client.id, "other")).toEqual({ status: "not_found" });
  });

  it("lists orders by status, newest first", async () => {
    const first = await request();
    const second = await request();
    await rejectChangeOrder(handle.db, first.changeOrder.id, client.id, "other");

    const pending = await listChangeOrders(handle.db, "pending");
    const rejected = await listChangeOrders(handle.db, "rejected");

    expect(pending.map((order) => order.id)).toEqual([second.changeOrder.id]);
    expect(pending[0]?.transaction.amount).toBe(4200);
    expect(rejected.map((order) => order.id)).toEqual([first.changeOrder.id]);
    expect(rejected[0]?.rejectionReason).toBe("Другое");
    expect(await listChangeOrders(handle.db, "approved")).toEqual([]);
    expect((await listProjectChangeOrders(handle.db, project.id)).map((order) => order.id)).toEqual([
      second.changeOrder.id,
      first.changeOrder.id,
    ]);
  });
});
