import { formatChangeOrderDetail, formatChangeOrderLine, formatChangeOrderStatus } from "@/lib/format";
import { NotFoundError } from "@/lib/errors";
import { alert, respond, type BotResponse } from "@/lib/response";
import { getChangeOrder } from "@/lib/repository/change-orders";
import {
  approveChangeOrder,
  listChangeOrders,
  rejectChangeOrder,
  type ResolutionOutcome,
} from "@/lib/services/approvals";
import { IDLE, inStep } from "@/types/dialog";
import type { ChangeOrderDetail, ChangeOrderStatus, RejectionReasonCode } from "@/types/domain";
import { screen, staleAction, type DialogContext } from "@/handlers/bot/context";
import {
  approvalListKeyboard,
  approvalsMenuKeyboard,
  rejectionReasonKeyboard,
  reviewKeyboard,
} from "@/handlers/bot/keyboards";

const LIST_TITLES: Record<ChangeOrderStatus, string> = {
  pending: "⏳ <b>Ожидают согласования</b>",
  approved: "✅ <b>Одобренные запросы</b>",
  rejected: "❌ <b>Отклоненные запросы</b>",
};

const SELF_REVIEW_TEXT = "⛔ Нельзя согласовать собственный запрос";

async function requireChangeOrder(ctx: DialogContext, changeOrderId: number): Promise<ChangeOrderDetail> {
  const order = await getChangeOrder(ctx.services.db, changeOrderId);
  if (!order) {
    throw new NotFoundError("changeOrder", changeOrderId);
  }
  return order;
}

export async function showApprovalsMenu(ctx: DialogContext): Promise<BotResponse> {
  return respond(
    { flow: "approval", step: "menu" },
    screen(ctx, "✅ <b>Согласования</b>\n\nВыберите раздел:", approvalsMenuKeyboard())
  );
}

export async function showApprovalList(ctx: DialogContext, status: ChangeOrderStatus): Promise<BotResponse> {
  const orders = await listChangeOrders(ctx.services.db, status);
  const text =
    orders.length === 0
      ? `${LIST_TITLES[status]}\n\n📭 Запросов нет`
      : `${LIST_TITLES[status]} (${orders.length})\n\n${orders.map(formatChangeOrderLine).join("\n\n")}`;
  return respond({ flow: "approval", step: "list", status }, screen(ctx, text, approvalListKeyboard(orders)));
}

export async function showApproval(ctx: DialogContext, changeOrderId: number): Promise<BotResponse> {
  const order = await requireChangeOrder(ctx, changeOrderId);
  return respond(
    { flow: "approval", step: "review", changeOrderId: order.id },
    screen(ctx, formatChangeOrderDetail(order), reviewKeyboard(order))
  );
}

function outcomeResponse(ctx: DialogContext, changeOrderId: number, outcome: ResolutionOutcome): BotResponse {
  switch (outcome.status) {
    case "not_found":
      throw new NotFoundError("changeOrder", changeOrderId);
    case "self_review":
      return respond(ctx.state, alert(SELF_REVIEW_TEXT));
    case "already_resolved":
      return respond(
        IDLE,
        alert(`⚠️ Запрос уже обработан: ${formatChangeOrderStatus(outcome.order.status)}`),
        screen(ctx, formatChangeOrderDetail(outcome.order), reviewKeyboard(outcome.order))
      );
    case "resolved":
      return respond(
        IDLE,
        alert(formatChangeOrderStatus(outcome.order.status), false),
        screen(ctx, formatChangeOrderDetail(outcome.order), reviewKeyboard(outcome.order))
      );
  }
}

export async function approve(ctx: DialogContext, changeOrderId: number): Promise<BotResponse> {
  const outcome = await approveChangeOrder(ctx.services.db, changeOrderId, ctx.user.id);
  return outcomeResponse(ctx, changeOrderId, outcome);
}

/** Opens the reason picker; the order is only changed once a reason is chosen. */
export async function startRejection(ctx: DialogContext, changeOrderId: number): Promise<BotResponse> {
  const order = await requireChangeOrder(ctx, changeOrderId);
  if (order.status !== "pending") {
    return outcomeResponse(ctx, changeOrderId, { status: "already_resolved", order });
  }
  if (order.requestedById === ctx.user.id) {
    return outcomeResponse(ctx, changeOrderId, { status: "self_review", order });
  }
  return respond(
    { flow: "approval", step: "reason", changeOrderId: order.id },
    screen(ctx, `❗ <b>Отклонение запроса #${order.id}</b>\n\nВыберите причину:`, rejectionReasonKeyboard())
  );
}

export async function chooseRejectionReason(
  ctx: DialogContext,
  reason: RejectionReasonCode | "cancel"
): Promise<BotResponse> {
  const { state } = ctx;
  if (!inStep(state, "approval", "reason")) {
    return staleAction(ctx);
  }
  if (reason === "cancel") {
    return showApproval(ctx, state.changeOrderId);
  }
  const outcome = await rejectChangeOrder(ctx.services.db, state.changeOrderId, ctx.user.id, reason);
  return outcomeResponse(ctx, state.changeOrderId, outcome);
}
