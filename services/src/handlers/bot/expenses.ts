import { escapeHtml, formatExpenseSummary } from "@/lib/format";
import { logger } from "@/lib/logger";
import { respond, sendMessage, type BotResponse } from "@/lib/response";
import { createTransaction } from "@/lib/repository/transactions";
import { requestExpenseApproval } from "@/lib/services/approvals";
import { parseAmount } from "@/lib/validation";
import { IDLE, inStep, type DialogStep } from "@/types/dialog";
import type { TransactionCategory } from "@/types/domain";
import { mainMenu, requireProject, screen, staleAction, type DialogContext } from "@/handlers/bot/context";
import {
  backToProjectKeyboard,
  cancelInputKeyboard,
  categoryKeyboard,
  expenseConfirmKeyboard,
} from "@/handlers/bot/keyboards";
import { CANCELLED_TEXT } from "@/handlers/bot/texts";

export const SKIP_DESCRIPTION = "-";

export async function onExpenseAmountText(
  ctx: DialogContext,
  state: DialogStep<"expense", "amount">,
  text: string
): Promise<BotResponse> {
  const amount = parseAmount(text);
  if (amount === null) {
    return respond(
      state,
      sendMessage(
        "❌ Неверная сумма. Введите число больше 0 и не более 999 999.99 (например, 1250.50):",
        cancelInputKeyboard()
      )
    );
  }
  return respond(
    { flow: "expense", step: "category", projectId: state.projectId, amount },
    sendMessage("📂 Выберите категорию расхода:", categoryKeyboard())
  );
}

export async function selectCategory(ctx: DialogContext, category: TransactionCategory): Promise<BotResponse> {
  const { state } = ctx;
  if (!inStep(state, "expense", "category")) {
    return staleAction(ctx);
  }
  return respond(
    { flow: "expense", step: "description", projectId: state.projectId, amount: state.amount, category },
    screen(ctx, `📝 Введите описание расхода или «${SKIP_DESCRIPTION}», чтобы пропустить:`, cancelInputKeyboard())
  );
}

export async function onExpenseDescriptionText(
  ctx: DialogContext,
  state: DialogStep<"expense", "description">,
  text: string
): Promise<BotResponse> {
  const description = text === SKIP_DESCRIPTION || text === "" ? null : text;
  return respond(
    {
      flow: "expense",
      step: "confirm",
      projectId: state.projectId,
      amount: state.amount,
      category: state.category,
      description,
    },
    sendMessage(formatExpenseSummary(state.amount, state.category, description), expenseConfirmKeyboard())
  );
}

export async function confirmExpense(ctx: DialogContext): Promise<BotResponse> {
  const { state } = ctx;
  if (!inStep(state, "expense", "confirm")) {
    return staleAction(ctx);
  }
  const project = await requireProject(ctx, state.projectId);
  const transaction = await createTransaction(ctx.services.db, {
    projectId: project.id,
    amount: state.amount,
    category: state.category,
    description: state.description,
    createdById: ctx.user.id,
  });
  logger.info("Expense recorded", { transactionId: transaction.id, projectId: project.id, amount: transaction.amount });

  const summary = formatExpenseSummary(transaction.amount, transaction.category, transaction.description);
  return respond(
    IDLE,
    screen(ctx, `✅ <b>Расход добавлен!</b>\n\n📦 ${escapeHtml(project.name)}\n${summary}`, backToProjectKeyboard(project.id))
  );
}

export async function requestApproval(ctx: DialogContext): Promise<BotResponse> {
  const { state } = ctx;
  if (!inStep(state, "expense", "confirm")) {
    return staleAction(ctx);
  }
  const project = await requireProject(ctx, state.projectId);
  const { changeOrder } = await requestExpenseApproval(ctx.services.db, {
    projectId: project.id,
    amount: state.amount,
    category: state.category,
    description: state.description,
    requesterId: ctx.user.id,
  });
  return respond(
    IDLE,
    screen(
      ctx,
      `📨 <b>Запрос #${changeOrder.id} отправлен на согласование</b>\n\nРешение примет другой участник в разделе «Согласования».`,
      backToProjectKeyboard(project.id)
    )
  );
}

export async function cancelExpense(ctx: DialogContext): Promise<BotResponse> {
  if (ctx.state.flow !== "expense") {
    return staleAction(ctx);
  }
  return mainMenu(ctx, CANCELLED_TEXT);
}
