import { escapeHtml, formatExpenseSummary } from "@/lib/format";
import { logger, describeError } from "@/lib/logger";
import { respond, sendMessage, type BotResponse } from "@/lib/response";
import { createTransaction } from "@/lib/repository/transactions";
import { IDLE, inStep } from "@/types/dialog";
import { VoiceExpenseError } from "@/types/openai";
import {
  chooseProject,
  mainMenu,
  requireProject,
  screen,
  staleAction,
  type DialogContext,
} from "@/handlers/bot/context";
import { backToMenuKeyboard, backToProjectKeyboard, cancelInputKeyboard, voiceConfirmKeyboard } from "@/handlers/bot/keyboards";
import { CANCELLED_TEXT, VOICE_UNAVAILABLE_TEXT } from "@/handlers/bot/texts";

const NOT_UNDERSTOOD_TEXT =
  "🤔 Не удалось распознать расход. Назовите сумму и на что потрачено, например: «Купил цемент на 250 рублей».";

export async function onVoice(ctx: DialogContext, fileId: string, fileUniqueId: string): Promise<BotResponse> {
  const { state } = ctx;
  if (state.flow !== "idle" && !inStep(state, "voice", "audio")) {
    return respond(state, sendMessage("⚠️ Сначала завершите текущее действие или отправьте /cancel"));
  }
  const { voice } = ctx.services;
  if (!voice) {
    return respond(IDLE, sendMessage(VOICE_UNAVAILABLE_TEXT, backToMenuKeyboard()));
  }

  const audioState = { flow: "voice", step: "audio" } as const;
  try {
    const audio = await ctx.services.downloadFile(fileId);
    const transcript = await voice.transcribe(audio, `${fileUniqueId}.ogg`);
    const expense = await voice.parseExpense(transcript);
    if (!expense) {
      return respond(audioState, sendMessage(NOT_UNDERSTOOD_TEXT, cancelInputKeyboard()));
    }

    const text = [
      `🎤 Распознано: «${escapeHtml(transcript)}»`,
      "",
      formatExpenseSummary(expense.amount, expense.category, expense.description || null),
      `Уверенность: ${Math.round(expense.confidence * 100)}%`,
    ].join("\n");
    return respond({ flow: "voice", step: "confirm", transcript, expense }, sendMessage(text, voiceConfirmKeyboard()));
  } catch (error) {
    if (!(error instanceof VoiceExpenseError)) {
      throw error;
    }
    logger.warn("Voice expense failed", { code: error.code, userId: ctx.user.id, ...describeError(error) });
    return respond(
      audioState,
      sendMessage("❌ Не удалось обработать голосовое сообщение. Попробуйте еще раз.", cancelInputKeyboard())
    );
  }
}

export async function confirmVoiceExpense(ctx: DialogContext): Promise<BotResponse> {
  const { state } = ctx;
  if (!inStep(state, "voice", "confirm")) {
    return staleAction(ctx);
  }
  return chooseProject(
    ctx,
    { flow: "voice", step: "project", transcript: state.transcript, expense: state.expense },
    (projectId) => ({ type: "voiceProject", projectId })
  );
}

export async function selectVoiceProject(ctx: DialogContext, projectId: number): Promise<BotResponse> {
  const { state } = ctx;
  if (!inStep(state, "voice", "project")) {
    return staleAction(ctx);
  }
  const project = await requireProject(ctx, projectId);
  const { expense } = state;
  const transaction = await createTransaction(ctx.services.db, {
    projectId: project.id,
    amount: expense.amount,
    category: expense.category,
    description: expense.description || null,
    createdById: ctx.user.id,
  });
  logger.info("Voice expense recorded", { transactionId: transaction.id, projectId: project.id });

  const summary = formatExpenseSummary(transaction.amount, transaction.category, transaction.description);
  return respond(
    IDLE,
    screen(ctx, `✅ <b>Расход добавлен!</b>\n\n📦 ${escapeHtml(project.name)}\n${summary}`, backToProjectKeyboard(project.id))
  );
}

export async function cancelVoice(ctx: DialogContext): Promise<BotResponse> {
  if (ctx.state.flow !== "voice") {
    return staleAction(ctx);
  }
  return mainMenu(ctx, CANCELLED_TEXT);
}
