import {
  formatDailyExpenses,
  formatExpenseHistory,
  formatExpenseStatistics,
  formatPhotoCaption,
  formatPrice,
  formatProgressStats,
  formatProjectHeader,
  formatProjectReport,
  escapeHtml,
} from "@/lib/format";
import { NotFoundError } from "@/lib/errors";
import { logger } from "@/lib/logger";
import { errorResponse, respond, sendMessage, type BotResponse } from "@/lib/response";
import { createProject, updateProjectBudget } from "@/lib/repository/projects";
import {
  buildCategoryTotals,
  buildDailyExpenses,
  buildExpenseHistory,
  buildStageCounts,
  loadProjectOverview,
  type ProjectOverview,
} from "@/lib/services/reports";
import { isValidProjectAddress, isValidProjectName, parseAmount } from "@/lib/validation";
import { IDLE, type DialogStep } from "@/types/dialog";
import type { Reply } from "@/types/bot";
import { mainMenu, requireProject, screen, staleAction, type DialogContext } from "@/handlers/bot/context";
import {
  backToProjectKeyboard,
  cancelInputKeyboard,
  galleryKeyboard,
  projectActionsKeyboard,
  projectDetailsKeyboard,
  stageKeyboard,
} from "@/handlers/bot/keyboards";
import { showExportFormats } from "@/handlers/bot/export";
import { PROJECT_NOT_FOUND_TEXT } from "@/handlers/bot/texts";

const INVALID_AMOUNT_TEXT = "❌ Неверная сумма. Введите число больше 0 и не более 999 999.99 (например, 1250.50):";

async function requireOverview(ctx: DialogContext, projectId: number): Promise<ProjectOverview> {
  await requireProject(ctx, projectId);
  const overview = await loadProjectOverview(ctx.services.db, projectId);
  if (!overview) {
    throw new NotFoundError("project", projectId);
  }
  return overview;
}

/** A project was picked from a list; what follows depends on the flow that listed it. */
export async function selectProject(ctx: DialogContext, projectId: number): Promise<BotResponse> {
  const { state } = ctx;
  if (!("step" in state) || state.step !== "project") {
    return staleAction(ctx);
  }

  switch (state.flow) {
    case "browseProjects": {
      const project = await requireProject(ctx, projectId);
      return respond(IDLE, screen(ctx, formatProjectHeader(project), projectActionsKeyboard(project.id)));
    }
    case "expense":
      return startExpense(ctx, projectId);
    case "photo":
      return startPhotoUpload(ctx, projectId);
    case "report":
      return showReport(ctx, projectId);
    case "export":
      return showExportFormats(ctx, projectId);
    default:
      return staleAction(ctx);
  }
}

export async function startExpense(ctx: DialogContext, projectId: number): Promise<BotResponse> {
  const project = await requireProject(ctx, projectId);
  return respond(
    { flow: "expense", step: "amount", projectId: project.id },
    screen(ctx, `💰 <b>${escapeHtml(project.name)}</b>\n\nВведите сумму расхода (BYN):`, cancelInputKeyboard())
  );
}

export async function startPhotoUpload(ctx: DialogContext, projectId: number): Promise<BotResponse> {
  const project = await requireProject(ctx, projectId);
  return respond(
    { flow: "photo", step: "stage", projectId: project.id },
    screen(ctx, `📸 <b>${escapeHtml(project.name)}</b>\n\nВыберите этап работ:`, stageKeyboard())
  );
}

export async function showReport(ctx: DialogContext, projectId: number): Promise<BotResponse> {
  const { report } = await requireOverview(ctx, projectId);
  return respond(IDLE, screen(ctx, formatProjectReport(report), backToProjectKeyboard(projectId)));
}

export async function showDetails(ctx: DialogContext, projectId: number): Promise<BotResponse> {
  const { report } = await requireOverview(ctx, projectId);
  return respond(IDLE, screen(ctx, formatProjectReport(report), projectDetailsKeyboard(projectId)));
}

export async function showExpenseStats(ctx: DialogContext, projectId: number): Promise<BotResponse> {
  const { transactions } = await requireOverview(ctx, projectId);
  const text = formatExpenseStatistics(buildCategoryTotals(transactions));
  return respond(IDLE, screen(ctx, text, backToProjectKeyboard(projectId)));
}

export async function showProgressStats(ctx: DialogContext, projectId: number): Promise<BotResponse> {
  const { photos } = await requireOverview(ctx, projectId);
  return respond(IDLE, screen(ctx, formatProgressStats(buildStageCounts(photos)), backToProjectKeyboard(projectId)));
}

export async function showHistory(ctx: DialogContext, projectId: number): Promise<BotResponse> {
  const { transactions } = await requireOverview(ctx, projectId);
  return respond(
    IDLE,
    screen(ctx, formatExpenseHistory(buildExpenseHistory(transactions)), backToProjectKeyboard(projectId))
  );
}

export async function showDailyExpenses(ctx: DialogContext, projectId: number): Promise<BotResponse> {
  const { transactions } = await requireOverview(ctx, projectId);
  return respond(IDLE, screen(ctx, formatDailyExpenses(buildDailyExpenses(transactions)), backToProjectKeyboard(projectId)));
}

export async function showGallery(ctx: DialogContext, projectId: number, index: number): Promise<BotResponse> {
  const { photos } = await requireOverview(ctx, projectId);
  if (photos.length === 0) {
    return respond(IDLE, screen(ctx, "📭 Фотографий пока нет", backToProjectKeyboard(projectId)));
  }
  const position = Math.min(Math.max(index, 0), photos.length - 1);
  const photo = photos[position];
  const reply: Reply = {
    kind: "photo",
    fileId: photo.photoId,
    caption: formatPhotoCaption(photo, position, photos.length),
    keyboard: galleryKeyboard(projectId, position, photos.length),
  };
  return respond(IDLE, reply);
}

export async function startBudgetUpdate(ctx: DialogContext, projectId: number): Promise<BotResponse> {
  const project = await requireProject(ctx, projectId);
  return respond(
    { flow: "budget", step: "amount", projectId: project.id },
    screen(
      ctx,
      `💰 Текущий бюджет: ${formatPrice(project.budget)}\n\nВведите новый бюджет (BYN):`,
      cancelInputKeyboard()
    )
  );
}

export async function onBudgetText(
  ctx: DialogContext,
  state: DialogStep<"budget", "amount">,
  text: string
): Promise<BotResponse> {
  const budget = parseAmount(text);
  if (budget === null) {
    return respond(state, sendMessage(INVALID_AMOUNT_TEXT, cancelInputKeyboard()));
  }
  await requireProject(ctx, state.projectId);
  const updated = await updateProjectBudget(ctx.services.db, state.projectId, budget);
  if (!updated) {
    logger.warn("Budget update target vanished", { projectId: state.projectId });
    return mainMenu(ctx, PROJECT_NOT_FOUND_TEXT);
  }
  logger.info("Project budget updated", { projectId: state.projectId, budget });
  return respond(
    IDLE,
    sendMessage(`✅ Бюджет обновлен: ${formatPrice(budget)}`, backToProjectKeyboard(state.projectId))
  );
}

type CreateProjectState =
  | DialogStep<"createProject", "name">
  | DialogStep<"createProject", "address">
  | DialogStep<"createProject", "budget">;

export async function onCreateProjectText(
  ctx: DialogContext,
  state: CreateProjectState,
  text: string
): Promise<BotResponse> {
  switch (state.step) {
    case "name":
      if (!isValidProjectName(text)) {
        return errorResponse(state, "Название должно содержать от 1 до 255 символов. Введите название:");
      }
      return respond(
        { flow: "createProject", step: "address", name: text },
        sendMessage("📍 Введите адрес объекта:", cancelInputKeyboard())
      );
    case "address":
      if (!isValidProjectAddress(text)) {
        return errorResponse(state, "Адрес должен содержать от 5 до 512 символов. Введите адрес:");
      }
      return respond(
        { flow: "createProject", step: "budget", name: state.name, address: text },
        sendMessage("💰 Введите бюджет проекта (BYN):", cancelInputKeyboard())
      );
    case "budget": {
      const budget = parseAmount(text);
      if (budget === null) {
        return respond(state, sendMessage(INVALID_AMOUNT_TEXT, cancelInputKeyboard()));
      }
      const project = await createProject(ctx.services.db, {
        name: state.name,
        address: state.address,
        budget,
        ownerId: ctx.user.id,
      });
      logger.info("Project created", { projectId: project.id, ownerId: ctx.user.id, budget });
      return respond(
        IDLE,
        sendMessage(`✅ <b>Проект создан!</b>\n\n${formatProjectHeader(project)}`, projectActionsKeyboard(project.id))
      );
    }
  }
}
