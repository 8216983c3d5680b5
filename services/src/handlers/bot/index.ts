import { NotFoundError } from "@/lib/errors";
import { describeError, logger } from "@/lib/logger";
import { alert, respond, sendMessage, type BotResponse } from "@/lib/response";
import { listProjectsForOwner } from "@/lib/repository/projects";
import { getOrCreateUser, getUserByTelegramId } from "@/lib/repository/users";
import { describeState, IDLE, inStep, type DialogState } from "@/types/dialog";
import type { BotAction, InboundEvent, Keyboard, Sender } from "@/types/bot";
import { decodeAction } from "@/handlers/bot/actions";
import {
  approve,
  chooseRejectionReason,
  showApproval,
  showApprovalList,
  showApprovalsMenu,
  startRejection,
} from "@/handlers/bot/approvals";
import { mainMenu, staleAction, type BotServices, type DialogContext } from "@/handlers/bot/context";
import {
  cancelExpense,
  confirmExpense,
  onExpenseAmountText,
  onExpenseDescriptionText,
  requestApproval,
  selectCategory,
  SKIP_DESCRIPTION,
} from "@/handlers/bot/expenses";
import { exportProject, showExportFormats } from "@/handlers/bot/export";
import {
  approvalsMenuKeyboard,
  categoryKeyboard,
  expenseConfirmKeyboard,
  finishPhotosKeyboard,
  mainMenuKeyboard,
  projectsKeyboard,
  rejectionReasonKeyboard,
  roleKeyboard,
  settingsKeyboard,
  stageKeyboard,
  tasksMenuKeyboard,
  voiceConfirmKeyboard,
} from "@/handlers/bot/keyboards";
import { finishPhotos, onPhoto, selectStage } from "@/handlers/bot/photos";
import {
  onBudgetText,
  onCreateProjectText,
  selectProject,
  showDailyExpenses,
  showDetails,
  showExpenseStats,
  showGallery,
  showHistory,
  showProgressStats,
  showReport,
  startBudgetUpdate,
  startExpense,
  startPhotoUpload,
} from "@/handlers/bot/projects";
import { changeRole, handleCancel, handleHelp, handleStart, handleStatus, openMenu, selectRole, showAbout } from "@/handlers/bot/start";
import {
  markTaskCompleted,
  onTaskDescriptionText,
  onTaskTitleText,
  removeTask,
  selectTaskProject,
  showTask,
  showTasks,
  showTasksMenu,
  startTaskCreation,
} from "@/handlers/bot/tasks";
import {
  FALLBACK_TEXT,
  GENERIC_FAILURE_TEXT,
  PROJECT_NOT_FOUND_TEXT,
  REGISTER_FIRST_TEXT,
  SKIP_UNAVAILABLE_TEXT,
  STALE_ACTION_TEXT,
  USE_BUTTONS_TEXT,
} from "@/handlers/bot/texts";
import { cancelVoice, confirmVoiceExpense, onVoice, selectVoiceProject } from "@/handlers/bot/voice";

export interface UpdateRequest {
  event: InboundEvent;
  from: Sender;
  state: DialogState;
  services: BotServices;
}

const NOT_FOUND_TEXTS: Record<string, string> = {
  project: PROJECT_NOT_FOUND_TEXT,
  task: "❌ Задача не найдена",
  changeOrder: "❌ Запрос не найден",
  user: REGISTER_FIRST_TEXT,
};

function runAction(ctx: DialogContext, action: BotAction): Promise<BotResponse> {
  switch (action.type) {
    case "mainMenu":
      return Promise.resolve(mainMenu(ctx));
    case "menu":
      return openMenu(ctx, action.item);
    case "selectRole":
      return selectRole(ctx, action.role);
    case "selectProject":
      return selectProject(ctx, action.projectId);
    case "projectDetails":
      return showDetails(ctx, action.projectId);
    case "projectAddExpense":
      return startExpense(ctx, action.projectId);
    case "projectAddPhoto":
      return startPhotoUpload(ctx, action.projectId);
    case "projectReport":
      return showReport(ctx, action.projectId);
    case "expenseStats":
      return showExpenseStats(ctx, action.projectId);
    case "progressStats":
      return showProgressStats(ctx, action.projectId);
    case "expenseHistory":
      return showHistory(ctx, action.projectId);
    case "dailyExpenses":
      return showDailyExpenses(ctx, action.projectId);
    case "gallery":
      return showGallery(ctx, action.projectId, action.index);
    case "updateBudget":
      return startBudgetUpdate(ctx, action.projectId);
    case "exportProject":
      return showExportFormats(ctx, action.projectId);
    case "exportFull":
      return exportProject(ctx, action.projectId, "full");
    case "exportSummary":
      return exportProject(ctx, action.projectId, "summary");
    case "selectCategory":
      return selectCategory(ctx, action.category);
    case "confirmExpense":
      return confirmExpense(ctx);
    case "requestApproval":
      return requestApproval(ctx);
    case "cancelExpense":
      return cancelExpense(ctx);
    case "selectStage":
      return selectStage(ctx, action.stage);
    case "finishPhotos":
      return finishPhotos(ctx);
    case "settingsChangeRole":
      return changeRole(ctx);
    case "settingsAbout":
      return showAbout(ctx);
    case "tasksMine":
      return showTasks(ctx, false);
    case "tasksCompleted":
      return showTasks(ctx, true);
    case "tasksCreate":
      return startTaskCreation(ctx);
    case "tasksBack":
      return showTasksMenu(ctx);
    case "taskProject":
      return selectTaskProject(ctx, action.projectId);
    case "taskView":
      return showTask(ctx, action.taskId);
    case "taskComplete":
      return markTaskCompleted(ctx, action.taskId);
    case "taskDelete":
      return removeTask(ctx, action.taskId);
    case "approvalsList":
      return showApprovalList(ctx, action.status);
    case "approvalsBack":
      return showApprovalsMenu(ctx);
    case "viewApproval":
      return showApproval(ctx, action.changeOrderId);
    case "approve":
      return approve(ctx, action.changeOrderId);
    case "reject":
      return startRejection(ctx, action.changeOrderId);
    case "rejectReason":
      return chooseRejectionReason(ctx, action.reason);
    case "voiceConfirm":
      return confirmVoiceExpense(ctx);
    case "voiceCancel":
      return cancelVoice(ctx);
    case "voiceProject":
      return selectVoiceProject(ctx, action.projectId);
  }
}

/** Keyboard to repeat when free text arrives during a button-driven step. */
async function selectionKeyboard(ctx: DialogContext): Promise<Keyboard> {
  const { state } = ctx;
  switch (state.flow) {
    case "registration":
      return roleKeyboard();
    case "settings":
      return state.step === "role" ? roleKeyboard() : settingsKeyboard();
    case "expense":
      if (state.step === "category") return categoryKeyboard();
      if (state.step === "confirm") return expenseConfirmKeyboard();
      break;
    case "photo":
      if (state.step === "stage") return stageKeyboard();
      if (state.step === "upload") return finishPhotosKeyboard();
      break;
    case "voice":
      if (state.step === "confirm") return voiceConfirmKeyboard();
      break;
    case "task":
      if (state.step === "menu" || state.step === "list") return tasksMenuKeyboard();
      break;
    case "approval":
      if (state.step === "reason") return rejectionReasonKeyboard();
      return approvalsMenuKeyboard();
    default:
      break;
  }

  if ("step" in state && state.step === "project") {
    const projects = await listProjectsForOwner(ctx.services.db, ctx.user.id);
    const toAction = (projectId: number): BotAction =>
      state.flow === "task"
        ? { type: "taskProject", projectId }
        : state.flow === "voice"
          ? { type: "voiceProject", projectId }
          : { type: "selectProject", projectId };
    return projectsKeyboard(projects, toAction);
  }
  return mainMenuKeyboard();
}

async function reprompt(ctx: DialogContext, text = USE_BUTTONS_TEXT): Promise<BotResponse> {
  return respond(ctx.state, sendMessage(text, await selectionKeyboard(ctx)));
}

async function routeText(ctx: DialogContext, text: string): Promise<BotResponse> {
  const { state } = ctx;
  switch (state.flow) {
    case "idle":
      return respond(state, sendMessage(FALLBACK_TEXT, mainMenuKeyboard()));
    case "createProject":
      return onCreateProjectText(ctx, state, text);
    case "budget":
      return onBudgetText(ctx, state, text);
    case "expense":
      if (state.step === "amount") return onExpenseAmountText(ctx, state, text);
      if (state.step === "description") return onExpenseDescriptionText(ctx, state, text);
      return reprompt(ctx);
    case "task":
      if (state.step === "title") return onTaskTitleText(ctx, state, text);
      if (state.step === "description") return onTaskDescriptionText(ctx, state, text);
      return reprompt(ctx);
    case "photo":
      return state.step === "upload"
        ? reprompt(ctx, "📸 Отправьте фото или нажмите «Завершить загрузку».")
        : reprompt(ctx);
    case "voice":
      return state.step === "audio" ? respond(state, sendMessage("🎤 Отправьте голосовое сообщение.")) : reprompt(ctx);
    default:
      return reprompt(ctx);
  }
}

async function routeCommand(ctx: DialogContext, command: string): Promise<BotResponse> {
  switch (command) {
    case "help":
      return handleHelp(ctx);
    case "status":
      return handleStatus(ctx);
    case "cancel":
      return handleCancel(ctx);
    case "menu":
      return mainMenu(ctx);
    case "skip":
      // Only descriptions are optional.
      if (inStep(ctx.state, "expense", "description") || inStep(ctx.state, "task", "description")) {
        return routeText(ctx, SKIP_DESCRIPTION);
      }
      return reprompt(ctx, SKIP_UNAVAILABLE_TEXT);
    default:
      return respond(ctx.state, sendMessage(FALLBACK_TEXT, mainMenuKeyboard()));
  }
}

async function route(ctx: DialogContext): Promise<BotResponse> {
  const { event } = ctx;
  switch (event.kind) {
    case "command":
      return routeCommand(ctx, event.command);
    case "text":
      return routeText(ctx, event.text.trim());
    case "callback": {
      const action = decodeAction(event.data);
      if (!action) {
        logger.warn("Unknown callback data", { data: event.data, userId: ctx.user.id });
        return staleAction(ctx);
      }
      logger.debug("Resolved action", { action: action.type, step: describeState(ctx.state) });
      return runAction(ctx, action);
    }
    case "photo":
      return onPhoto(ctx, event.fileId);
    case "voice":
      return onVoice(ctx, event.fileId, event.fileUniqueId);
    case "other":
      return respond(ctx.state, sendMessage(FALLBACK_TEXT, mainMenuKeyboard()));
  }
}

/**
 * Resolves one inbound event against the sender's dialog position. Never
 * throws: missing records unwind to the main menu and other failures leave
 * the dialog on the step that failed.
 */
export async function handleUpdate(request: UpdateRequest): Promise<BotResponse> {
  const { event, from, state, services } = request;
  logger.info("Handling update", { kind: event.kind, telegramId: from.telegramId, step: describeState(state) });

  let ctx: DialogContext | null = null;
  try {
    if (event.kind === "command" && event.command === "start") {
      const { user, created } = await getOrCreateUser(services.db, from.telegramId, from.name);
      if (created) {
        logger.info("User registered", { userId: user.id, telegramId: from.telegramId });
      }
      return await handleStart({ event, from, user, state, services }, created);
    }

    const user = await getUserByTelegramId(services.db, from.telegramId);
    if (!user) {
      return respond(IDLE, sendMessage(REGISTER_FIRST_TEXT));
    }
    ctx = { event, from, user, state, services };
    return await route(ctx);
  } catch (error) {
    if (error instanceof NotFoundError) {
      logger.warn("Referenced record not found", { entity: error.entity, id: error.id, telegramId: from.telegramId });
      const text = NOT_FOUND_TEXTS[error.entity] ?? STALE_ACTION_TEXT;
      if (!ctx) {
        return respond(IDLE, sendMessage(text));
      }
      if (event.kind === "callback") {
        return respond(IDLE, alert(text), ...mainMenu(ctx).replies);
      }
      return mainMenu(ctx, text);
    }

    logger.error("Update handling failed", {
      kind: event.kind,
      telegramId: from.telegramId,
      step: describeState(state),
      ...describeError(error),
    });
    return respond(state, sendMessage(GENERIC_FAILURE_TEXT));
  }
}
