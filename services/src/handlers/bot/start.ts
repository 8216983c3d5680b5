import { escapeHtml, formatRole } from "@/lib/format";
import { NotFoundError } from "@/lib/errors";
import { logger } from "@/lib/logger";
import { respond, sendMessage, type BotResponse } from "@/lib/response";
import { updateUserRole } from "@/lib/repository/users";
import { describeState, IDLE, inStep } from "@/types/dialog";
import type { MenuItem, SelectableRole } from "@/types/bot";
import { chooseProject, mainMenu, screen, staleAction, type DialogContext } from "@/handlers/bot/context";
import { showApprovalsMenu } from "@/handlers/bot/approvals";
import { showTasksMenu } from "@/handlers/bot/tasks";
import { backToMenuKeyboard, cancelInputKeyboard, roleKeyboard, settingsKeyboard } from "@/handlers/bot/keyboards";
import { ABOUT_TEXT, CANCELLED_TEXT, HELP_TEXT, ROLE_PROMPT, VOICE_UNAVAILABLE_TEXT } from "@/handlers/bot/texts";

export async function handleStart(ctx: DialogContext, created: boolean): Promise<BotResponse> {
  if (created) {
    return respond({ flow: "registration", step: "role" }, sendMessage(ROLE_PROMPT, roleKeyboard()));
  }
  return mainMenu(ctx, `👋 С возвращением, <b>${escapeHtml(ctx.user.name)}</b>!`);
}

export async function handleHelp(ctx: DialogContext): Promise<BotResponse> {
  return respond(ctx.state, sendMessage(HELP_TEXT));
}

export async function handleStatus(ctx: DialogContext): Promise<BotResponse> {
  const text = [
    `👤 ${escapeHtml(ctx.user.name)}, ${formatRole(ctx.user.role)}`,
    `📍 Текущий шаг: <code>${describeState(ctx.state)}</code>`,
  ].join("\n");
  return respond(ctx.state, sendMessage(text));
}

export async function handleCancel(ctx: DialogContext): Promise<BotResponse> {
  logger.info("Dialog cancelled", { userId: ctx.user.id, step: describeState(ctx.state) });
  return mainMenu(ctx, CANCELLED_TEXT);
}

export async function selectRole(ctx: DialogContext, role: SelectableRole): Promise<BotResponse> {
  if (!inStep(ctx.state, "registration", "role") && !inStep(ctx.state, "settings", "role")) {
    return staleAction(ctx);
  }
  const updated = await updateUserRole(ctx.services.db, ctx.user.id, role);
  if (!updated) {
    throw new NotFoundError("user", ctx.user.id);
  }
  logger.info("User role updated", { userId: updated.id, role });
  return mainMenu(ctx, `✅ Роль установлена: ${formatRole(updated.role)}`);
}

function settingsText(ctx: DialogContext): string {
  return [
    "⚙️ <b>Настройки</b>",
    "",
    `👤 Имя: ${escapeHtml(ctx.user.name)}`,
    `🎭 Роль: ${formatRole(ctx.user.role)}`,
    `🆔 Telegram ID: <code>${ctx.user.telegramId}</code>`,
  ].join("\n");
}

export async function openMenu(ctx: DialogContext, item: MenuItem): Promise<BotResponse> {
  switch (item) {
    case "myProjects":
      return chooseProject(ctx, { flow: "browseProjects", step: "project" });
    case "createProject":
      if (ctx.user.role === "client") {
        return respond(ctx.state, screen(ctx, "⛔ Создавать проекты могут только прорабы.", backToMenuKeyboard()));
      }
      return respond(
        { flow: "createProject", step: "name" },
        screen(ctx, "📝 <b>Новый проект</b>\n\nВведите название проекта:", cancelInputKeyboard())
      );
    case "addExpense":
      return chooseProject(ctx, { flow: "expense", step: "project" });
    case "photoReport":
      return chooseProject(ctx, { flow: "photo", step: "project" });
    case "projectReport":
      return chooseProject(ctx, { flow: "report", step: "project" });
    case "exportExcel":
      return chooseProject(ctx, { flow: "export", step: "project" });
    case "settings":
      return respond({ flow: "settings", step: "menu" }, screen(ctx, settingsText(ctx), settingsKeyboard()));
    case "myTasks":
      return showTasksMenu(ctx);
    case "approvals":
      return showApprovalsMenu(ctx);
    case "voiceInput":
      if (!ctx.services.voice) {
        return respond(IDLE, screen(ctx, VOICE_UNAVAILABLE_TEXT, backToMenuKeyboard()));
      }
      return respond(
        { flow: "voice", step: "audio" },
        screen(
          ctx,
          "🎤 <b>Голосовой ввод</b>\n\nОтправьте голосовое сообщение, например: «Купил цемент на 250 рублей».",
          cancelInputKeyboard()
        )
      );
  }
}

export async function changeRole(ctx: DialogContext): Promise<BotResponse> {
  if (!inStep(ctx.state, "settings", "menu")) {
    return staleAction(ctx);
  }
  return respond({ flow: "settings", step: "role" }, screen(ctx, "🎭 Выберите новую роль:", roleKeyboard()));
}

export async function showAbout(ctx: DialogContext): Promise<BotResponse> {
  if (!inStep(ctx.state, "settings", "menu")) {
    return staleAction(ctx);
  }
  return respond(ctx.state, screen(ctx, ABOUT_TEXT, settingsKeyboard()));
}
