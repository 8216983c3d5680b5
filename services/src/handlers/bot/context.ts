import type { Db } from "@/lib/db/client";
import { NotFoundError } from "@/lib/errors";
import type { VoiceExpenseService } from "@/lib/openai";
import { alert, editMessage, respond, sendMessage, type BotResponse } from "@/lib/response";
import { getProject, listProjectsForOwner } from "@/lib/repository/projects";
import { IDLE, type DialogState } from "@/types/dialog";
import type { ProjectEntity, UserEntity } from "@/types/domain";
import type { BotAction, InboundEvent, Keyboard, Reply, Sender } from "@/types/bot";
import { backToMenuKeyboard, mainMenuKeyboard, projectsKeyboard } from "@/handlers/bot/keyboards";
import {
  CHOOSE_PROJECT_TEXT,
  MAIN_MENU_TEXT,
  NO_PROJECTS_TEXT,
  STALE_ACTION_TEXT,
} from "@/handlers/bot/texts";

export interface BotServices {
  db: Db;
  /** Null when speech features are not configured. */
  voice: VoiceExpenseService | null;
  downloadFile(fileId: string): Promise<Buffer>;
}

export interface DialogContext {
  event: InboundEvent;
  from: Sender;
  user: UserEntity;
  state: DialogState;
  services: BotServices;
}

/** Edits the message behind a tapped button; anything else gets a fresh message. */
export function screen(ctx: DialogContext, text: string, keyboard?: Keyboard): Reply {
  return ctx.event.kind === "callback" ? editMessage(text, keyboard) : sendMessage(text, keyboard);
}

export function mainMenu(ctx: DialogContext, notice?: string): BotResponse {
  const text = notice ? `${notice}\n\n${MAIN_MENU_TEXT}` : MAIN_MENU_TEXT;
  return respond(IDLE, screen(ctx, text, mainMenuKeyboard()));
}

export function staleAction(ctx: DialogContext): BotResponse {
  return respond(ctx.state, alert(STALE_ACTION_TEXT));
}

export function canManageProject(user: UserEntity, project: ProjectEntity): boolean {
  return project.ownerId === user.id || user.role === "admin";
}

/** Loads a project the user may act on, or throws NotFoundError. */
export async function requireProject(ctx: DialogContext, projectId: number): Promise<ProjectEntity> {
  const project = await getProject(ctx.services.db, projectId);
  if (!project || !canManageProject(ctx.user, project)) {
    throw new NotFoundError("project", projectId);
  }
  return project;
}

/**
 * Lists the user's projects for a selection step. Without projects the
 * dialog returns to idle instead of entering the step.
 */
export async function chooseProject(
  ctx: DialogContext,
  next: DialogState,
  toAction: (projectId: number) => BotAction = (projectId) => ({ type: "selectProject", projectId })
): Promise<BotResponse> {
  const projects = await listProjectsForOwner(ctx.services.db, ctx.user.id);
  if (projects.length === 0) {
    return respond(IDLE, screen(ctx, NO_PROJECTS_TEXT, backToMenuKeyboard()));
  }
  return respond(next, screen(ctx, CHOOSE_PROJECT_TEXT, projectsKeyboard(projects, toAction)));
}
