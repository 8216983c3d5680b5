import { formatTaskDetail, formatTaskList } from "@/lib/format";
import { NotFoundError } from "@/lib/errors";
import { logger } from "@/lib/logger";
import { alert, respond, sendMessage, type BotResponse } from "@/lib/response";
import { getProject } from "@/lib/repository/projects";
import { completeTask, createTask, deleteTask, getTask, listAssignedTasks } from "@/lib/repository/tasks";
import { isValidTaskTitle } from "@/lib/validation";
import { IDLE, inStep, type DialogStep } from "@/types/dialog";
import type { TaskDetail } from "@/types/domain";
import {
  canManageProject,
  chooseProject,
  requireProject,
  screen,
  staleAction,
  type DialogContext,
} from "@/handlers/bot/context";
import { SKIP_DESCRIPTION } from "@/handlers/bot/expenses";
import { cancelInputKeyboard, taskDetailKeyboard, taskListKeyboard, tasksMenuKeyboard } from "@/handlers/bot/keyboards";

const TASKS_MENU_TEXT = "📋 <b>Задачи</b>\n\nВыберите действие:";

/** Tasks are visible to their assignee and to whoever manages the project. */
async function requireTask(ctx: DialogContext, taskId: number): Promise<TaskDetail> {
  const task = await getTask(ctx.services.db, taskId);
  if (!task) {
    throw new NotFoundError("task", taskId);
  }
  if (task.assignedToId !== ctx.user.id) {
    const project = await getProject(ctx.services.db, task.projectId);
    if (!project || !canManageProject(ctx.user, project)) {
      throw new NotFoundError("task", taskId);
    }
  }
  return task;
}

export async function showTasksMenu(ctx: DialogContext): Promise<BotResponse> {
  return respond({ flow: "task", step: "menu" }, screen(ctx, TASKS_MENU_TEXT, tasksMenuKeyboard()));
}

export async function showTasks(ctx: DialogContext, completed: boolean): Promise<BotResponse> {
  const tasks = await listAssignedTasks(ctx.services.db, ctx.user.id, { completed });
  const title = completed ? "Выполненные задачи" : "Мои задачи";
  return respond({ flow: "task", step: "list" }, screen(ctx, formatTaskList(tasks, title), taskListKeyboard(tasks)));
}

export async function startTaskCreation(ctx: DialogContext): Promise<BotResponse> {
  return respond({ flow: "task", step: "title" }, screen(ctx, "📝 Введите название задачи:", cancelInputKeyboard()));
}

export async function onTaskTitleText(
  ctx: DialogContext,
  state: DialogStep<"task", "title">,
  text: string
): Promise<BotResponse> {
  if (!isValidTaskTitle(text)) {
    return respond(state, sendMessage("❌ Название должно содержать от 1 до 255 символов. Введите название:", cancelInputKeyboard()));
  }
  return respond(
    { flow: "task", step: "description", title: text },
    sendMessage(`📝 Введите описание задачи или «${SKIP_DESCRIPTION}», чтобы пропустить:`, cancelInputKeyboard())
  );
}

export async function onTaskDescriptionText(
  ctx: DialogContext,
  state: DialogStep<"task", "description">,
  text: string
): Promise<BotResponse> {
  const description = text === SKIP_DESCRIPTION || text === "" ? null : text;
  return chooseProject(ctx, { flow: "task", step: "project", title: state.title, description }, (projectId) => ({
    type: "taskProject",
    projectId,
  }));
}

export async function selectTaskProject(ctx: DialogContext, projectId: number): Promise<BotResponse> {
  const { state } = ctx;
  if (!inStep(state, "task", "project")) {
    return staleAction(ctx);
  }
  const project = await requireProject(ctx, projectId);
  const task = await createTask(ctx.services.db, {
    projectId: project.id,
    title: state.title,
    description: state.description,
    assignedToId: ctx.user.id,
  });
  logger.info("Task created", { taskId: task.id, projectId: project.id, assignedToId: ctx.user.id });
  return respond(IDLE, screen(ctx, `✅ Задача создана!\n\n${TASKS_MENU_TEXT}`, tasksMenuKeyboard()));
}

export async function showTask(ctx: DialogContext, taskId: number): Promise<BotResponse> {
  const task = await requireTask(ctx, taskId);
  return respond(ctx.state, screen(ctx, formatTaskDetail(task), taskDetailKeyboard(task)));
}

export async function markTaskCompleted(ctx: DialogContext, taskId: number): Promise<BotResponse> {
  await requireTask(ctx, taskId);
  const completed = await completeTask(ctx.services.db, taskId);
  const task = completed ? await getTask(ctx.services.db, completed.id) : null;
  if (!task) {
    throw new NotFoundError("task", taskId);
  }
  logger.info("Task completed", { taskId });
  return respond(ctx.state, alert("✅ Задача выполнена", false), screen(ctx, formatTaskDetail(task), taskDetailKeyboard(task)));
}

export async function removeTask(ctx: DialogContext, taskId: number): Promise<BotResponse> {
  await requireTask(ctx, taskId);
  if (!(await deleteTask(ctx.services.db, taskId))) {
    throw new NotFoundError("task", taskId);
  }
  logger.info("Task deleted", { taskId });
  return respond({ flow: "task", step: "menu" }, alert("🗑️ Задача удалена", false), screen(ctx, TASKS_MENU_TEXT, tasksMenuKeyboard()));
}
