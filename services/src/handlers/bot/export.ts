import { format } from "date-fns";

import { escapeHtml } from "@/lib/format";
import { logger } from "@/lib/logger";
import { respond, sendMessage, type BotResponse } from "@/lib/response";
import { exportProjectSummary, exportProjectToExcel } from "@/lib/reports/excel";
import { listProjectTransactions } from "@/lib/repository/transactions";
import { IDLE } from "@/types/dialog";
import type { ProjectEntity } from "@/types/domain";
import type { Reply } from "@/types/bot";
import { requireProject, screen, type DialogContext } from "@/handlers/bot/context";
import { backToProjectKeyboard, exportFormatKeyboard } from "@/handlers/bot/keyboards";

export const EXPORT_UNAVAILABLE_TEXT = "❌ Экспорт недоступен. Попробуйте позже.";

type ExportKind = "full" | "summary";

export function exportFileName(kind: ExportKind, project: ProjectEntity, at: Date): string {
  return `${kind === "full" ? "report" : "summary"}_${project.id}_${format(at, "yyyyMMdd_HHmm")}.xlsx`;
}

export async function showExportFormats(ctx: DialogContext, projectId: number): Promise<BotResponse> {
  const project = await requireProject(ctx, projectId);
  return respond(
    IDLE,
    screen(ctx, `📥 <b>Экспорт: ${escapeHtml(project.name)}</b>\n\nВыберите формат:`, exportFormatKeyboard(project.id))
  );
}

export async function exportProject(ctx: DialogContext, projectId: number, kind: ExportKind): Promise<BotResponse> {
  const project = await requireProject(ctx, projectId);
  const transactions = await listProjectTransactions(ctx.services.db, project.id);
  const generatedAt = new Date();
  const data =
    kind === "full"
      ? await exportProjectToExcel(project, transactions, { generatedAt })
      : await exportProjectSummary(project, transactions);

  if (!data) {
    return respond(IDLE, sendMessage(EXPORT_UNAVAILABLE_TEXT, backToProjectKeyboard(project.id)));
  }

  logger.info("Project exported", { projectId: project.id, kind, bytes: data.length });
  const document: Reply = {
    kind: "document",
    fileName: exportFileName(kind, project, generatedAt),
    data,
    caption: `${kind === "full" ? "📊 Отчет" : "📋 Сводка"} по проекту «${escapeHtml(project.name)}»`,
  };
  return respond(IDLE, document);
}
