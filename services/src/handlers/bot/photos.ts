import { formatStage } from "@/lib/format";
import { logger } from "@/lib/logger";
import { respond, sendMessage, type BotResponse } from "@/lib/response";
import { createProgressPhoto } from "@/lib/repository/progress-photos";
import { IDLE, inStep } from "@/types/dialog";
import type { ProjectStage } from "@/types/domain";
import { requireProject, screen, staleAction, type DialogContext } from "@/handlers/bot/context";
import { backToProjectKeyboard, finishPhotosKeyboard, mainMenuKeyboard } from "@/handlers/bot/keyboards";

export async function selectStage(ctx: DialogContext, stage: ProjectStage): Promise<BotResponse> {
  const { state } = ctx;
  if (!inStep(state, "photo", "stage")) {
    return staleAction(ctx);
  }
  return respond(
    { flow: "photo", step: "upload", projectId: state.projectId, stage, count: 0 },
    screen(
      ctx,
      `📸 Этап: ${formatStage(stage)}\n\nОтправьте фотографии. Когда закончите, нажмите «Завершить загрузку».`,
      finishPhotosKeyboard()
    )
  );
}

export async function onPhoto(ctx: DialogContext, fileId: string): Promise<BotResponse> {
  const { state } = ctx;
  if (!inStep(state, "photo", "upload")) {
    return respond(
      state,
      sendMessage("📸 Чтобы сохранить фото, выберите «Фотоотчет» в меню.", state.flow === "idle" ? mainMenuKeyboard() : undefined)
    );
  }
  const project = await requireProject(ctx, state.projectId);
  const photo = await createProgressPhoto(ctx.services.db, { projectId: project.id, photoId: fileId, stage: state.stage });
  const count = state.count + 1;
  logger.info("Progress photo saved", { photoId: photo.id, projectId: project.id, stage: photo.stage });
  return respond({ ...state, count }, sendMessage(`✅ Фото ${count} сохранено`, finishPhotosKeyboard()));
}

export async function finishPhotos(ctx: DialogContext): Promise<BotResponse> {
  const { state } = ctx;
  if (!inStep(state, "photo", "upload")) {
    return staleAction(ctx);
  }
  return respond(
    IDLE,
    screen(ctx, `✅ Загрузка завершена. Сохранено фото: ${state.count}`, backToProjectKeyboard(state.projectId))
  );
}
