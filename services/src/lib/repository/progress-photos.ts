import { and, asc, eq } from "drizzle-orm";

import type { Db } from "@/lib/db/client";
import { progressPhotos } from "@/lib/db/schema";
import type { ProgressPhotoEntity, ProjectStage } from "@/types/domain";

export async function createProgressPhoto(
  db: Db,
  input: { projectId: number; photoId: string; stage: ProjectStage }
): Promise<ProgressPhotoEntity> {
  return db
    .insert(progressPhotos)
    .values({ ...input, createdAt: new Date().toISOString() })
    .returning()
    .get();
}

/** Upload order, oldest first. */
export async function listProjectPhotos(db: Db, projectId: number): Promise<ProgressPhotoEntity[]> {
  return db
    .select()
    .from(progressPhotos)
    .where(eq(progressPhotos.projectId, projectId))
    .orderBy(asc(progressPhotos.createdAt), asc(progressPhotos.id))
    .all();
}

export async function listProjectPhotosByStage(
  db: Db,
  projectId: number,
  stage: ProjectStage
): Promise<ProgressPhotoEntity[]> {
  return db
    .select()
    .from(progressPhotos)
    .where(and(eq(progressPhotos.projectId, projectId), eq(progressPhotos.stage, stage)))
    .orderBy(asc(progressPhotos.createdAt), asc(progressPhotos.id))
    .all();
}
