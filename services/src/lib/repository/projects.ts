import { desc, eq } from "drizzle-orm";

import type { Db } from "@/lib/db/client";
import { projects } from "@/lib/db/schema";
import type { ProjectEntity } from "@/types/domain";

export interface CreateProjectInput {
  name: string;
  address: string;
  budget: number;
  ownerId: number;
}

export async function createProject(db: Db, input: CreateProjectInput): Promise<ProjectEntity> {
  return db
    .insert(projects)
    .values({ ...input, createdAt: new Date().toISOString() })
    .returning()
    .get();
}

export async function getProject(db: Db, projectId: number): Promise<ProjectEntity | null> {
  return db.select().from(projects).where(eq(projects.id, projectId)).get() ?? null;
}

export async function listProjectsForOwner(db: Db, ownerId: number): Promise<ProjectEntity[]> {
  return db
    .select()
    .from(projects)
    .where(eq(projects.ownerId, ownerId))
    .orderBy(desc(projects.createdAt), desc(projects.id))
    .all();
}

/** Replaces the budget; resolves false when the project does not exist. */
export async function updateProjectBudget(db: Db, projectId: number, budget: number): Promise<boolean> {
  const updated = db
    .update(projects)
    .set({ budget })
    .where(eq(projects.id, projectId))
    .returning({ id: projects.id })
    .get();
  return updated !== undefined;
}
