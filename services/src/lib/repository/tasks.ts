import { and, asc, desc, eq } from "drizzle-orm";

import type { Db } from "@/lib/db/client";
import { projects, tasks } from "@/lib/db/schema";
import type { TaskDetail, TaskEntity } from "@/types/domain";

export interface CreateTaskInput {
  projectId: number;
  title: string;
  description?: string | null;
  assignedToId?: number | null;
  dueDate?: string | null;
}

export async function createTask(db: Db, input: CreateTaskInput): Promise<TaskEntity> {
  const now = new Date().toISOString();
  return db
    .insert(tasks)
    .values({
      projectId: input.projectId,
      title: input.title,
      description: input.description ?? null,
      assignedToId: input.assignedToId ?? null,
      dueDate: input.dueDate ?? null,
      isCompleted: false,
      createdAt: now,
      updatedAt: now,
    })
    .returning()
    .get();
}

export async function getTask(db: Db, taskId: number): Promise<TaskDetail | null> {
  const row = db
    .select({ task: tasks, projectName: projects.name })
    .from(tasks)
    .innerJoin(projects, eq(tasks.projectId, projects.id))
    .where(eq(tasks.id, taskId))
    .get();
  return row ? { ...row.task, projectName: row.projectName } : null;
}

export async function listProjectTasks(
  db: Db,
  projectId: number,
  options: { completedOnly?: boolean } = {}
): Promise<TaskEntity[]> {
  const filter = options.completedOnly
    ? and(eq(tasks.projectId, projectId), eq(tasks.isCompleted, true))
    : eq(tasks.projectId, projectId);
  return db.select().from(tasks).where(filter).orderBy(asc(tasks.createdAt), asc(tasks.id)).all();
}

export async function listAssignedTasks(
  db: Db,
  userId: number,
  options: { completed?: boolean } = {}
): Promise<TaskDetail[]> {
  const completed = options.completed ?? false;
  const rows = db
    .select({ task: tasks, projectName: projects.name })
    .from(tasks)
    .innerJoin(projects, eq(tasks.projectId, projects.id))
    .where(and(eq(tasks.assignedToId, userId), eq(tasks.isCompleted, completed)))
    .orderBy(completed ? desc(tasks.updatedAt) : asc(tasks.createdAt), asc(tasks.id))
    .all();
  return rows.map((row) => ({ ...row.task, projectName: row.projectName }));
}

/** One-way: a completed task stays completed. Resolves null when missing. */
export async function completeTask(db: Db, taskId: number): Promise<TaskEntity | null> {
  const existing = db.select().from(tasks).where(eq(tasks.id, taskId)).get();
  if (!existing) {
    return null;
  }
  if (existing.isCompleted) {
    return existing;
  }
  return (
    db
      .update(tasks)
      .set({ isCompleted: true, updatedAt: new Date().toISOString() })
      .where(eq(tasks.id, taskId))
      .returning()
      .get() ?? null
  );
}

export async function assignTask(db: Db, taskId: number, userId: number | null): Promise<TaskEntity | null> {
  return (
    db
      .update(tasks)
      .set({ assignedToId: userId, updatedAt: new Date().toISOString() })
      .where(eq(tasks.id, taskId))
      .returning()
      .get() ?? null
  );
}

export async function updateTask(
  db: Db,
  taskId: number,
  changes: { title?: string; description?: string | null; dueDate?: string | null }
): Promise<TaskEntity | null> {
  return (
    db
      .update(tasks)
      .set({ ...changes, updatedAt: new Date().toISOString() })
      .where(eq(tasks.id, taskId))
      .returning()
      .get() ?? null
  );
}

export async function deleteTask(db: Db, taskId: number): Promise<boolean> {
  const deleted = db.delete(tasks).where(eq(tasks.id, taskId)).returning({ id: tasks.id }).get();
  return deleted !== undefined;
}
