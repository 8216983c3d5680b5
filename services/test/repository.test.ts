import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createDatabase, resetDatabase, type DatabaseHandle } from "@/lib/db/client";
import { createProgressPhoto, listProjectPhotos, listProjectPhotosByStage } from "@/lib/repository/progress-photos";
import { getProject, listProjectsForOwner, updateProjectBudget } from "@/lib/repository/projects";
import {
  assignTask,
  completeTask,
  createTask,
  deleteTask,
  getTask,
  listAssignedTasks,
  listProjectTasks,
  updateTask,
} from "@/lib/repository/tasks";
import {
  createTransaction,
  deleteTransaction,
  getTransaction,
  listRecentTransactions,
  listTransactionsByCategory,
  updateTransactionStatus,
} from "@/lib/repository/transactions";
import { getOrCreateUser, getUserById, getUserByTelegramId, updateUserRole } from "@/lib/repository/users";
import type { ProjectEntity, UserEntity } from "@/types/domain";
import { createTestDatabase, seedProject, seedUser } from "./helpers";

describe("repositories", () => {
  let handle: DatabaseHandle;
  let owner: UserEntity;
  let project: ProjectEntity;

  beforeEach(async () => {
    handle = createTestDatabase();
    owner = await seedUser(handle.db, 100, "Иван", "foreman");
    project = await seedProject(handle.db, owner);
  });

  afterEach(() => {
    handle.close();
  });

  describe("users", () => {
    it("creates a user once per telegram id", async () => {
      const first = await getOrCreateUser(handle.db, 555, "Пётр");
      const second = await getOrCreateUser(handle.db, 555, "Пётр Иванов");

      expect(first.created).toBe(true);
      expect(first.user.role).toBe("client");
      expect(second.created).toBe(false);
      expect(second.user.id).toBe(first.user.id);
      expect(second.user.name).toBe("Пётр");
      expect((await getUserById(handle.db, first.user.id))?.telegramId).toBe(555);
    });

    it("changes the role", async () => {
      const updated = await updateUserRole(handle.db, owner.id, "client");
      expect(updated?.role).toBe("client");
      expect((await getUserByTelegramId(handle.db, 100))?.role).toBe("client");
      expect(await updateUserRole(handle.db, 999, "admin")).toBeNull();
    });
  });

  describe("projects", () => {
    it("lists only the owner's projects", async () => {
      const other = await seedUser(handle.db, 200, "Ольга", "foreman");
      await seedProject(handle.db, other);

      const owned = await listProjectsForOwner(handle.db, owner.id);
      expect(owned.map((row) => row.id)).toEqual([project.id]);
    });

    it("updates the budget of an existing project only", async () => {
      expect(await updateProjectBudget(handle.db, project.id, 75000)).toBe(true);
      expect((await getProject(handle.db, project.id))?.budget).toBe(75000);
      expect(await updateProjectBudget(handle.db, 999, 75000)).toBe(false);
    });

    it("rejects a non-positive budget at the schema level", async () => {
      await expect(seedProject(handle.db, owner, 0)).rejects.toThrow();
      expect(await listProjectsForOwner(handle.db, owner.id)).toHaveLength(1);
    });
  });

  describe("transactions", () => {
    it("defaults to approved and keeps optional fields null", async () => {
      const created = await createTransaction(handle.db, { projectId: project.id, amount: 99.9, category: "other" });
      expect(created).toMatchObject({
        amount: 99.9,
        category: "other",
        description: null,
        photoUrl: null,
        status: "approved",
        createdById: null,
      });
    });

    it("filters by category and limits recent rows", async () => {
      const first = await createTransaction(handle.db, { projectId: project.id, amount: 10, category: "materials" });
      const second = await createTransaction(handle.db, { projectId: project.id, amount: 20, category: "labor" });
      const third = await createTransaction(handle.db, { projectId: project.id, amount: 30, category: "materials" });

      const materials = await listTransactionsByCategory(handle.db, project.id, "materials");
      expect(materials.map((row) => row.id).sort((a, b) => a - b)).toEqual([first.id, third.id]);

      const recent = await listRecentTransactions(handle.db, project.id, 2);
      expect(recent).toHaveLength(2);
      expect(recent.map((row) => row.id)).not.toContain(first.id);
      expect(recent.map((row) => row.id)).toContain(second.id);
    });

    it("updates the status and deletes", async () => {
      const created = await createTransaction(handle.db, { projectId: project.id, amount: 10, category: "labor" });

      expect(await updateTransactionStatus(handle.db, created.id, "rejected")).toBe(true);
      expect((await getTransaction(handle.db, created.id))?.status).toBe("rejected");
      expect(await deleteTransaction(handle.db, created.id)).toBe(true);
      expect(await getTransaction(handle.db, created.id)).toBeNull();
      expect(await deleteTransaction(handle.db, created.id)).toBe(false);
    });

    it("rejects amounts outside the accepted range", async () => {
      await expect(
        createTransaction(handle.db, { projectId: project.id, amount: 0, category: "labor" })
      ).rejects.toThrow();
      await expect(
        createTransaction(handle.db, { projectId: project.id, amount: 1_000_000, category: "labor" })
      ).rejects.toThrow();
    });
  });

  describe("progress photos", () => {
    it("keeps upload order and filters by stage", async () => {
      const draft = await createProgressPhoto(handle.db, { projectId: project.id, photoId: "file-a", stage: "draft" });
      const finish = await createProgressPhoto(handle.db, { projectId: project.id, photoId: "file-b", stage: "finish" });

      expect((await listProjectPhotos(handle.db, project.id)).map((photo) => photo.id)).toEqual([draft.id, finish.id]);
      expect((await listProjectPhotosByStage(handle.db, project.id, "finish")).map((photo) => photo.photoId)).toEqual([
        "file-b",
      ]);
      expect(await listProjectPhotosByStage(handle.db, project.id, "electric")).toEqual([]);
    });
  });

  describe("tasks", () => {
    it("assigns, edits and completes a task", async () => {
      const task = await createTask(handle.db, { projectId: project.id, title: "Закупить кабель" });
      expect(task.isCompleted).toBe(false);
      expect(task.assignedToId).toBeNull();

      expect((await assignTask(handle.db, task.id, owner.id))?.assignedToId).toBe(owner.id);
      expect((await updateTask(handle.db, task.id, { description: "ВВГ 3x2.5" }))?.description).toBe("ВВГ 3x2.5");

      const detail = await getTask(handle.db, task.id);
      expect(detail?.projectName).toBe("Дом на Лесной");

      expect((await listAssignedTasks(handle.db, owner.id)).map((row) => row.id)).toEqual([task.id]);
      expect(await listAssignedTasks(handle.db, owner.id, { completed: true })).toEqual([]);

      expect((await completeTask(handle.db, task.id))?.isCompleted).toBe(true);
      expect((await completeTask(handle.db, task.id))?.isCompleted).toBe(true);
      expect((await listAssignedTasks(handle.db, owner.id, { completed: true })).map((row) => row.id)).toEqual([
        task.id,
      ]);
      expect(await completeTask(handle.db, 999)).toBeNull();
    });

    it("filters completed project tasks and deletes", async () => {
      const open = await createTask(handle.db, { projectId: project.id, title: "Штукатурка" });
      const done = await createTask(handle.db, { projectId: project.id, title: "Стяжка" });
      await completeTask(handle.db, done.id);

      expect((await listProjectTasks(handle.db, project.id)).map((row) => row.id)).toEqual([open.id, done.id]);
      expect((await listProjectTasks(handle.db, project.id, { completedOnly: true })).map((row) => row.id)).toEqual([
        done.id,
      ]);

      expect(await deleteTask(handle.db, open.id)).toBe(true);
      expect(await getTask(handle.db, open.id)).toBeNull();
      expect(await deleteTask(handle.db, open.id)).toBe(false);
    });
  });
});

describe("resetDatabase", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), "buildtrack-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("drops every row and recreates the schema", async () => {
    const file = path.join(dir, "bot.db");
    const first = createDatabase(file);
    await seedUser(first.db, 100, "Иван", "foreman");
    first.close();

    resetDatabase(file);

    const second = createDatabase(file);
    expect(await getUserByTelegramId(second.db, 100)).toBeNull();
    await seedUser(second.db, 100, "Иван", "foreman");
    expect((await getUserByTelegramId(second.db, 100))?.name).toBe("Иван");
    second.close();
  });
});
