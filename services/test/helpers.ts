import { createDatabase, type Db } from "@/lib/db/client";
import { createProject } from "@/lib/repository/projects";
import { createUser } from "@/lib/repository/users";
import type {
  ProgressPhotoEntity,
  ProjectEntity,
  TransactionEntity,
  UserEntity,
  UserRole,
} from "@/types/domain";

export function createTestDatabase() {
  return createDatabase(":memory:");
}

export function makeProject(overrides: Partial<ProjectEntity> = {}): ProjectEntity {
  return {
    id: 1,
    name: "Дом на Лесной",
    address: "ул. Лесная, 5",
    budget: 50000,
    ownerId: 1,
    createdAt: "2024-03-01T08:00:00",
    ...overrides,
  };
}

export function makeTransaction(overrides: Partial<TransactionEntity> = {}): TransactionEntity {
  return {
    id: 1,
    projectId: 1,
    amount: 100,
    category: "materials",
    description: null,
    photoUrl: null,
    status: "approved",
    createdById: 1,
    createdAt: "2024-03-01T09:00:00",
    ...overrides,
  };
}

export function makePhoto(overrides: Partial<ProgressPhotoEntity> = {}): ProgressPhotoEntity {
  return {
    id: 1,
    projectId: 1,
    photoId: "photo-1",
    stage: "draft",
    createdAt: "2024-03-01T09:00:00",
    ...overrides,
  };
}

export async function seedUser(db: Db, telegramId: number, name: string, role: UserRole): Promise<UserEntity> {
  return createUser(db, { telegramId, name, role });
}

export async function seedProject(db: Db, owner: UserEntity, budget = 50000): Promise<ProjectEntity> {
  return createProject(db, { name: "Дом на Лесной", address: "ул. Лесная, 5", budget, ownerId: owner.id });
}
