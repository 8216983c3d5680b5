import { sqliteTable, text, integer, real, index, uniqueIndex } from "drizzle-orm/sqlite-core";

import {
  CHANGE_ORDER_STATUSES,
  PROJECT_STAGES,
  TRANSACTION_CATEGORIES,
  USER_ROLES,
} from "@/types/domain";

export const users = sqliteTable(
  "users",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    telegramId: integer("tg_id").notNull(),
    name: text("name").notNull(),
    role: text("role", { enum: USER_ROLES }).notNull().default("client"),
    createdAt: text("created_at").notNull(),
  },
  (table) => ({
    telegramIdIdx: uniqueIndex("users_tg_id_idx").on(table.telegramId),
  })
);

export const projects = sqliteTable(
  "projects",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    name: text("name").notNull(),
    address: text("address").notNull(),
    budget: real("budget").notNull(),
    ownerId: integer("owner_id")
      .notNull()
      .references(() => users.id, { onDelete: "cascade" }),
    createdAt: text("created_at").notNull(),
  },
  (table) => ({
    ownerIdx: index("projects_owner_id_idx").on(table.ownerId),
  })
);

export const transactions = sqliteTable(
  "transactions",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    projectId: integer("project_id")
      .notNull()
      .references(() => projects.id, { onDelete: "cascade" }),
    amount: real("amount").notNull(),
    category: text("category", { enum: TRANSACTION_CATEGORIES }).notNull(),
    description: text("description"),
    photoUrl: text("photo_url"),
    status: text("status", { enum: CHANGE_ORDER_STATUSES }).notNull().default("approved"),
    createdById: integer("created_by_id").references(() => users.id, { onDelete: "set null" }),
    createdAt: text("created_at").notNull(),
  },
  (table) => ({
    projectIdx: index("transactions_project_id_idx").on(table.projectId),
    createdAtIdx: index("transactions_created_at_idx").on(table.createdAt),
  })
);

export const progressPhotos = sqliteTable(
  "progress_photos",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    projectId: integer("project_id")
      .notNull()
      .references(() => projects.id, { onDelete: "cascade" }),
    photoId: text("photo_id").notNull(),
    stage: text("stage", { enum: PROJECT_STAGES }).notNull(),
    createdAt: text("created_at").notNull(),
  },
  (table) => ({
    projectIdx: index("progress_photos_project_id_idx").on(table.projectId),
  })
);

export const changeOrders = sqliteTable(
  "change_orders",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    transactionId: integer("transaction_id")
      .notNull()
      .references(() => transactions.id, { onDelete: "cascade" }),
    status: text("status", { enum: CHANGE_ORDER_STATUSES }).notNull().default("pending"),
    requestedById: integer("requested_by_id").references(() => users.id, { onDelete: "set null" }),
    approvedById: integer("approved_by_id").references(() => users.id, { onDelete: "set null" }),
    rejectionReason: text("rejection_reason"),
    createdAt: text("created_at").notNull(),
    updatedAt: text("updated_at").notNull(),
  },
  (table) => ({
    transactionIdx: index("change_orders_transaction_id_idx").on(table.transactionId),
    statusIdx: index("change_orders_status_idx").on(table.status),
  })
);

export const tasks = sqliteTable(
  "tasks",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    projectId: integer("project_id")
      .notNull()
      .references(() => projects.id, { onDelete: "cascade" }),
    title: text("title").notNull(),
    description: text("description"),
    isCompleted: integer("is_completed", { mode: "boolean" }).notNull().default(false),
    assignedToId: integer("assigned_to_id").references(() => users.id, { onDelete: "set null" }),
    dueDate: text("due_date"),
    createdAt: text("created_at").notNull(),
    updatedAt: text("updated_at").notNull(),
  },
  (table) => ({
    projectIdx: index("tasks_project_id_idx").on(table.projectId),
    assignedIdx: index("tasks_assigned_to_id_idx").on(table.assignedToId),
  })
);
