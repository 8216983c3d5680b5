import type {
  changeOrders,
  progressPhotos,
  projects,
  tasks,
  transactions,
  users,
} from "@/lib/db/schema";

export const USER_ROLES = ["admin", "foreman", "client"] as const;
export type UserRole = (typeof USER_ROLES)[number];

export const TRANSACTION_CATEGORIES = ["materials", "labor", "other"] as const;
export type TransactionCategory = (typeof TRANSACTION_CATEGORIES)[number];

export const PROJECT_STAGES = ["draft", "electric", "finish"] as const;
export type ProjectStage = (typeof PROJECT_STAGES)[number];

export const CHANGE_ORDER_STATUSES = ["pending", "approved", "rejected"] as const;
export type ChangeOrderStatus = (typeof CHANGE_ORDER_STATUSES)[number];
export type TransactionStatus = ChangeOrderStatus;

export const REJECTION_REASONS = {
  budget: "Превышен бюджет",
  quality: "Плохое качество",
  other: "Другое",
} as const;
export type RejectionReasonCode = keyof typeof REJECTION_REASONS;

export type UserEntity = typeof users.$inferSelect;
export type ProjectEntity = typeof projects.$inferSelect;
export type TransactionEntity = typeof transactions.$inferSelect;
export type ProgressPhotoEntity = typeof progressPhotos.$inferSelect;
export type ChangeOrderEntity = typeof changeOrders.$inferSelect;
export type TaskEntity = typeof tasks.$inferSelect;

export interface ChangeOrderDetail extends ChangeOrderEntity {
  transaction: TransactionEntity;
  requester: UserEntity | null;
  approver: UserEntity | null;
}

export interface TaskDetail extends TaskEntity {
  projectName: string;
}

export type CategoryTotals = Record<TransactionCategory, number>;
export type StageCounts = Record<ProjectStage, number>;

export interface ProjectReport {
  projectId: number;
  name: string;
  address: string;
  createdAt: string;
  budgetPlan: number;
  budgetSpent: number;
  budgetRemaining: number;
  percentUsed: number;
  transactionsCount: number;
  photosCount: number;
}

export interface ExpenseHistory {
  entries: TransactionEntity[];
  total: number;
}

export interface DailyExpense {
  date: string;
  amount: number;
}
