import type { ChangeOrderStatus, ProjectStage, RejectionReasonCode, TransactionCategory } from "@/types/domain";

export type MenuItem =
  | "myProjects"
  | "createProject"
  | "addExpense"
  | "photoReport"
  | "projectReport"
  | "settings"
  | "myTasks"
  | "approvals"
  | "voiceInput"
  | "exportExcel";

export type SelectableRole = "foreman" | "client";

/** Button payloads. Encoded to and decoded from Telegram callback data. */
export type BotAction =
  | { type: "mainMenu" }
  | { type: "menu"; item: MenuItem }
  | { type: "selectRole"; role: SelectableRole }
  | { type: "selectProject"; projectId: number }
  | { type: "projectDetails"; projectId: number }
  | { type: "projectAddExpense"; projectId: number }
  | { type: "projectAddPhoto"; projectId: number }
  | { type: "projectReport"; projectId: number }
  | { type: "expenseStats"; projectId: number }
  | { type: "progressStats"; projectId: number }
  | { type: "expenseHistory"; projectId: number }
  | { type: "dailyExpenses"; projectId: number }
  | { type: "gallery"; projectId: number; index: number }
  | { type: "updateBudget"; projectId: number }
  | { type: "exportProject"; projectId: number }
  | { type: "exportFull"; projectId: number }
  | { type: "exportSummary"; projectId: number }
  | { type: "selectCategory"; category: TransactionCategory }
  | { type: "confirmExpense" }
  | { type: "requestApproval" }
  | { type: "cancelExpense" }
  | { type: "selectStage"; stage: ProjectStage }
  | { type: "finishPhotos" }
  | { type: "settingsChangeRole" }
  | { type: "settingsAbout" }
  | { type: "tasksMine" }
  | { type: "tasksCompleted" }
  | { type: "tasksCreate" }
  | { type: "tasksBack" }
  | { type: "taskProject"; projectId: number }
  | { type: "taskView"; taskId: number }
  | { type: "taskComplete"; taskId: number }
  | { type: "taskDelete"; taskId: number }
  | { type: "approvalsList"; status: ChangeOrderStatus }
  | { type: "approvalsBack" }
  | { type: "viewApproval"; changeOrderId: number }
  | { type: "approve"; changeOrderId: number }
  | { type: "reject"; changeOrderId: number }
  | { type: "rejectReason"; reason: RejectionReasonCode | "cancel" }
  | { type: "voiceConfirm" }
  | { type: "voiceCancel" }
  | { type: "voiceProject"; projectId: number };

export type BotActionType = BotAction["type"];

export type InboundEvent =
  | { kind: "command"; command: string; args: string }
  | { kind: "text"; text: string }
  | { kind: "callback"; data: string }
  | { kind: "photo"; fileId: string }
  | { kind: "voice"; fileId: string; fileUniqueId: string }
  | { kind: "other" };

export interface Sender {
  telegramId: number;
  name: string;
}

export interface InlineButton {
  text: string;
  action: BotAction;
}

export type Keyboard = InlineButton[][];

export type Reply =
  | { kind: "message"; mode: "send" | "edit"; text: string; keyboard?: Keyboard }
  | { kind: "alert"; text: string; showAlert: boolean }
  | { kind: "photo"; fileId: string; caption: string; keyboard?: Keyboard }
  | { kind: "document"; fileName: string; data: Buffer; caption: string };
