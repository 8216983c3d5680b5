import {
  CHANGE_ORDER_STATUSES,
  PROJECT_STAGES,
  REJECTION_REASONS,
  TRANSACTION_CATEGORIES,
  type RejectionReasonCode,
} from "@/types/domain";
import type { BotAction, MenuItem } from "@/types/bot";

const MENU_TOKENS: Record<MenuItem, string> = {
  myProjects: "my_projects",
  createProject: "create_project",
  addExpense: "add_expense",
  photoReport: "photo_report",
  projectReport: "project_report",
  settings: "settings",
  myTasks: "my_tasks",
  approvals: "approvals",
  voiceInput: "voice_input",
  exportExcel: "export_excel",
};

const MENU_ITEMS = Object.keys(MENU_TOKENS).filter(isMenuItem);

function isMenuItem(value: string): value is MenuItem {
  return value in MENU_TOKENS;
}

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value);
}

function isReasonCode(value: string): value is RejectionReasonCode {
  return value in REJECTION_REASONS;
}

type Groups = Record<string, string>;

interface ActionRoute {
  pattern: RegExp;
  decode: (groups: Groups) => BotAction | null;
}

const id = (groups: Groups, key = "id") => Number.parseInt(groups[key] ?? "", 10);

// Order matters only where prefixes overlap; every pattern is anchored.
const routes: ActionRoute[] = [
  { pattern: /^back_to_menu$/, decode: () => ({ type: "mainMenu" }) },
  {
    pattern: /^menu_(?<token>[a-z_]+)$/,
    decode: ({ token }) => {
      const item = MENU_ITEMS.find((candidate) => MENU_TOKENS[candidate] === token);
      return item ? { type: "menu", item } : null;
    },
  },
  {
    pattern: /^role_(?<role>foreman|client)$/,
    decode: ({ role }) => (role === "foreman" || role === "client" ? { type: "selectRole", role } : null),
  },
  { pattern: /^proj_details_(?<id>\d+)$/, decode: (g) => ({ type: "projectDetails", projectId: id(g) }) },
  { pattern: /^proj_add_expense_(?<id>\d+)$/, decode: (g) => ({ type: "projectAddExpense", projectId: id(g) }) },
  { pattern: /^proj_add_photo_(?<id>\d+)$/, decode: (g) => ({ type: "projectAddPhoto", projectId: id(g) }) },
  { pattern: /^proj_report_(?<id>\d+)$/, decode: (g) => ({ type: "projectReport", projectId: id(g) }) },
  { pattern: /^proj_(?<id>\d+)$/, decode: (g) => ({ type: "selectProject", projectId: id(g) }) },
  { pattern: /^stat_expenses_(?<id>\d+)$/, decode: (g) => ({ type: "expenseStats", projectId: id(g) }) },
  { pattern: /^stat_progress_(?<id>\d+)$/, decode: (g) => ({ type: "progressStats", projectId: id(g) }) },
  { pattern: /^history_expenses_(?<id>\d+)$/, decode: (g) => ({ type: "expenseHistory", projectId: id(g) }) },
  { pattern: /^daily_expenses_(?<id>\d+)$/, decode: (g) => ({ type: "dailyExpenses", projectId: id(g) }) },
  {
    pattern: /^gallery_(?<id>\d+)(?:_(?<index>\d+))?$/,
    decode: (g) => ({ type: "gallery", projectId: id(g), index: g.index ? id(g, "index") : 0 }),
  },
  { pattern: /^update_budget_(?<id>\d+)$/, decode: (g) => ({ type: "updateBudget", projectId: id(g) }) },
  { pattern: /^export_proj_(?<id>\d+)$/, decode: (g) => ({ type: "exportProject", projectId: id(g) }) },
  { pattern: /^export_full_(?<id>\d+)$/, decode: (g) => ({ type: "exportFull", projectId: id(g) }) },
  { pattern: /^export_summary_(?<id>\d+)$/, decode: (g) => ({ type: "exportSummary", projectId: id(g) }) },
  {
    pattern: /^cat_(?<category>[a-z]+)$/,
    decode: ({ category }) =>
      category && isOneOf(TRANSACTION_CATEGORIES, category) ? { type: "selectCategory", category } : null,
  },
  { pattern: /^confirm_expense$/, decode: () => ({ type: "confirmExpense" }) },
  { pattern: /^request_approval$/, decode: () => ({ type: "requestApproval" }) },
  { pattern: /^cancel_expense$/, decode: () => ({ type: "cancelExpense" }) },
  {
    pattern: /^stage_(?<stage>[a-z]+)$/,
    decode: ({ stage }) => (stage && isOneOf(PROJECT_STAGES, stage) ? { type: "selectStage", stage } : null),
  },
  { pattern: /^finish_photos$/, decode: () => ({ type: "finishPhotos" }) },
  { pattern: /^settings_change_role$/, decode: () => ({ type: "settingsChangeRole" }) },
  { pattern: /^settings_about$/, decode: () => ({ type: "settingsAbout" }) },
  { pattern: /^tasks_my_tasks$/, decode: () => ({ type: "tasksMine" }) },
  { pattern: /^tasks_completed$/, decode: () => ({ type: "tasksCompleted" }) },
  { pattern: /^tasks_create$/, decode: () => ({ type: "tasksCreate" }) },
  { pattern: /^tasks_back$/, decode: () => ({ type: "tasksBack" }) },
  { pattern: /^task_proj_(?<id>\d+)$/, decode: (g) => ({ type: "taskProject", projectId: id(g) }) },
  { pattern: /^task_view_(?<id>\d+)$/, decode: (g) => ({ type: "taskView", taskId: id(g) }) },
  { pattern: /^task_complete_(?<id>\d+)$/, decode: (g) => ({ type: "taskComplete", taskId: id(g) }) },
  { pattern: /^task_delete_(?<id>\d+)$/, decode: (g) => ({ type: "taskDelete", taskId: id(g) }) },
  {
    pattern: /^approvals_(?<status>[a-z]+)$/,
    decode: ({ status }) =>
      status && isOneOf(CHANGE_ORDER_STATUSES, status) ? { type: "approvalsList", status } : null,
  },
  { pattern: /^back_approvals$/, decode: () => ({ type: "approvalsBack" }) },
  { pattern: /^view_approval_(?<id>\d+)$/, decode: (g) => ({ type: "viewApproval", changeOrderId: id(g) }) },
  { pattern: /^approve_(?<id>\d+)$/, decode: (g) => ({ type: "approve", changeOrderId: id(g) }) },
  { pattern: /^reject_(?<id>\d+)$/, decode: (g) => ({ type: "reject", changeOrderId: id(g) }) },
  {
    pattern: /^reason_(?<reason>[a-z]+)$/,
    decode: ({ reason }) => {
      if (reason === "cancel") return { type: "rejectReason", reason };
      return reason && isReasonCode(reason) ? { type: "rejectReason", reason } : null;
    },
  },
  { pattern: /^voice_confirm$/, decode: () => ({ type: "voiceConfirm" }) },
  { pattern: /^voice_cancel$/, decode: () => ({ type: "voiceCancel" }) },
  { pattern: /^voice_proj_(?<id>\d+)$/, decode: (g) => ({ type: "voiceProject", projectId: id(g) }) },
];

/** Resolves callback data to an action; unknown or malformed tokens give null. */
export function decodeAction(data: string): BotAction | null {
  for (const route of routes) {
    const match = route.pattern.exec(data);
    if (match) {
      return route.decode(match.groups ?? {});
    }
  }
  return null;
}

export function encodeAction(action: BotAction): string {
  switch (action.type) {
    case "mainMenu":
      return "back_to_menu";
    case "menu":
      return `menu_${MENU_TOKENS[action.item]}`;
    case "selectRole":
      return `role_${action.role}`;
    case "selectProject":
      return `proj_${action.projectId}`;
    case "projectDetails":
      return `proj_details_${action.projectId}`;
    case "projectAddExpense":
      return `proj_add_expense_${action.projectId}`;
    case "projectAddPhoto":
      return `proj_add_photo_${action.projectId}`;
    case "projectReport":
      return `proj_report_${action.projectId}`;
    case "expenseStats":
      return `stat_expenses_${action.projectId}`;
    case "progressStats":
      return `stat_progress_${action.projectId}`;
    case "expenseHistory":
      return `history_expenses_${action.projectId}`;
    case "dailyExpenses":
      return `daily_expenses_${action.projectId}`;
    case "gallery":
      return action.index === 0 ? `gallery_${action.projectId}` : `gallery_${action.projectId}_${action.index}`;
    case "updateBudget":
      return `update_budget_${action.projectId}`;
    case "exportProject":
      return `export_proj_${action.projectId}`;
    case "exportFull":
      return `export_full_${action.projectId}`;
    case "exportSummary":
      return `export_summary_${action.projectId}`;
    case "selectCategory":
      return `cat_${action.category}`;
    case "confirmExpense":
      return "confirm_expense";
    case "requestApproval":
      return "request_approval";
    case "cancelExpense":
      return "cancel_expense";
    case "selectStage":
      return `stage_${action.stage}`;
    case "finishPhotos":
      return "finish_photos";
    case "settingsChangeRole":
      return "settings_change_role";
    case "settingsAbout":
      return "settings_about";
    case "tasksMine":
      return "tasks_my_tasks";
    case "tasksCompleted":
      return "tasks_completed";
    case "tasksCreate":
      return "tasks_create";
    case "tasksBack":
      return "tasks_back";
    case "taskProject":
      return `task_proj_${action.projectId}`;
    case "taskView":
      return `task_view_${action.taskId}`;
    case "taskComplete":
      return `task_complete_${action.taskId}`;
    case "taskDelete":
      return `task_delete_${action.taskId}`;
    case "approvalsList":
      return `approvals_${action.status}`;
    case "approvalsBack":
      return "back_approvals";
    case "viewApproval":
      return `view_approval_${action.changeOrderId}`;
    case "approve":
      return `approve_${action.changeOrderId}`;
    case "reject":
      return `reject_${action.changeOrderId}`;
    case "rejectReason":
      return `reason_${action.reason}`;
    case "voiceConfirm":
      return "voice_confirm";
    case "voiceCancel":
      return "voice_cancel";
    case "voiceProject":
      return `voice_proj_${action.projectId}`;
  }
}
