import { formatCategory, formatPrice, formatStage } from "@/lib/format";
import {
  PROJECT_STAGES,
  REJECTION_REASONS,
  TRANSACTION_CATEGORIES,
  type ChangeOrderDetail,
  type ProjectEntity,
  type TaskDetail,
} from "@/types/domain";
import type { BotAction, InlineButton, Keyboard } from "@/types/bot";

const button = (text: string, action: BotAction): InlineButton => ({ text, action });

const backToMenuRow = (): InlineButton[] => [button("◀️ Назад в меню", { type: "mainMenu" })];

export function mainMenuKeyboard(): Keyboard {
  return [
    [button("📂 Мои проекты", { type: "menu", item: "myProjects" }), button("➕ Создать проект", { type: "menu", item: "createProject" })],
    [button("💰 Добавить расход", { type: "menu", item: "addExpense" }), button("📸 Фотоотчет", { type: "menu", item: "photoReport" })],
    [button("📊 Отчет по проекту", { type: "menu", item: "projectReport" }), button("🎤 Голосовой ввод", { type: "menu", item: "voiceInput" })],
    [button("📋 Мои задачи", { type: "menu", item: "myTasks" }), button("✅ Согласования", { type: "menu", item: "approvals" })],
    [button("📥 Экспорт в Excel", { type: "menu", item: "exportExcel" }), button("⚙️ Настройки", { type: "menu", item: "settings" })],
  ];
}

export function roleKeyboard(): Keyboard {
  return [
    [button("👷 Прораб", { type: "selectRole", role: "foreman" })],
    [button("👤 Заказчик", { type: "selectRole", role: "client" })],
  ];
}

export function backToMenuKeyboard(): Keyboard {
  return [backToMenuRow()];
}

export function cancelInputKeyboard(): Keyboard {
  return [[button("❌ Отмена", { type: "mainMenu" })]];
}

/** One row per project; `toAction` decides what picking it means in the current flow. */
export function projectsKeyboard(projects: ProjectEntity[], toAction: (projectId: number) => BotAction): Keyboard {
  return [...projects.map((project) => [button(`📦 ${project.name}`, toAction(project.id))]), backToMenuRow()];
}

export function projectActionsKeyboard(projectId: number): Keyboard {
  return [
    [button("📋 Подробнее", { type: "projectDetails", projectId })],
    [button("💰 Добавить расход", { type: "projectAddExpense", projectId })],
    [button("📸 Добавить фото", { type: "projectAddPhoto", projectId })],
    [button("📊 Отчет", { type: "projectReport", projectId })],
    backToMenuRow(),
  ];
}

export function projectDetailsKeyboard(projectId: number): Keyboard {
  return [
    [button("📊 Статистика расходов", { type: "expenseStats", projectId }), button("📈 Прогресс работ", { type: "progressStats", projectId })],
    [button("📋 История расходов", { type: "expenseHistory", projectId }), button("📅 Расходы по дням", { type: "dailyExpenses", projectId })],
    [button("🖼️ Галерея фото", { type: "gallery", projectId, index: 0 }), button("💰 Изменить бюджет", { type: "updateBudget", projectId })],
    [button("📥 Экспорт в Excel", { type: "exportProject", projectId })],
    backToMenuRow(),
  ];
}

export function backToProjectKeyboard(projectId: number): Keyboard {
  return [[button("◀️ К проекту", { type: "projectDetails", projectId })], backToMenuRow()];
}

export function galleryKeyboard(projectId: number, index: number, total: number): Keyboard {
  const nav: InlineButton[] = [];
  if (index > 0) {
    nav.push(button("⬅️", { type: "gallery", projectId, index: index - 1 }));
  }
  if (index < total - 1) {
    nav.push(button("➡️", { type: "gallery", projectId, index: index + 1 }));
  }
  const rows = backToProjectKeyboard(projectId);
  return nav.length > 0 ? [nav, ...rows] : rows;
}

export function categoryKeyboard(): Keyboard {
  return [
    ...TRANSACTION_CATEGORIES.map((category) => [button(formatCategory(category), { type: "selectCategory", category })]),
    [button("❌ Отмена", { type: "cancelExpense" })],
  ];
}

export function expenseConfirmKeyboard(): Keyboard {
  return [
    [button("✅ Подтвердить", { type: "confirmExpense" })],
    [button("📨 На согласование", { type: "requestApproval" })],
    [button("❌ Отмена", { type: "cancelExpense" })],
  ];
}

export function stageKeyboard(): Keyboard {
  return [...PROJECT_STAGES.map((stage) => [button(formatStage(stage), { type: "selectStage", stage })]), backToMenuRow()];
}

export function finishPhotosKeyboard(): Keyboard {
  return [[button("✅ Завершить загрузку", { type: "finishPhotos" })]];
}

export function exportFormatKeyboard(projectId: number): Keyboard {
  return [
    [button("📊 Полный отчет", { type: "exportFull", projectId })],
    [button("📋 Сводка", { type: "exportSummary", projectId })],
    backToMenuRow(),
  ];
}

export function settingsKeyboard(): Keyboard {
  return [
    [button("🔄 Сменить роль", { type: "settingsChangeRole" })],
    [button("ℹ️ О боте", { type: "settingsAbout" })],
    backToMenuRow(),
  ];
}

export function tasksMenuKeyboard(): Keyboard {
  return [
    [button("📋 Мои задачи", { type: "tasksMine" })],
    [button("✅ Выполненные", { type: "tasksCompleted" })],
    [button("➕ Создать задачу", { type: "tasksCreate" })],
    backToMenuRow(),
  ];
}

export function taskListKeyboard(tasks: TaskDetail[]): Keyboard {
  return [
    ...tasks.map((task) => [button(`${task.isCompleted ? "✅" : "📌"} ${task.title}`, { type: "taskView", taskId: task.id })]),
    [button("◀️ Назад", { type: "tasksBack" })],
  ];
}

export function taskDetailKeyboard(task: TaskDetail): Keyboard {
  const rows: Keyboard = [];
  if (!task.isCompleted) {
    rows.push([button("✅ Выполнено", { type: "taskComplete", taskId: task.id })]);
  }
  rows.push([button("🗑️ Удалить", { type: "taskDelete", taskId: task.id })]);
  rows.push([button("◀️ Назад", { type: "tasksBack" })]);
  return rows;
}

export function approvalsMenuKeyboard(): Keyboard {
  return [
    [button("⏳ Ожидают", { type: "approvalsList", status: "pending" })],
    [button("✅ Одобренные", { type: "approvalsList", status: "approved" })],
    [button("❌ Отклоненные", { type: "approvalsList", status: "rejected" })],
    backToMenuRow(),
  ];
}

export function approvalListKeyboard(orders: ChangeOrderDetail[]): Keyboard {
  return [
    ...orders.map((order) => [
      button(`#${order.id} · ${formatPrice(order.transaction.amount)}`, { type: "viewApproval", changeOrderId: order.id }),
    ]),
    [button("◀️ Назад", { type: "approvalsBack" })],
  ];
}

export function reviewKeyboard(order: ChangeOrderDetail): Keyboard {
  const rows: Keyboard = [];
  if (order.status === "pending") {
    rows.push([
      button("✅ Одобрить", { type: "approve", changeOrderId: order.id }),
      button("❌ Отклонить", { type: "reject", changeOrderId: order.id }),
    ]);
  }
  rows.push([button("◀️ Назад", { type: "approvalsList", status: order.status })]);
  return rows;
}

export function rejectionReasonKeyboard(): Keyboard {
  return [
    [button(`💸 ${REJECTION_REASONS.budget}`, { type: "rejectReason", reason: "budget" })],
    [button(`🔧 ${REJECTION_REASONS.quality}`, { type: "rejectReason", reason: "quality" })],
    [button(`📝 ${REJECTION_REASONS.other}`, { type: "rejectReason", reason: "other" })],
    [button("◀️ Отмена", { type: "rejectReason", reason: "cancel" })],
  ];
}

export function voiceConfirmKeyboard(): Keyboard {
  return [
    [button("✅ Подтвердить", { type: "voiceConfirm" })],
    [button("❌ Отмена", { type: "voiceCancel" })],
  ];
}
