import { format, parseISO } from "date-fns";

import type {
  CategoryTotals,
  ChangeOrderDetail,
  ChangeOrderStatus,
  DailyExpense,
  ExpenseHistory,
  ProgressPhotoEntity,
  ProjectEntity,
  ProjectReport,
  ProjectStage,
  StageCounts,
  TaskDetail,
  TransactionCategory,
  TransactionEntity,
  UserRole,
} from "@/types/domain";

export const CURRENCY = "BYN";

const CATEGORY_LABELS: Record<TransactionCategory, string> = {
  materials: "🏗️ Материалы",
  labor: "👷 Работа",
  other: "📦 Прочее",
};

const STAGE_LABELS: Record<ProjectStage, string> = {
  draft: "📋 Эскиз",
  electric: "⚡ Электрика",
  finish: "🎨 Отделка",
};

const ROLE_LABELS: Record<UserRole, string> = {
  foreman: "👷 Прораб",
  client: "👤 Заказчик",
  admin: "🔧 Администратор",
};

const STATUS_LABELS: Record<ChangeOrderStatus, string> = {
  pending: "⏳ Ожидает",
  approved: "✅ Одобрено",
  rejected: "❌ Отклонено",
};

const amountFormatter = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
  useGrouping: true,
});

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/** `1250.5` → `1 250.50 BYN` */
export function formatPrice(amount: number): string {
  return `${amountFormatter.format(amount).replace(/,/g, " ")} ${CURRENCY}`;
}

export function formatDateTime(value: string | Date): string {
  return format(typeof value === "string" ? parseISO(value) : value, "dd.MM.yyyy HH:mm");
}

export function formatDate(value: string | Date): string {
  return format(typeof value === "string" ? parseISO(value) : value, "dd.MM.yyyy");
}

export function formatCategory(category: TransactionCategory): string {
  return CATEGORY_LABELS[category];
}

export function formatStage(stage: ProjectStage): string {
  return STAGE_LABELS[stage];
}

export function formatRole(role: UserRole): string {
  return ROLE_LABELS[role];
}

export function formatChangeOrderStatus(status: ChangeOrderStatus): string {
  return STATUS_LABELS[status];
}

export function formatPercent(value: number): string {
  return value.toFixed(1);
}

export function getBudgetStatus(budgetPlan: number, budgetSpent: number): string {
  if (budgetPlan === 0) {
    return "📊 Бюджет не установлен";
  }
  const percent = (budgetSpent / budgetPlan) * 100;
  const rounded = percent.toFixed(0);
  if (percent <= 50) return `✅ Хорошо (${rounded}%)`;
  if (percent <= 80) return `⚠️ Внимание (${rounded}%)`;
  if (percent <= 100) return `🔴 Критично (${rounded}%)`;
  return `🚨 Превышен (${rounded}%)`;
}

export function formatProjectReport(report: ProjectReport): string {
  return [
    `📦 <b>${escapeHtml(report.name)}</b>`,
    `📍 Адрес: <code>${escapeHtml(report.address)}</code>`,
    `📅 Дата создания: ${formatDate(report.createdAt)}`,
    "",
    "💰 <b>Бюджет:</b>",
    `  План: ${formatPrice(report.budgetPlan)}`,
    `  Потрачено: ${formatPrice(report.budgetSpent)}`,
    `  Осталось: ${formatPrice(report.budgetRemaining)}`,
    `  Статус: ${getBudgetStatus(report.budgetPlan, report.budgetSpent)}`,
    "",
    "📊 <b>Статистика:</b>",
    `  Операций: ${report.transactionsCount}`,
    `  Фотографий: ${report.photosCount}`,
  ].join("\n");
}

export function formatProjectHeader(project: ProjectEntity): string {
  return [
    `📦 <b>${escapeHtml(project.name)}</b>`,
    `📍 ${escapeHtml(project.address)}`,
    `💰 Бюджет: ${formatPrice(project.budget)}`,
  ].join("\n");
}

export function formatExpenseSummary(
  amount: number,
  category: TransactionCategory,
  description: string | null
): string {
  const lines = [
    "💰 <b>Проверьте данные расхода:</b>",
    `Сумма: ${formatPrice(amount)}`,
    `Категория: ${formatCategory(category)}`,
  ];
  if (description) {
    lines.push(`Описание: <code>${escapeHtml(description)}</code>`);
  }
  return lines.join("\n");
}

export function formatExpenseEntry(transaction: TransactionEntity): string {
  const lines = [
    `💰 ${formatPrice(transaction.amount)}`,
    `   Категория: ${formatCategory(transaction.category)}`,
    `   Дата: ${formatDateTime(transaction.createdAt)}`,
  ];
  if (transaction.description) {
    lines.push(`   Примечание: <code>${escapeHtml(transaction.description)}</code>`);
  }
  return lines.join("\n");
}

export function formatExpenseHistory(history: ExpenseHistory): string {
  if (history.entries.length === 0) {
    return "📭 История расходов пуста";
  }
  const entries = history.entries.map((entry, index) => `${index + 1}. ${formatExpenseEntry(entry)}`);
  return [
    `📋 <b>История расходов (последние ${history.entries.length}):</b>`,
    "",
    entries.join("\n\n"),
    "",
    `<b>Итого:</b> ${formatPrice(history.total)}`,
  ].join("\n");
}

export function formatExpenseStatistics(totals: CategoryTotals): string {
  const total = totals.materials + totals.labor + totals.other;
  return [
    "📊 <b>Расходы по категориям:</b>",
    "",
    `🏗️ Материалы: ${formatPrice(totals.materials)}`,
    `👷 Работа: ${formatPrice(totals.labor)}`,
    `📦 Прочее: ${formatPrice(totals.other)}`,
    "",
    `<b>Всего:</b> ${formatPrice(total)}`,
  ].join("\n");
}

export function formatProgressStats(stages: StageCounts): string {
  const total = stages.draft + stages.electric + stages.finish;
  return [
    "📈 <b>Прогресс работ:</b>",
    "",
    `📋 Эскиз: ${stages.draft} фото`,
    `⚡ Электрика: ${stages.electric} фото`,
    `🎨 Отделка: ${stages.finish} фото`,
    "",
    `<b>Всего:</b> ${total} фотографий`,
  ].join("\n");
}

export function formatDailyExpenses(days: DailyExpense[]): string {
  if (days.length === 0) {
    return "📭 Расходов нет";
  }
  const total = days.reduce((sum, day) => sum + day.amount, 0);
  return [
    "📅 <b>Расходы по дням:</b>",
    "",
    ...days.map((day) => `${day.date}: ${formatPrice(day.amount)}`),
    "",
    `<b>Итого:</b> ${formatPrice(total)}`,
  ].join("\n");
}

export function formatPhotoCaption(photo: ProgressPhotoEntity, index: number, total: number): string {
  return [
    `📸 <b>Фото ${index + 1} из ${total}</b>`,
    `Этап: ${formatStage(photo.stage)}`,
    `Дата: ${formatDateTime(photo.createdAt)}`,
  ].join("\n");
}

export function formatChangeOrderLine(order: ChangeOrderDetail): string {
  return [
    `📋 ID: ${order.id}`,
    `💰 Сумма: ${formatPrice(order.transaction.amount)}`,
    `📂 Категория: ${formatCategory(order.transaction.category)}`,
    `👷 Запросил: ${escapeHtml(order.requester?.name ?? "—")}`,
    `📝 Описание: ${escapeHtml(order.transaction.description ?? "—")}`,
  ].join("\n");
}

export function formatChangeOrderDetail(order: ChangeOrderDetail): string {
  const lines = [
    `📋 <b>Запрос на согласование #${order.id}</b>`,
    "",
    `💰 <b>Сумма:</b> ${formatPrice(order.transaction.amount)}`,
    `📂 <b>Категория:</b> ${formatCategory(order.transaction.category)}`,
    `👷 <b>Запросил:</b> ${escapeHtml(order.requester?.name ?? "—")}`,
    `📝 <b>Описание:</b> ${escapeHtml(order.transaction.description ?? "—")}`,
    `⏳ <b>Статус:</b> ${formatChangeOrderStatus(order.status)}`,
    `📅 <b>Создано:</b> ${formatDateTime(order.createdAt)}`,
  ];
  if (order.approver) {
    lines.push(`👤 <b>Решение принял:</b> ${escapeHtml(order.approver.name)}`);
  }
  if (order.rejectionReason) {
    lines.push(`❗ <b>Причина:</b> ${escapeHtml(order.rejectionReason)}`);
  }
  return lines.join("\n");
}

export function formatTaskList(tasks: TaskDetail[], title: string): string {
  if (tasks.length === 0) {
    return "📭 <b>Нет задач</b>";
  }
  const items = tasks.map((task, index) => {
    const status = task.isCompleted ? "✅" : "⭕";
    const due = task.dueDate ? ` (до ${formatDate(task.dueDate)})` : "";
    const lines = [`${status} <b>${index + 1}. ${escapeHtml(task.title)}</b>${due}`, `   📂 ${escapeHtml(task.projectName)}`];
    if (task.description) {
      lines.push(`   ${escapeHtml(task.description)}`);
    }
    return lines.join("\n");
  });
  return [`📋 <b>${title}:</b>`, "", items.join("\n\n")].join("\n");
}

export function formatTaskDetail(task: TaskDetail): string {
  const lines = [
    `📌 <b>${escapeHtml(task.title)}</b>`,
    "",
    `📂 Проект: ${escapeHtml(task.projectName)}`,
    `Статус: ${task.isCompleted ? "✅ Выполнена" : "⭕ В работе"}`,
  ];
  if (task.description) {
    lines.push(`📝 ${escapeHtml(task.description)}`);
  }
  if (task.dueDate) {
    lines.push(`⏰ Срок: ${formatDate(task.dueDate)}`);
  }
  lines.push(`📅 Создана: ${formatDateTime(task.createdAt)}`);
  return lines.join("\n");
}
