import { describe, expect, it } from "vitest";

import { decodeAction, encodeAction } from "@/handlers/bot/actions";
import {
  approvalListKeyboard,
  approvalsMenuKeyboard,
  backToProjectKeyboard,
  categoryKeyboard,
  expenseConfirmKeyboard,
  exportFormatKeyboard,
  galleryKeyboard,
  mainMenuKeyboard,
  projectActionsKeyboard,
  projectDetailsKeyboard,
  projectsKeyboard,
  rejectionReasonKeyboard,
  reviewKeyboard,
  roleKeyboard,
  settingsKeyboard,
  stageKeyboard,
  taskDetailKeyboard,
  taskListKeyboard,
  tasksMenuKeyboard,
  voiceConfirmKeyboard,
} from "@/handlers/bot/keyboards";
import type { Keyboard } from "@/types/bot";
import type { ChangeOrderDetail, TaskDetail } from "@/types/domain";
import { makeProject, makeTransaction } from "./helpers";

const task: TaskDetail = {
  id: 7,
  projectId: 1,
  title: "Закупить кабель",
  description: null,
  isCompleted: false,
  assignedToId: 1,
  dueDate: null,
  createdAt: "2024-03-01T09:00:00",
  updatedAt: "2024-03-01T09:00:00",
  projectName: "Дом на Лесной",
};

const order: ChangeOrderDetail = {
  id: 3,
  transactionId: 1,
  status: "pending",
  requestedById: 1,
  approvedById: null,
  rejectionReason: null,
  createdAt: "2024-03-01T09:00:00",
  updatedAt: "2024-03-01T09:00:00",
  transaction: makeTransaction({ amount: 4200, status: "pending" }),
  requester: null,
  approver: null,
};

describe("decodeAction", () => {
  it.each([
    ["back_to_menu", { type: "mainMenu" }],
    ["menu_my_projects", { type: "menu", item: "myProjects" }],
    ["menu_export_excel", { type: "menu", item: "exportExcel" }],
    ["role_foreman", { type: "selectRole", role: "foreman" }],
    ["proj_12", { type: "selectProject", projectId: 12 }],
    ["proj_details_12", { type: "projectDetails", projectId: 12 }],
    ["proj_add_expense_4", { type: "projectAddExpense", projectId: 4 }],
    ["gallery_5", { type: "gallery", projectId: 5, index: 0 }],
    ["gallery_5_2", { type: "gallery", projectId: 5, index: 2 }],
    ["cat_labor", { type: "selectCategory", category: "labor" }],
    ["stage_electric", { type: "selectStage", stage: "electric" }],
    ["approvals_rejected", { type: "approvalsList", status: "rejected" }],
    ["reason_budget", { type: "rejectReason", reason: "budget" }],
    ["reason_cancel", { type: "rejectReason", reason: "cancel" }],
    ["task_complete_9", { type: "taskComplete", taskId: 9 }],
    ["voice_proj_3", { type: "voiceProject", projectId: 3 }],
  ])("decodes %s", (data, expected) => {
    expect(decodeAction(data)).toEqual(expected);
  });

  it.each(["", "menu_unknown", "role_admin", "cat_food", "stage_roof", "approvals_all", "reason_late", "proj_abc", "proj_1_extra"])(
    "rejects %j",
    (data) => {
      expect(decodeAction(data)).toBeNull();
    }
  );
});

describe("keyboards", () => {
  const keyboards: Array<[string, Keyboard]> = [
    ["main menu", mainMenuKeyboard()],
    ["roles", roleKeyboard()],
    ["projects", projectsKeyboard([makeProject({ id: 4 }), makeProject({ id: 9 })], (projectId) => ({ type: "taskProject", projectId }))],
    ["project actions", projectActionsKeyboard(4)],
    ["project details", projectDetailsKeyboard(4)],
    ["gallery", galleryKeyboard(4, 1, 3)],
    ["categories", categoryKeyboard()],
    ["expense confirm", expenseConfirmKeyboard()],
    ["stages", stageKeyboard()],
    ["export formats", exportFormatKeyboard(4)],
    ["settings", settingsKeyboard()],
    ["tasks menu", tasksMenuKeyboard()],
    ["task list", taskListKeyboard([task])],
    ["task detail", taskDetailKeyboard(task)],
    ["approvals menu", approvalsMenuKeyboard()],
    ["approval list", approvalListKeyboard([order])],
    ["review", reviewKeyboard(order)],
    ["rejection reasons", rejectionReasonKeyboard()],
    ["voice confirm", voiceConfirmKeyboard()],
  ];

  it.each(keyboards)("every %s button survives the callback round trip", (_name, keyboard) => {
    for (const row of keyboard) {
      for (const { action } of row) {
        const data = encodeAction(action);
        expect(Buffer.byteLength(data, "utf8")).toBeLessThanOrEqual(64);
        expect(decodeAction(data)).toEqual(action);
      }
    }
  });

  it("lays the main menu out as five rows of two", () => {
    const menu = mainMenuKeyboard();
    expect(menu.map((row) => row.length)).toEqual([2, 2, 2, 2, 2]);
    expect(menu[0]?.map((item) => item.text)).toEqual(["📂 Мои проекты", "➕ Создать проект"]);
  });

  it("shows gallery navigation only where there is somewhere to go", () => {
    expect(galleryKeyboard(4, 0, 1)).toEqual(backToProjectKeyboard(4));
    expect(galleryKeyboard(4, 0, 3)[0]?.map((item) => item.text)).toEqual(["➡️"]);
    expect(galleryKeyboard(4, 2, 3)[0]?.map((item) => item.text)).toEqual(["⬅️"]);
    expect(galleryKeyboard(4, 1, 3)[0]?.map((item) => encodeAction(item.action))).toEqual([
      "gallery_4",
      "gallery_4_2",
    ]);
  });

  it("hides completion for finished tasks and review buttons for settled orders", () => {
    const doneTask = taskDetailKeyboard({ ...task, isCompleted: true });
    expect(doneTask.map((row) => row[0]?.text)).toEqual(["🗑️ Удалить", "◀️ Назад"]);

    const settled = reviewKeyboard({ ...order, status: "approved" });
    expect(settled).toEqual([[{ text: "◀️ Назад", action: { type: "approvalsList", status: "approved" } }]]);
  });
});
