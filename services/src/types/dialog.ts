import type { ChangeOrderStatus, ProjectStage, TransactionCategory } from "@/types/domain";
import type { ParsedVoiceExpense } from "@/types/openai";

/**
 * Per-chat dialog position. Each workflow carries only the fields collected
 * so far; `idle` means no multi-step input is expected.
 */
export type DialogState =
  | { flow: "idle" }
  | { flow: "registration"; step: "role" }
  | { flow: "browseProjects"; step: "project" }
  | { flow: "createProject"; step: "name" }
  | { flow: "createProject"; step: "address"; name: string }
  | { flow: "createProject"; step: "budget"; name: string; address: string }
  | { flow: "expense"; step: "project" }
  | { flow: "expense"; step: "amount"; projectId: number }
  | { flow: "expense"; step: "category"; projectId: number; amount: number }
  | { flow: "expense"; step: "description"; projectId: number; amount: number; category: TransactionCategory }
  | {
      flow: "expense";
      step: "confirm";
      projectId: number;
      amount: number;
      category: TransactionCategory;
      description: string | null;
    }
  | { flow: "photo"; step: "project" }
  | { flow: "photo"; step: "stage"; projectId: number }
  | { flow: "photo"; step: "upload"; projectId: number; stage: ProjectStage; count: number }
  | { flow: "report"; step: "project" }
  | { flow: "budget"; step: "amount"; projectId: number }
  | { flow: "settings"; step: "menu" }
  | { flow: "settings"; step: "role" }
  | { flow: "voice"; step: "audio" }
  | { flow: "voice"; step: "confirm"; transcript: string; expense: ParsedVoiceExpense }
  | { flow: "voice"; step: "project"; transcript: string; expense: ParsedVoiceExpense }
  | { flow: "task"; step: "menu" }
  | { flow: "task"; step: "list" }
  | { flow: "task"; step: "title" }
  | { flow: "task"; step: "description"; title: string }
  | { flow: "task"; step: "project"; title: string; description: string | null }
  | { flow: "approval"; step: "menu" }
  | { flow: "approval"; step: "list"; status: ChangeOrderStatus }
  | { flow: "approval"; step: "review"; changeOrderId: number }
  | { flow: "approval"; step: "reason"; changeOrderId: number }
  | { flow: "export"; step: "project" };

export type DialogFlow = DialogState["flow"];

export type StepOf<F extends DialogFlow> =
  Extract<DialogState, { flow: F }> extends infer S ? (S extends { step: infer X } ? X : never) : never;

export type DialogStep<F extends DialogFlow, S extends StepOf<F>> = Extract<DialogState, { flow: F; step: S }>;

export const IDLE: DialogState = { flow: "idle" };

export function inStep<F extends DialogFlow, const S extends StepOf<F>>(
  state: DialogState,
  flow: F,
  step: S
): state is DialogStep<F, S> {
  return state.flow === flow && "step" in state && state.step === step;
}

export function describeState(state: DialogState): string {
  return "step" in state ? `${state.flow}.${state.step}` : state.flow;
}
