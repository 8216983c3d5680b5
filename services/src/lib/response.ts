import type { DialogState } from "@/types/dialog";
import type { Keyboard, Reply } from "@/types/bot";

/** What a dialog handler produces: the replies to render and the next dialog position. */
export interface BotResponse {
  replies: Reply[];
  state: DialogState;
}

export function sendMessage(text: string, keyboard?: Keyboard): Reply {
  return { kind: "message", mode: "send", text, keyboard };
}

export function editMessage(text: string, keyboard?: Keyboard): Reply {
  return { kind: "message", mode: "edit", text, keyboard };
}

export function alert(text: string, showAlert = true): Reply {
  return { kind: "alert", text, showAlert };
}

export function respond(state: DialogState, ...replies: Reply[]): BotResponse {
  return { replies, state };
}

export function errorResponse(state: DialogState, message: string): BotResponse {
  return respond(state, sendMessage(`❌ ${message}`));
}
