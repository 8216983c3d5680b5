import { Bot, GrammyError, InlineKeyboard, InputFile, session, type Context, type SessionFlavor } from "grammy";

import type { Db } from "@/lib/db/client";
import { describeError, logger } from "@/lib/logger";
import type { VoiceExpenseService } from "@/lib/openai";
import { IDLE, type DialogState } from "@/types/dialog";
import type { InboundEvent, Keyboard, Reply, Sender } from "@/types/bot";
import { encodeAction } from "@/handlers/bot/actions";
import type { BotServices } from "@/handlers/bot/context";
import { handleUpdate } from "@/handlers/bot/index";

interface SessionData {
  dialog: DialogState;
}

export type BotContext = Context & SessionFlavor<SessionData>;

type TelegramUser = NonNullable<Context["from"]>;

interface MessageOptions {
  parse_mode: "HTML";
  reply_markup?: InlineKeyboard;
}

export const BOT_COMMANDS = [
  { command: "start", description: "Главное меню" },
  { command: "help", description: "Справка" },
  { command: "status", description: "Текущий шаг" },
  { command: "cancel", description: "Отменить действие" },
];

// Telegram errors after which a fresh message replaces the edit.
const EDIT_FALLBACK_ERRORS = [
  "message to edit not found",
  "message can't be edited",
  "there is no text in the message to edit",
  "message_id_invalid",
];

// Noise that needs no log entry.
const IGNORED_ERRORS = ["message is not modified", "query is too old", "ECONNRESET", "ETIMEDOUT"];

const COMMAND_PATTERN = /^\/(?<command>[A-Za-z_]+)(?:@\w+)?(?:\s+(?<args>[\s\S]*))?$/;

export function toInlineKeyboard(keyboard: Keyboard): InlineKeyboard {
  return new InlineKeyboard(
    keyboard.map((row) => row.map((button) => InlineKeyboard.text(button.text, encodeAction(button.action))))
  );
}

export function toSender(user: TelegramUser): Sender {
  const fullName = [user.first_name, user.last_name].filter(Boolean).join(" ").trim();
  return { telegramId: user.id, name: fullName || user.username || String(user.id) };
}

export function toInboundEvent(ctx: Context): InboundEvent {
  const data = ctx.callbackQuery?.data;
  if (data !== undefined) {
    return { kind: "callback", data };
  }

  const message = ctx.message;
  if (!message) {
    return { kind: "other" };
  }
  if (message.text !== undefined) {
    const groups = COMMAND_PATTERN.exec(message.text)?.groups;
    if (groups?.command) {
      return { kind: "command", command: groups.command.toLowerCase(), args: groups.args?.trim() ?? "" };
    }
    return { kind: "text", text: message.text };
  }
  const largestPhoto = message.photo?.at(-1);
  if (largestPhoto) {
    return { kind: "photo", fileId: largestPhoto.file_id };
  }
  if (message.voice) {
    return { kind: "voice", fileId: message.voice.file_id, fileUniqueId: message.voice.file_unique_id };
  }
  return { kind: "other" };
}

function errorText(error: unknown): string {
  if (error instanceof GrammyError) {
    return error.description;
  }
  return error instanceof Error ? error.message : String(error);
}

async function editOrReply(ctx: BotContext, text: string, options: MessageOptions): Promise<void> {
  try {
    await ctx.editMessageText(text, options);
  } catch (error) {
    const message = errorText(error);
    if (message.includes("message is not modified")) {
      return;
    }
    if (!EDIT_FALLBACK_ERRORS.some((fragment) => message.includes(fragment))) {
      throw error;
    }
    await ctx.reply(text, options);
  }
}

async function render(ctx: BotContext, reply: Reply): Promise<void> {
  switch (reply.kind) {
    case "message": {
      const options: MessageOptions = { parse_mode: "HTML" };
      if (reply.keyboard) {
        options.reply_markup = toInlineKeyboard(reply.keyboard);
      }
      if (reply.mode === "edit" && ctx.callbackQuery?.message) {
        await editOrReply(ctx, reply.text, options);
      } else {
        await ctx.reply(reply.text, options);
      }
      return;
    }
    case "alert":
      await ctx.reply(reply.text);
      return;
    case "photo":
      await ctx.replyWithPhoto(reply.fileId, {
        caption: reply.caption,
        parse_mode: "HTML",
        reply_markup: reply.keyboard ? toInlineKeyboard(reply.keyboard) : undefined,
      });
      return;
    case "document":
      await ctx.replyWithDocument(new InputFile(reply.data, reply.fileName), {
        caption: reply.caption,
        parse_mode: "HTML",
      });
      return;
  }
}

async function processUpdate(ctx: BotContext, services: BotServices): Promise<void> {
  if (!ctx.from || !ctx.chat) {
    return;
  }
  const response = await handleUpdate({
    event: toInboundEvent(ctx),
    from: toSender(ctx.from),
    state: ctx.session.dialog,
    services,
  });
  ctx.session.dialog = response.state;

  // The first alert answers the button tap; a tap without one is answered silently.
  let answered = !ctx.callbackQuery;
  for (const reply of response.replies) {
    if (reply.kind === "alert" && !answered) {
      await ctx.answerCallbackQuery({ text: reply.text, show_alert: reply.showAlert });
      answered = true;
      continue;
    }
    await render(ctx, reply);
  }
  if (!answered) {
    await ctx.answerCallbackQuery();
  }
}

async function downloadTelegramFile(bot: Bot<BotContext>, token: string, fileId: string): Promise<Buffer> {
  const file = await bot.api.getFile(fileId);
  if (!file.file_path) {
    throw new Error(`Telegram returned no path for file ${fileId}`);
  }
  const res = await fetch(`https://api.telegram.org/file/bot${token}/${file.file_path}`);
  if (!res.ok) {
    throw new Error(`Failed to download telegram file: HTTP ${res.status}`);
  }
  return Buffer.from(await res.arrayBuffer());
}

export interface CreateBotOptions {
  token: string;
  db: Db;
  voice: VoiceExpenseService | null;
}

export function createBot({ token, db, voice }: CreateBotOptions): Bot<BotContext> {
  const bot = new Bot<BotContext>(token);
  const services: BotServices = {
    db,
    voice,
    downloadFile: (fileId) => downloadTelegramFile(bot, token, fileId),
  };

  bot.use(session({ initial: (): SessionData => ({ dialog: IDLE }) }));
  bot.on(["message", "callback_query:data"], (ctx) => processUpdate(ctx, services));

  bot.catch((err) => {
    const message = errorText(err.error);
    if (IGNORED_ERRORS.some((fragment) => message.includes(fragment))) {
      return;
    }
    logger.error("Bot error", { updateId: err.ctx.update.update_id, ...describeError(err.error) });
  });

  return bot;
}
