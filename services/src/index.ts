import "dotenv/config";

import { createDatabase } from "@/lib/db/client";
import { getEnv, resolveDatabasePath } from "@/lib/env";
import { describeError, logger } from "@/lib/logger";
import { getVoiceExpenseService } from "@/lib/openai";
import { BOT_COMMANDS, createBot } from "@/handlers/bot/telegram";

async function main(): Promise<void> {
  const env = getEnv();
  const database = createDatabase(resolveDatabasePath(env.DATABASE_URL));
  const bot = createBot({ token: env.BOT_TOKEN, db: database.db, voice: getVoiceExpenseService() });

  const shutdown = (signal: string) => {
    logger.info("Shutting down", { signal });
    bot
      .stop()
      .catch((error: unknown) => logger.error("Bot stop failed", describeError(error)))
      .finally(() => database.close());
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  await bot.api.setMyCommands(BOT_COMMANDS);
  await bot.start({
    onStart: (info) => logger.info("Bot started", { username: info.username }),
  });
}

main().catch((error: unknown) => {
  logger.error("Bot failed to start", describeError(error));
  process.exit(1);
});
