import "dotenv/config";

import { resetDatabase } from "@/lib/db/client";
import { resolveDatabasePath } from "@/lib/env";
import { describeError, logger } from "@/lib/logger";

// Reads DATABASE_URL directly: a reset needs no BOT_TOKEN.
const filename = resolveDatabasePath(process.env.DATABASE_URL?.trim() || undefined);

try {
  resetDatabase(filename);
} catch (error) {
  logger.error("Database reset failed", { filename, ...describeError(error) });
  process.exitCode = 1;
}
