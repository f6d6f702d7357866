/**
 * goodname-bot: entry point.
 *
 * Posts a random good name when someone raises a name alert, and records
 * new names proposed with the add trigger.
 *
 *   goodname-bot [-c config.json]
 *
 * Env (loaded from .env.local, then .env):
 *   DISCORD_BOT_TOKEN    Discord bot token, unless "token" is in the config
 *   LOG_LEVEL            Overrides "log_level"
 *   GOODNAME_DATA_FILE   Overrides "data_file"
 *   GOODNAME_SEASON      Overrides "season"
 */

import { config as loadEnv } from "dotenv";
import { DiscordTransport, createLogger } from "@goodname/chat-core";
import { createBot, type GoodNameBot } from "./bot.js";
import { ConfigError, USAGE, loadBotConfig, parseCliArgs } from "./config.js";

loadEnv({ path: ".env.local" });
loadEnv();

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const config = loadBotConfig(args.configPath);
  const logger = createLogger({ level: config.logLevel, name: "goodname-bot" });

  const transport = new DiscordTransport({ botToken: config.token, logger });
  const bot = await createBot(config, { transport, logger });

  registerShutdown(bot);

  try {
    await bot.start();
  } catch (err) {
    logger.fatal({ err }, "Bot stopped");
    process.exit(1);
  }
}

function registerShutdown(bot: GoodNameBot): void {
  const shutdown = async (signal: string) => {
    console.log(`\n[goodname-bot] ${signal}, shutting down...`);
    try {
      await bot.stop();
    } finally {
      process.exit(0);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((err) => {
  if (err instanceof ConfigError) {
    console.error(`Error: ${err.message}\n\n${USAGE}`);
  } else {
    console.error("[goodname-bot] Failed to start:", err);
  }
  process.exit(1);
});
