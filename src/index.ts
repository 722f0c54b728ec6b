import { Telegraf } from "telegraf";
import { handleHelp, handleStart } from "./commands/help";
import { handleCheck } from "./commands/list";
import { handleToday } from "./commands/today";
import { loadConfig, type AppConfig } from "./config";
import { loadDotEnv } from "./env";
import { createCheckRunner, type NotificationSender } from "./tasks/notifier";
import { ReminderScheduler } from "./tasks/scheduler";
import { formatLogError } from "./utils/error-formatters";

/**
 * Creates a NotificationSender from the bot instance.
 */
function createNotificationSender(bot: Telegraf): NotificationSender {
  return {
    sendMessage: async (chatId: string, text: string): Promise<void> => {
      await bot.telegram.sendMessage(chatId, text);
    },
  };
}

/**
 * Registers the read-only commands. Only the configured chat is served.
 */
function registerCommands(bot: Telegraf, config: AppConfig): void {
  bot.use(async (ctx, next) => {
    const chatId = ctx.chat?.id;
    if (chatId === undefined || String(chatId) !== config.chatId) {
      console.warn(`[Bot] Ignoring update from chat ${chatId ?? "unknown"}`);
      return;
    }
    await next();
  });

  bot.command("start", async (ctx) => {
    await handleStart(ctx);
  });

  bot.command("help", async (ctx) => {
    await handleHelp(ctx);
  });

  bot.command("check", async (ctx) => {
    await handleCheck(ctx, config);
  });

  bot.command("today", async (ctx) => {
    await handleToday(ctx, config);
  });

  /**
   * Catches middleware errors that aren't caught by specific handlers.
   */
  bot.catch((err, ctx) => {
    console.error(`[Bot] Telegraf error: ${formatLogError(err)}`);
    if (ctx && ctx.from) {
      ctx.reply("An error occurred while processing your request.").catch((e: unknown) => {
        console.error(`[Bot] Failed to send error reply: ${formatLogError(e, false)}`);
      });
    }
  });
}

/**
 * Wraps a promise with a timeout.
 * @throws Error if timeout is reached
 */
function withTimeout<T>(p: Promise<T>, ms: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`${label} timed out after ${ms}ms`));
    }, ms);

    p.then(
      (result) => {
        clearTimeout(timer);
        resolve(result);
      },
      (err) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

/**
 * Main async function that starts the bot and the reminder loop.
 */
async function main() {
  console.log("Starting bot...");

  loadDotEnv();
  const config = loadConfig();
  console.log(
    `Watching ${config.files ? config.files.join(", ") : `*${config.extension}`} in ${config.baseDirectory}`,
  );

  const bot = new Telegraf(config.botToken);
  registerCommands(bot, config);

  // Validate the token before anything else talks to Telegram
  console.log("Validating Telegram token...");
  const botInfo = await withTimeout(bot.telegram.getMe(), 15000, "getMe");
  console.log(`Bot started as @${botInfo.username}`);

  const scheduler = new ReminderScheduler({
    intervalSeconds: config.checkIntervalSeconds,
    runCheck: createCheckRunner({ config, sender: createNotificationSender(bot) }),
  });
  scheduler.start();

  // Polling never resolves while the bot runs
  bot.launch({ dropPendingUpdates: true }).catch((err: unknown) => {
    console.error(`Failed to launch polling: ${formatLogError(err)}`);
    console.error("Hint: Check network/proxy/firewall settings. Telegram API may be unreachable.");
    process.exit(1);
  });

  const shutdown = (signal: string) => {
    console.log(`Received ${signal}, stopping...`);
    scheduler.stop();
    bot.stop(signal);
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  console.error(`Fatal error during startup: ${formatLogError(err)}`);
  process.exit(1);
});
