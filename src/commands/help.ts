import { Context, Markup } from "telegraf";

/**
 * Handles the /help command.
 * Lists all available slash commands and their descriptions.
 */
export async function handleHelp(ctx: Context) {
  const helpMessage = `Available commands:

/help - Show this list of commands
/check - Show every open task in the watched files
/today - Show what is scheduled for today`;

  await ctx.reply(helpMessage, {
    reply_markup: Markup.keyboard(["/help", "/check", "/today"]).resize().reply_markup,
  });
}

/**
 * Handles the /start command.
 */
export async function handleStart(ctx: Context) {
  await ctx.reply(
    "🔔 Reminder bot is running!\n" +
      "Reminders from your checklist files are sent to this chat.\n" +
      "Use /check to see open tasks and /today for today's schedule.",
  );
}
