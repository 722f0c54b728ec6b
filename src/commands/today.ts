import { Context } from "telegraf";
import { type AppConfig } from "../config";
import { classifyTask } from "../tasks/evaluator";
import { kindIcon } from "../tasks/messages";
import { scanTasks } from "../tasks/scanner";
import { type TaskRecord } from "../tasks/schema";
import { getNow, parseClockTime, toIsoDate } from "../tasks/time";
import { chunkLines } from "../telegram/chunk";

export const NOTHING_TODAY_MESSAGE = "Nothing scheduled for today.";

function minutesOfDay(time: string): number {
  const clock = parseClockTime(time);
  return clock ? clock.hour * 60 + clock.minute : Number.MAX_SAFE_INTEGER;
}

/**
 * Lists tasks relevant on the given day, earliest first.
 * Uses the same date rules as the reminder check, ignoring the time of day.
 */
export function buildTodayList(tasks: TaskRecord[], isoDate: string): string[] {
  const relevant: Array<{ task: TaskRecord; icon: string }> = [];

  for (const task of tasks) {
    const kind = classifyTask(task, isoDate);
    if (kind) {
      relevant.push({ task, icon: kindIcon(kind) });
    }
  }

  relevant.sort((a, b) => minutesOfDay(a.task.time) - minutesOfDay(b.task.time));

  return relevant.map(({ task, icon }) => `${task.time.padStart(5, "0")} ${icon} ${task.text}`);
}

/**
 * Handles the /today command.
 */
export async function handleToday(ctx: Context, config: AppConfig) {
  const today = toIsoDate(getNow());
  const lines = buildTodayList(scanTasks(config), today);

  if (lines.length === 0) {
    await ctx.reply(NOTHING_TODAY_MESSAGE);
    return;
  }

  for (const chunk of chunkLines([`🗓 Today (${today}):`, "", ...lines])) {
    await ctx.reply(chunk);
  }
}
