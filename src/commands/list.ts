import { Context } from "telegraf";
import { type AppConfig } from "../config";
import { describeSource } from "../tasks/evaluator";
import { formatTaskLine } from "../tasks/parser";
import { scanTasks } from "../tasks/scanner";
import { type TaskRecord } from "../tasks/schema";
import { chunkLines } from "../telegram/chunk";

export const NO_TASKS_MESSAGE = "No open tasks found.";

/**
 * Builds the /check listing: tasks grouped by source file, in scan order.
 */
export function buildTaskList(tasks: TaskRecord[]): string[] {
  const lines: string[] = [];
  let currentFile: string | null = null;

  for (const task of tasks) {
    if (task.sourceFile !== currentFile) {
      currentFile = task.sourceFile;
      if (lines.length > 0) {
        lines.push("");
      }
      lines.push(`📄 ${describeSource(task.sourceFile)}`);
    }

    const line = formatTaskLine(task).replace(/^- \[ \] /, "");
    lines.push(`${task.sourceLine}: ${line}`);
  }

  return lines;
}

/**
 * Handles the /check command.
 * Shows every open task found in the configured files.
 */
export async function handleCheck(ctx: Context, config: AppConfig) {
  const tasks = scanTasks(config);

  if (tasks.length === 0) {
    await ctx.reply(NO_TASKS_MESSAGE);
    return;
  }

  const lines = [`📋 Open tasks (${tasks.length}):`, "", ...buildTaskList(tasks)];
  for (const chunk of chunkLines(lines)) {
    await ctx.reply(chunk);
  }
}
