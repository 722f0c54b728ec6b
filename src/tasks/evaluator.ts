import path from "path";
import { type DateTime } from "luxon";
import { formatLogError } from "../utils/error-formatters";
import { renderNotification } from "./messages";
import { type Notification, type NotificationKind, type ParsedTask, type TaskRecord } from "./schema";
import { formatTimeOnly, parseClockTime, toIsoDate } from "./time";

export type EvaluateOptions = {
  showSource: boolean;
  recovered?: boolean; // reference instant is a replayed check
};

/**
 * Decides which variant, if any, a task produces on a given day.
 * A reminder date wins over a due date; a task with no dates at all fires every day.
 */
export function classifyTask(task: ParsedTask, isoDate: string): NotificationKind | null {
  if (task.reminderDate === isoDate) {
    return "reminder";
  }
  if (task.dueDate === isoDate) {
    return "due";
  }
  if (!task.reminderDate && !task.dueDate) {
    return "plain";
  }
  return null;
}

/**
 * Shortens a source path for display: "work/today.md" -> "work/today".
 */
export function describeSource(sourceFile: string): string {
  const ext = path.posix.extname(sourceFile);
  return ext ? sourceFile.slice(0, -ext.length) : sourceFile;
}

function evaluateTask(
  task: TaskRecord,
  reference: DateTime,
  options: EvaluateOptions,
): Notification | null {
  const clock = parseClockTime(task.time);
  if (!clock) {
    console.warn(
      `[Evaluator] Skipping ${task.sourceFile}:${task.sourceLine}, unparseable time "${task.time}"`,
    );
    return null;
  }

  if (clock.hour !== reference.hour || clock.minute !== reference.minute) {
    return null;
  }

  const kind = classifyTask(task, toIsoDate(reference));
  if (!kind) {
    return null;
  }

  const text = renderNotification(kind, task, {
    source: options.showSource ? describeSource(task.sourceFile) : undefined,
    missedAt: options.recovered ? formatTimeOnly(reference) : undefined,
  });

  return { kind, task, text };
}

/**
 * Returns the notifications due at the reference instant (minute precision).
 * Delivery is left to the caller.
 */
export function evaluateTasks(
  tasks: Iterable<TaskRecord>,
  reference: DateTime,
  options: EvaluateOptions,
): Notification[] {
  const notifications: Notification[] = [];

  for (const task of tasks) {
    try {
      const notification = evaluateTask(task, reference, options);
      if (notification) {
        notifications.push(notification);
      }
    } catch (e) {
      console.error(
        `[Evaluator] Failed to evaluate ${task.sourceFile}:${task.sourceLine}: ${formatLogError(e)}`,
      );
    }
  }

  return notifications;
}
