import { type DateTime } from "luxon";
import { type AppConfig } from "../config";
import { formatLogError } from "../utils/error-formatters";
import { evaluateTasks } from "./evaluator";
import { scanTasks } from "./scanner";
import { formatTimeOnly } from "./time";

/**
 * Interface for delivering notification messages.
 * Abstracts away Telegram-specific details.
 */
export interface NotificationSender {
  sendMessage(chatId: string, text: string): Promise<void>;
}

export type CheckRunner = (reference: DateTime, recovered: boolean) => Promise<void>;

/**
 * Creates the check run for one reference instant: rescan the files, evaluate,
 * then deliver each notification in order.
 */
export function createCheckRunner(deps: {
  config: AppConfig;
  sender: NotificationSender;
}): CheckRunner {
  const { config, sender } = deps;

  return async (reference, recovered) => {
    const tasks = scanTasks(config);
    const notifications = evaluateTasks(tasks, reference, {
      showSource: config.showSource,
      recovered,
    });

    if (notifications.length === 0) {
      return;
    }

    let sent = 0;
    for (const notification of notifications) {
      const { task } = notification;
      try {
        await sender.sendMessage(config.chatId, notification.text);
        sent++;
        console.log(
          `[Notifier] Sent ${notification.kind} reminder for ${task.sourceFile}:${task.sourceLine}`,
        );
      } catch (e) {
        console.error(
          `[Notifier] Failed to send reminder for ${task.sourceFile}:${task.sourceLine}: ${formatLogError(e, false)}`,
        );
      }
    }

    console.log(
      `[Notifier] ${sent}/${notifications.length} reminders sent for ${formatTimeOnly(reference)} ` +
        `(${tasks.length} open tasks)`,
    );
  };
}
