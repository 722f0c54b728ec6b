import { MARKERS, type NotificationKind, type ParsedTask } from "./schema";

export type RenderOptions = {
  source?: string; // provenance line, already shortened
  missedAt?: string; // HH:mm of a replayed check
};

function leadLine(kind: NotificationKind, task: ParsedTask): string {
  switch (kind) {
    case "plain":
      return `${MARKERS.clock} Reminder:`;
    case "reminder":
      return task.dueDate
        ? `${MARKERS.reminder} Heads up! On ${task.dueDate} you have planned:`
        : `${MARKERS.reminder} Heads up! You have planned:`;
    case "due":
      return `${MARKERS.due} Due today:`;
  }
}

/**
 * Builds the text sent to the chat for one notification.
 */
export function renderNotification(
  kind: NotificationKind,
  task: ParsedTask,
  options: RenderOptions = {},
): string {
  let lead = leadLine(kind, task);
  if (options.missedAt) {
    lead = `[Missed at ${options.missedAt}] ${lead}`;
  }

  let message = `${lead}\n\n${task.text}`;
  if (options.source) {
    message += `\n\n📄 ${options.source}`;
  }
  return message;
}

/**
 * Icon shown next to a task in listings.
 */
export function kindIcon(kind: NotificationKind): string {
  switch (kind) {
    case "plain":
      return MARKERS.clock;
    case "reminder":
      return MARKERS.reminder;
    case "due":
      return MARKERS.due;
  }
}
