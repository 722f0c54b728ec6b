export const MARKER_KINDS = ["clock", "reminder", "due"] as const;

export type MarkerKind = (typeof MARKER_KINDS)[number];

/**
 * Marker glyphs recognised inside a checklist line.
 */
export const MARKERS: Record<MarkerKind, string> = {
  clock: "⏰",
  reminder: "⏳",
  due: "📅",
};

/**
 * Notification variants, in classification precedence order.
 */
export type NotificationKind = "reminder" | "due" | "plain";

/**
 * A checklist line after parsing
 */
export type ParsedTask = {
  text: string; // cleaned description, never empty
  time: string; // "H:MM" or "HH:MM" trigger time (or the default as configured)
  reminderDate?: string; // yyyy-MM-dd, pre-notification day
  dueDate?: string; // yyyy-MM-dd, event day
};

/**
 * A parsed task tagged with where it was found
 */
export type TaskRecord = ParsedTask & {
  sourceFile: string; // relative to the base directory, forward slashes
  sourceLine: number; // 1-based
};

/**
 * A rendered notification ready for delivery
 */
export type Notification = {
  kind: NotificationKind;
  task: TaskRecord;
  text: string;
};
