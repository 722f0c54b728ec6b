import { MARKERS, type ParsedTask } from "./schema";
import { isTimeString, parseIsoDate } from "./time";
import { tokenizeContent } from "./tokenizer";

// "- [ ] " with any whitespace after the box, or a bare "- [ ]"
const UNCHECKED_PREFIX = /^- \[ \](?:\s+|$)/;

const INLINE_TIME = /^(\d{1,2}:\d{2})(?:\s+|$)/;

/**
 * Parses one raw line into a task.
 * Returns null for anything that is not an unchecked checklist item with text.
 *
 * Invalid marker values never reject the line: the field is just left out
 * (dates) or falls back to the default (time).
 */
export function parseTaskLine(line: string, defaultTime: string): ParsedTask | null {
  const commentIdx = line.indexOf("#");
  const withoutComment = (commentIdx === -1 ? line : line.slice(0, commentIdx)).trim();

  const prefix = withoutComment.match(UNCHECKED_PREFIX);
  if (!prefix) {
    return null;
  }

  const content = withoutComment.slice(prefix[0].length);
  const { segments, captures } = tokenizeContent(content);

  let inlineTime: string | undefined;
  const inlineMatch = segments[0].match(INLINE_TIME);
  if (inlineMatch) {
    inlineTime = inlineMatch[1];
    segments[0] = segments[0].slice(inlineMatch[0].length).trim();
  }

  const text = segments.filter((segment) => segment !== "").join(" ");
  if (!text) {
    return null;
  }

  const time =
    [captures.clock, inlineTime].find(
      (candidate): candidate is string => candidate !== undefined && isTimeString(candidate),
    ) ?? defaultTime;

  const task: ParsedTask = { text, time };

  const reminderDate = captures.reminder && parseIsoDate(captures.reminder);
  if (reminderDate) {
    task.reminderDate = reminderDate;
  }

  const dueDate = captures.due && parseIsoDate(captures.due);
  if (dueDate) {
    task.dueDate = dueDate;
  }

  return task;
}

/**
 * Renders a task back into a checklist line that parses to the same task.
 * Markers go first so the text can never be mistaken for an inline time.
 */
export function formatTaskLine(task: ParsedTask): string {
  const parts = ["- [ ]"];

  if (isTimeString(task.time)) {
    parts.push(`${MARKERS.clock} ${task.time}`);
  }
  if (task.reminderDate) {
    parts.push(`${MARKERS.reminder} ${task.reminderDate}`);
  }
  if (task.dueDate) {
    parts.push(`${MARKERS.due} ${task.dueDate}`);
  }

  parts.push(task.text);
  return parts.join(" ");
}
