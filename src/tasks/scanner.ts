import fs from "fs";
import path from "path";
import { formatLogError } from "../utils/error-formatters";
import { parseTaskLine } from "./parser";
import { type TaskRecord } from "./schema";

export type ScanOptions = {
  baseDirectory: string;
  files?: string[]; // relative to baseDirectory; undefined means walk the directory
  extension: string;
  defaultTime: string;
};

function toRelative(baseDirectory: string, filePath: string): string {
  return path.relative(baseDirectory, filePath).split(path.sep).join("/");
}

function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/**
 * Yields every file under a directory whose name ends with the extension.
 * Entries are visited in name order; hidden entries are skipped.
 */
function* walkDirectory(directory: string, extension: string): Generator<string> {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(directory, { withFileTypes: true });
  } catch (e) {
    console.error(`[Scanner] Failed to read directory ${directory}: ${formatLogError(e, false)}`);
    return;
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    if (entry.name.startsWith(".")) {
      continue;
    }

    const entryPath = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      yield* walkDirectory(entryPath, extension);
    } else if (entry.isFile() && entry.name.toLowerCase().endsWith(extension.toLowerCase())) {
      yield entryPath;
    }
  }
}

/**
 * Lists the files to scan, as absolute paths, in scan order.
 */
export function* listTaskFiles(options: ScanOptions): Generator<string> {
  if (options.files === undefined) {
    yield* walkDirectory(options.baseDirectory, options.extension);
    return;
  }

  for (const file of options.files) {
    const filePath = path.resolve(options.baseDirectory, file);
    if (!isFile(filePath)) {
      console.warn(`[Scanner] File not found: ${filePath}`);
      continue;
    }
    yield filePath;
  }
}

/**
 * Lazily parses every task in the configured files.
 * Never throws: unreadable files are logged and contribute nothing.
 */
export function* iterateTasks(options: ScanOptions): Generator<TaskRecord> {
  for (const filePath of listTaskFiles(options)) {
    let content: string;
    try {
      content = fs.readFileSync(filePath, "utf8");
    } catch (e) {
      console.error(`[Scanner] Failed to read ${filePath}: ${formatLogError(e, false)}`);
      continue;
    }

    const sourceFile = toRelative(options.baseDirectory, filePath);
    const lines = content.split("\n");

    for (let i = 0; i < lines.length; i++) {
      const task = parseTaskLine(lines[i], options.defaultTime);
      if (task) {
        yield { ...task, sourceFile, sourceLine: i + 1 };
      }
    }
  }
}

/**
 * Collects every task in the configured files.
 */
export function scanTasks(options: ScanOptions): TaskRecord[] {
  return Array.from(iterateTasks(options));
}
