import { DateTime } from "luxon";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { classifyTask, describeSource, evaluateTasks } from "../../src/tasks/evaluator";
import { type TaskRecord } from "../../src/tasks/schema";

const task = (overrides: Partial<TaskRecord> = {}): TaskRecord => ({
  text: "Buy milk",
  time: "09:15",
  sourceFile: "lists/today.md",
  sourceLine: 3,
  ...overrides,
});

// 2025-03-01 09:15:42 on the host clock
const reference = DateTime.fromObject({ year: 2025, month: 3, day: 1, hour: 9, minute: 15, second: 42 });

describe("classifyTask", () => {
  it("prefers the reminder date over the due date", () => {
    expect(
      classifyTask(task({ reminderDate: "2025-03-01", dueDate: "2025-03-01" }), "2025-03-01"),
    ).toBe("reminder");
  });

  it("returns due when only the due date matches", () => {
    expect(classifyTask(task({ reminderDate: "2025-02-27", dueDate: "2025-03-01" }), "2025-03-01")).toBe(
      "due",
    );
  });

  it("returns plain for a task without dates", () => {
    expect(classifyTask(task(), "2025-03-01")).toBe("plain");
  });

  it("returns null when the task is scheduled for another day", () => {
    expect(classifyTask(task({ dueDate: "2025-03-02" }), "2025-03-01")).toBeNull();
    expect(classifyTask(task({ reminderDate: "2025-02-28" }), "2025-03-01")).toBeNull();
  });
});

describe("describeSource", () => {
  it("drops the extension", () => {
    expect(describeSource("lists/today.md")).toBe("lists/today");
  });

  it("keeps names without an extension", () => {
    expect(describeSource("inbox")).toBe("inbox");
  });
});

describe("evaluateTasks", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("produces a single due notification on the due date", () => {
    // Arrange
    const tasks = [task({ dueDate: "2025-03-01" })];

    // Act
    const result = evaluateTasks(tasks, reference, { showSource: false });

    // Assert
    expect(result).toEqual([
      { kind: "due", task: tasks[0], text: "📅 Due today:\n\nBuy milk" },
    ]);
  });

  it("sends a pre-notification referencing the due date on the reminder date", () => {
    // Arrange
    const tasks = [task({ text: "Flight", reminderDate: "2025-03-01", dueDate: "2025-03-04" })];

    // Act
    const result = evaluateTasks(tasks, reference, { showSource: false });

    // Assert
    expect(result).toHaveLength(1);
    expect(result[0].kind).toBe("reminder");
    expect(result[0].text).toBe("⏳ Heads up! On 2025-03-04 you have planned:\n\nFlight");
  });

  it("fires dateless tasks at the matching minute", () => {
    // Act
    const result = evaluateTasks([task()], reference, { showSource: false });

    // Assert
    expect(result.map((n) => n.kind)).toEqual(["plain"]);
    expect(result[0].text).toBe("⏰ Reminder:\n\nBuy milk");
  });

  it("ignores tasks whose minute does not match", () => {
    // Arrange
    const tasks = [task({ time: "09:14" }), task({ time: "09:16" }), task({ time: "21:15" })];

    // Act
    const result = evaluateTasks(tasks, reference, { showSource: false });

    // Assert
    expect(result).toEqual([]);
  });

  it("matches one-digit hours", () => {
    // Act
    const result = evaluateTasks([task({ time: "9:15" })], reference, { showSource: false });

    // Assert
    expect(result).toHaveLength(1);
  });

  it("stays silent when the dates point to another day", () => {
    // Act
    const result = evaluateTasks([task({ dueDate: "2025-03-02" })], reference, { showSource: false });

    // Assert
    expect(result).toEqual([]);
  });

  it("skips unparseable times and keeps evaluating", () => {
    // Arrange
    const tasks = [task({ time: "25:99" }), task({ time: "morning" }), task({ text: "Valid" })];

    // Act
    const result = evaluateTasks(tasks, reference, { showSource: false });

    // Assert
    expect(result.map((n) => n.task.text)).toEqual(["Valid"]);
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it("appends the source when enabled", () => {
    // Act
    const result = evaluateTasks([task()], reference, { showSource: true });

    // Assert
    expect(result[0].text).toBe("⏰ Reminder:\n\nBuy milk\n\n📄 lists/today");
  });

  it("tags replayed checks with the missed time", () => {
    // Act
    const result = evaluateTasks([task()], reference, { showSource: false, recovered: true });

    // Assert
    expect(result[0].text).toBe("[Missed at 09:15] ⏰ Reminder:\n\nBuy milk");
  });

  it("keeps evaluation order", () => {
    // Arrange
    const tasks = [task({ text: "First" }), task({ text: "Second", dueDate: "2025-03-01" })];

    // Act
    const result = evaluateTasks(tasks, reference, { showSource: false });

    // Assert
    expect(result.map((n) => n.task.text)).toEqual(["First", "Second"]);
  });
});
