import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { loadDotEnv, parseDotEnv } from "../src/env";

describe("env", () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "reminder-env-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    delete process.env.REMINDER_TEST_A;
    delete process.env.REMINDER_TEST_B;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    delete process.env.REMINDER_TEST_A;
    delete process.env.REMINDER_TEST_B;
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("sets variables without overriding existing ones", () => {
    // Arrange
    const envFile = path.join(root, ".env");
    fs.writeFileSync(envFile, "# comment\nREMINDER_TEST_A = from-file\n\nREMINDER_TEST_B=from-file\n");
    process.env.REMINDER_TEST_B = "already-set";

    // Act
    parseDotEnv(envFile);

    // Assert
    expect(process.env.REMINDER_TEST_A).toBe("from-file");
    expect(process.env.REMINDER_TEST_B).toBe("already-set");
  });

  it("rejects lines without an equals sign", () => {
    // Arrange
    const envFile = path.join(root, ".env");
    fs.writeFileSync(envFile, "NOT_A_PAIR\n");

    // Act & Assert
    expect(() => parseDotEnv(envFile)).toThrow("Invalid line in .env file: NOT_A_PAIR");
  });

  it("prefers the closest .env file when walking up", () => {
    // Arrange
    const child = path.join(root, "child");
    fs.mkdirSync(child);
    fs.writeFileSync(path.join(root, ".env"), "REMINDER_TEST_A=parent\nREMINDER_TEST_B=parent\n");
    fs.writeFileSync(path.join(child, ".env"), "REMINDER_TEST_A=child\n");

    // Act
    loadDotEnv(child);

    // Assert
    expect(process.env.REMINDER_TEST_A).toBe("child");
    expect(process.env.REMINDER_TEST_B).toBe("parent");
  });
});
