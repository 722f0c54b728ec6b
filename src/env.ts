import fs from "fs";
import path from "path";

/**
 * Applies KEY=value lines to process.env without overriding variables already set.
 */
export function parseDotEnv(envFilePath: string): void {
  const lines = fs.readFileSync(envFilePath, "utf8").split("\n");
  for (const line of lines) {
    if (line.startsWith("#") || !line.trim()) continue;
    if (!line.includes("=")) {
      throw new Error(`Invalid line in .env file: ${line}`);
    }
    const equalIdx = line.indexOf("=");
    const key = line.slice(0, equalIdx).trim();
    const value = line.slice(equalIdx + 1).trim();
    if (!process.env[key]) process.env[key] = value;
  }
}

/**
 * Loads every .env file from the working directory up to the filesystem root.
 * Closer files win since existing variables are never overridden.
 */
export function loadDotEnv(startDir: string = process.cwd()): void {
  let cwd = path.resolve(startDir);
  while (true) {
    const envFile = path.join(cwd, ".env");
    if (fs.existsSync(envFile)) {
      console.log("Loading .env file", envFile);
      parseDotEnv(envFile);
    }
    const parent = path.dirname(cwd);
    if (parent === cwd) break;
    cwd = parent;
  }
}
