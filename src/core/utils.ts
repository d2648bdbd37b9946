import path from "node:path";

import fse from "fs-extra";

export function slugify(input: string): string {
  return input
    .toLowerCase()
    .trim()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, 80);
}

export function defaultRunId(now: Date = new Date()): string {
  // YYYYMMDD-HHMMSS
  const yyyy = now.getUTCFullYear();
  const mm = String(now.getUTCMonth() + 1).padStart(2, "0");
  const dd = String(now.getUTCDate()).padStart(2, "0");
  const hh = String(now.getUTCHours()).padStart(2, "0");
  const mi = String(now.getUTCMinutes()).padStart(2, "0");
  const ss = String(now.getUTCSeconds()).padStart(2, "0");
  return `${yyyy}${mm}${dd}-${hh}${mi}${ss}`;
}

export async function ensureDir(dir: string): Promise<void> {
  await fse.ensureDir(dir);
}

export async function pathExists(p: string): Promise<boolean> {
  return fse.pathExists(p);
}

export async function isFile(p: string): Promise<boolean> {
  try {
    const stat = await fse.stat(p);
    return stat.isFile();
  } catch {
    return false;
  }
}

export async function readTextFile(filePath: string): Promise<string> {
  return fse.readFile(filePath, "utf8");
}

export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fse.writeFile(filePath, content, "utf8");
}

export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fse.writeFile(filePath, serializeJson(data), "utf8");
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const raw = await fse.readFile(filePath, "utf8");
  return JSON.parse(raw);
}

export function serializeJson(data: unknown): string {
  return JSON.stringify(data, null, 2) + "\n";
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function tail(text: string, maxLines: number): string {
  const lines = text.trimEnd().split(/\r?\n/);
  return lines.slice(-maxLines).join("\n");
}
