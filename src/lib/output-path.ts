import os from "node:os";
import path from "node:path";

function pad(value: number) {
  return String(value).padStart(2, "0");
}

export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

export function generateFilename(format = "PNG", now = new Date()): string {
  return `screenshot_${formatTimestamp(now)}.${format.trim().toLowerCase()}`;
}

export function expandHome(target: string, home = os.homedir()): string {
  if (target === "~") return home;
  if (target.startsWith("~/") || target.startsWith("~\\")) {
    return path.join(home, target.slice(2));
  }
  return target;
}

type OutputPathInput = {
  output?: string;
  directory: string;
  format: string;
  now?: Date;
};

export function resolveOutputPath({ output, directory, format, now }: OutputPathInput): string {
  if (output) return expandHome(output);
  return path.join(directory, generateFilename(format, now));
}
