import { randomUUID } from "node:crypto";

export function padIndex(index: number, total: number): string {
  const digits = Math.max(3, String(total).length);
  return String(index + 1).padStart(digits, "0");
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  if (minutes === 0) return `${seconds}s`;
  return `${minutes}:${String(remainingSeconds).padStart(2, "0")}`;
}

/** Short id for a grid batch, e.g. "3f9c2a1b". */
export function createUniqueId(): string {
  return randomUUID().slice(0, 8);
}

export function truncateLabel(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, Math.max(0, maxLength - 3))}...`;
}

export function formatProgress(received: number, expected: number): string {
  return `Grid progress: ${received}/${expected} images`;
}
