import { createHash, randomUUID } from "node:crypto";

export function isoNow(): string {
  return new Date().toISOString();
}

export function defaultSessionId(): string {
  // YYYYMMDD-HHMMSS-xxxx
  const d = new Date();
  const yyyy = d.getUTCFullYear();
  const mm = String(d.getUTCMonth() + 1).padStart(2, "0");
  const dd = String(d.getUTCDate()).padStart(2, "0");
  const hh = String(d.getUTCHours()).padStart(2, "0");
  const mi = String(d.getUTCMinutes()).padStart(2, "0");
  const ss = String(d.getUTCSeconds()).padStart(2, "0");
  return `${yyyy}${mm}${dd}-${hh}${mi}${ss}-${randomUUID().slice(0, 4)}`;
}

export function dateStamp(d: Date = new Date()): string {
  const yyyy = d.getFullYear();
  const mm = String(d.getMonth() + 1).padStart(2, "0");
  const dd = String(d.getDate()).padStart(2, "0");
  return `${yyyy}${mm}${dd}`;
}

export function taskIdForText(text: string): string {
  const digest = createHash("sha1").update(text.trim()).digest("hex");
  return `task-${digest.slice(0, 12)}`;
}

export function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) : text;
}
