/**
 * Markdown checklist adapter for the TODO source port.
 * Purpose: read `- [ ]` / `- [x]` items (and plain bullets) from a TODO file and write state changes back.
 * Assumptions: only the orchestration loop writes the file; an item is identified by its trimmed text.
 */

import path from "node:path";

import fse from "fs-extra";

import type { TodoItem, TodoSource } from "../app/orchestrator/ports.js";

// =============================================================================
// PARSING
// =============================================================================

export type TodoLine = TodoItem & {
  lineIndex: number;
  indent: string;
  bullet: string;
  checkbox: boolean;
};

const CHECKBOX_LINE = /^(\s*)([-*+])\s+\[([ xX])\]\s*(.+?)\s*$/;
const PLAIN_BULLET_LINE = /^(\s*)([-*+])\s+(?!\[[ xX]\])(.+?)\s*$/;
const TRAILING_COMMENT = /\s*<!--\s*(.*?)\s*-->\s*$/;

export function parseTodoMarkdown(content: string): TodoLine[] {
  const items: TodoLine[] = [];

  content.split("\n").forEach((rawLine, lineIndex) => {
    const line = rawLine.replace(/\r$/, "");
    const checkbox = CHECKBOX_LINE.exec(line);
    if (checkbox) {
      const [, indent = "", bullet = "-", mark = " ", body = ""] = checkbox;
      items.push({
        ...splitComment(body),
        done: mark.toLowerCase() === "x",
        lineIndex,
        indent,
        bullet,
        checkbox: true,
      });
      return;
    }

    const plain = PLAIN_BULLET_LINE.exec(line);
    if (plain) {
      const [, indent = "", bullet = "-", body = ""] = plain;
      items.push({ ...splitComment(body), done: false, lineIndex, indent, bullet, checkbox: false });
    }
  });

  return items.filter((item) => item.text.length > 0);
}

export function formatTodoLine(text: string, done: boolean, comment?: string): string {
  const suffix = comment ? ` <!-- ${comment} -->` : "";
  return `- [${done ? "x" : " "}] ${normalizeText(text)}${suffix}`;
}

function splitComment(body: string): { text: string; comment?: string } {
  const match = TRAILING_COMMENT.exec(body);
  if (!match) {
    return { text: body.trim() };
  }
  return { text: body.slice(0, match.index).trim(), comment: match[1] };
}

function normalizeText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

// =============================================================================
// SOURCE
// =============================================================================

export class MarkdownTodoSource implements TodoSource {
  constructor(public readonly filePath: string) {}

  async list(): Promise<TodoItem[]> {
    const content = await this.read();
    return parseTodoMarkdown(content).map(({ text, done, comment }) =>
      comment === undefined ? { text, done } : { text, done, comment },
    );
  }

  async markDone(text: string): Promise<void> {
    await this.rewriteItem(text, (item) => formatIndented(item, true, item.comment));
  }

  async markSkipped(text: string, reason: string): Promise<void> {
    await this.rewriteItem(text, (item) =>
      formatIndented(item, true, `skipped: ${normalizeText(reason)}`),
    );
  }

  async insertAtHead(text: string): Promise<void> {
    const lines = splitLines(await this.read());
    const first = parseTodoMarkdown(lines.join("\n"))[0];
    const index = first ? first.lineIndex : contentEnd(lines);
    lines.splice(index, 0, formatTodoLine(text, false));
    await this.write(lines);
  }

  async insertAtTail(text: string): Promise<void> {
    const lines = splitLines(await this.read());
    const items = parseTodoMarkdown(lines.join("\n"));
    const last = items[items.length - 1];
    const index = last ? last.lineIndex + 1 : contentEnd(lines);
    lines.splice(index, 0, formatTodoLine(text, false));
    await this.write(lines);
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async rewriteItem(text: string, render: (item: TodoLine) => string): Promise<void> {
    const lines = splitLines(await this.read());
    const target = normalizeText(text);
    const items = parseTodoMarkdown(lines.join("\n"));
    const matches = items.filter((entry) => normalizeText(entry.text) === target);
    const item = matches.find((entry) => !entry.done) ?? matches[0];
    if (!item) return;

    lines[item.lineIndex] = render(item);
    await this.write(lines);
  }

  private async read(): Promise<string> {
    if (!(await fse.pathExists(this.filePath))) {
      return "";
    }
    return fse.readFile(this.filePath, "utf8");
  }

  private async write(lines: string[]): Promise<void> {
    const content = `${lines.join("\n").replace(/\n+$/, "")}\n`;
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await fse.ensureDir(path.dirname(this.filePath));
    await fse.writeFile(tempPath, content, "utf8");
    await fse.rename(tempPath, this.filePath);
  }
}

// Keeps the item's own text so list() keeps returning the same task text.
function formatIndented(item: TodoLine, done: boolean, comment?: string): string {
  const suffix = comment ? ` <!-- ${comment} -->` : "";
  return `${item.indent}${item.bullet} [${done ? "x" : " "}] ${item.text}${suffix}`;
}

function splitLines(content: string): string[] {
  return content.length === 0 ? [] : content.split("\n");
}

// Index just past the last non-blank line.
function contentEnd(lines: string[]): number {
  let end = lines.length;
  while (end > 0 && (lines[end - 1] ?? "").trim().length === 0) {
    end -= 1;
  }
  return end;
}
