import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { MarkdownTodoSource, parseTodoMarkdown } from "./markdown-todo-source.js";

let tmpDir: string;
let todoPath: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "todo-source-"));
  todoPath = path.join(tmpDir, "TODO.md");
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

const SAMPLE = [
  "# TODO",
  "",
  "- [ ] add feature A",
  "- [x] write docs",
  "  * [ ] nested item",
  "- plain bullet task",
  "- [x] old task <!-- skipped: cleared -->",
  "",
  "Notes: not a task",
  "",
].join("\n");

describe("parseTodoMarkdown", () => {
  it("reads checkboxes, plain bullets and trailing comments", () => {
    const items = parseTodoMarkdown(SAMPLE).map(({ text, done, comment, lineIndex }) => ({
      text,
      done,
      comment,
      lineIndex,
    }));

    expect(items).toEqual([
      { text: "add feature A", done: false, comment: undefined, lineIndex: 2 },
      { text: "write docs", done: true, comment: undefined, lineIndex: 3 },
      { text: "nested item", done: false, comment: undefined, lineIndex: 4 },
      { text: "plain bullet task", done: false, comment: undefined, lineIndex: 5 },
      { text: "old task", done: true, comment: "skipped: cleared", lineIndex: 6 },
    ]);
  });
});

describe("MarkdownTodoSource", () => {
  it("returns no items when the file is missing", async () => {
    const source = new MarkdownTodoSource(todoPath);

    expect(await source.list()).toEqual([]);
  });

  it("marks an item done in place", async () => {
    fs.writeFileSync(todoPath, SAMPLE);
    const source = new MarkdownTodoSource(todoPath);

    await source.markDone("add feature A");
    await source.markDone("nested item");
    await source.markDone("plain bullet task");

    const lines = fs.readFileSync(todoPath, "utf8").split("\n");
    expect(lines.slice(2, 6)).toEqual([
      "- [x] add feature A",
      "- [x] write docs",
      "  * [x] nested item",
      "- [x] plain bullet task",
    ]);
  });

  it("records the skip reason as a comment", async () => {
    fs.writeFileSync(todoPath, SAMPLE);
    const source = new MarkdownTodoSource(todoPath);

    await source.markSkipped("add feature A", "Skipped by operator request");

    const items = await source.list();
    expect(items[0]).toEqual({
      text: "add feature A",
      done: true,
      comment: "skipped: Skipped by operator request",
    });
    expect(fs.readFileSync(todoPath, "utf8").split("\n")[2]).toBe(
      "- [x] add feature A <!-- skipped: Skipped by operator request -->",
    );
  });

  it("ticks items whose text has repeated inner spaces", async () => {
    fs.writeFileSync(todoPath, "- [ ] fix  the   parser\n- [ ] tidy   docs\n");
    const source = new MarkdownTodoSource(todoPath);
    const [first, second] = await source.list();

    await source.markDone(first?.text ?? "");
    await source.markSkipped(second?.text ?? "", "cleared");

    expect(fs.readFileSync(todoPath, "utf8")).toBe(
      "- [x] fix  the   parser\n- [x] tidy   docs <!-- skipped: cleared -->\n",
    );
    expect((await source.list()).map((item) => item.text)).toEqual(["fix  the   parser", "tidy   docs"]);
  });

  it("leaves the file alone when the item is unknown", async () => {
    fs.writeFileSync(todoPath, SAMPLE);
    const source = new MarkdownTodoSource(todoPath);

    await source.markDone("missing task");

    expect(fs.readFileSync(todoPath, "utf8")).toBe(SAMPLE);
  });

  it("inserts new items before the first and after the last task", async () => {
    fs.writeFileSync(todoPath, SAMPLE);
    const source = new MarkdownTodoSource(todoPath);

    await source.insertAtHead("urgent fix");
    await source.insertAtTail("later cleanup");

    const texts = (await source.list()).map((item) => item.text);
    expect(texts[0]).toBe("urgent fix");
    expect(texts[texts.length - 1]).toBe("later cleanup");
    expect(fs.readFileSync(todoPath, "utf8").split("\n").slice(0, 4)).toEqual([
      "# TODO",
      "",
      "- [ ] urgent fix",
      "- [ ] add feature A",
    ]);
  });

  it("creates the file when inserting into an empty list", async () => {
    const source = new MarkdownTodoSource(todoPath);

    await source.insertAtTail("first\ntask");

    expect(fs.readFileSync(todoPath, "utf8")).toBe("- [ ] first task\n");
  });
});
