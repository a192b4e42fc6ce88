/**
 * Tests for status changes and parent checklist propagation.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { InvalidStatusError, NotFoundError } from "./errors.js";
import { silentLogger } from "./logger.js";
import { STATUS_GLYPHS, TASK_STATUSES } from "./models.js";
import { parseStatus, setStatus, syncParentCheckbox } from "./tasks.js";
import { createNote, initVault, openVault, readNote, type Vault } from "./vault.js";

const TODAY = "2024-01-01";

describe("parseStatus", () => {
  it("should normalize aliases", () => {
    expect(parseStatus("in-progress")).toBe("doing");
    expect(parseStatus("DONE")).toBe("done");
  });

  it("should reject unknown statuses", () => {
    expect(() => parseStatus("finished", "demo.t1")).toThrow(InvalidStatusError);
    expect(() => parseStatus("finished", "demo.t1")).toThrow(
      "Invalid status 'finished' for demo.t1 (expected one of: todo, doing, done, blocked, dropped, in-progress)",
    );
  });
});

describe("Task status", () => {
  let tempDir: string;
  let vault: Vault;

  const read = (file: string) => fs.readFileSync(path.join(tempDir, file), "utf-8");

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "cairn-tasks-test-"));
    initVault(tempDir, TODAY);
    vault = openVault(tempDir, silentLogger());
    createNote(vault, { type: "project", id: "demo", today: TODAY });
    createNote(vault, { type: "task", id: "demo.t1", name: "T1", today: TODAY });
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should check the parent's box when a task is done", () => {
    expect(read("demo.md")).toContain("- [ ] [T1](demo.t1)");

    const change = setStatus(vault, "demo.t1", "done", { today: "2024-02-02" });

    expect(change.previous).toBe("todo");
    expect(change.sync).toEqual({
      outcome: "updated",
      parent: "demo",
      path: path.join(tempDir, "demo.md"),
    });
    expect(read("demo.md").endsWith("## Tasks\n- [x] [T1](demo.t1)\n")).toBe(true);

    const task = readNote(vault, "demo.t1");
    expect(task.frontmatter.status).toBe("done");
    expect(task.frontmatter.modified).toBe("2024-02-02");
    expect(task.frontmatter.created).toBe(TODAY);
  });

  it("should write the glyph of every status", () => {
    for (const status of TASK_STATUSES) {
      setStatus(vault, "demo.t1", status, { today: TODAY });
      expect(read("demo.md")).toContain(`- [${STATUS_GLYPHS[status]}] [T1](demo.t1)`);
    }
  });

  it("should be idempotent apart from the modified date", () => {
    setStatus(vault, "demo.t1", "done", { today: "2024-02-02" });
    const task = read("demo.t1.md");
    const project = read("demo.md");

    const again = setStatus(vault, "demo.t1", "done", { today: "2024-03-03" });

    expect(again.sync).toEqual({ outcome: "unchanged", parent: "demo" });
    expect(read("demo.md")).toBe(project);
    expect(read("demo.t1.md")).toBe(task.replace("modified: 2024-02-02", "modified: 2024-03-03"));
  });

  it("should leave the rest of the parent untouched", () => {
    const custom = "---\n# odd: spacing kept\ntype:   project\n---\n# Demo\n\n## Tasks\n- [ ] [T1](demo.t1)\n";
    fs.writeFileSync(path.join(tempDir, "demo.md"), custom);

    setStatus(vault, "demo.t1", "blocked", { today: TODAY });

    expect(read("demo.md")).toBe(custom.replace("- [ ]", "- [~]"));
  });

  it("should not cascade beyond the immediate parent", () => {
    fs.writeFileSync(
      path.join(tempDir, "demo.md"),
      "---\ntype: project\n---\n## Tasks\n- [ ] [T1](demo.t1)\n",
    );
    fs.writeFileSync(
      path.join(tempDir, "demo.t1.md"),
      "---\ntype: task\nstatus: todo\nparent: demo\n---\n## Tasks\n- [ ] [Sub](demo.t1.sub)\n",
    );
    fs.writeFileSync(
      path.join(tempDir, "demo.t1.sub.md"),
      "---\ntype: task\nstatus: todo\nparent: demo.t1\n---\n",
    );

    const change = setStatus(vault, "demo.t1.sub", "done", { today: TODAY });

    expect(change.sync).toMatchObject({ outcome: "updated", parent: "demo.t1" });
    expect(read("demo.t1.md")).toContain("- [x] [Sub](demo.t1.sub)");
    expect(read("demo.md")).toContain("- [ ] [T1](demo.t1)");
  });

  it("should update a parent written with CRLF line breaks", () => {
    const custom = "---\r\ntype: project\r\n---\r\n# Demo\r\n\r\n## Tasks\r\n- [ ] [T1](demo.t1)\r\n";
    fs.writeFileSync(path.join(tempDir, "demo.md"), custom);

    const change = setStatus(vault, "demo.t1", "done", { today: TODAY });

    expect(change.sync).toMatchObject({ outcome: "updated", parent: "demo" });
    expect(read("demo.md")).toBe(custom.replace("- [ ]", "- [x]"));
  });

  it("should tolerate a parent without an entry", () => {
    fs.writeFileSync(path.join(tempDir, "demo.md"), "---\ntype: project\n---\n## Tasks\n");

    const change = setStatus(vault, "demo.t1", "done", { today: TODAY });

    expect(change.sync).toEqual({ outcome: "no-entry", parent: "demo" });
    expect(readNote(vault, "demo.t1").frontmatter.status).toBe("done");
  });

  it("should tolerate a missing parent", () => {
    fs.rmSync(path.join(tempDir, "demo.md"));
    expect(setStatus(vault, "demo.t1", "doing", { today: TODAY }).sync).toEqual({
      outcome: "parent-missing",
      parent: "demo",
    });
  });

  it("should do nothing for top-level notes", () => {
    expect(syncParentCheckbox(vault, "demo", "done")).toEqual({ outcome: "no-parent" });
  });

  it("should follow archived tasks and archive/ links", () => {
    fs.renameSync(path.join(tempDir, "demo.t1.md"), path.join(tempDir, "archive", "demo.t1.md"));
    const project = read("demo.md").replace("](demo.t1)", "](archive/demo.t1)");
    fs.writeFileSync(path.join(tempDir, "demo.md"), project);

    const change = setStatus(vault, "demo.t1", "dropped", { today: TODAY });

    expect(change.note.archived).toBe(true);
    expect(read("demo.md")).toContain("- [o] [T1](archive/demo.t1)");
  });

  it("should sync from the stored status", () => {
    fs.writeFileSync(
      path.join(tempDir, "demo.t1.md"),
      "---\ntype: task\nstatus: in-progress\nparent: demo\n---\n",
    );
    expect(syncParentCheckbox(vault, "demo.t1").outcome).toBe("updated");
    expect(read("demo.md")).toContain("- [.] [T1](demo.t1)");
  });

  it("should validate before touching anything", () => {
    const before = read("demo.t1.md");
    expect(() => setStatus(vault, "demo.t1", "finished")).toThrow(InvalidStatusError);
    expect(read("demo.t1.md")).toBe(before);
    expect(() => setStatus(vault, "demo.nope", "done")).toThrow(NotFoundError);
  });
});
