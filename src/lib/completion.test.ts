import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  complete,
  completeExistingName,
  completeGroupName,
  completeNewName,
  completeNewParent,
  completeProject,
  completeProjectTasks,
  completeStatus,
  completeTaskName,
  isCompletionKind,
  prefixThenFuzzy,
} from "./completion.js";
import { NoteIndex } from "./hierarchy.js";
import { silentLogger } from "./logger.js";
import type { Frontmatter, Note } from "./models.js";
import { initVault, openVault, type Vault } from "./vault.js";

function note(id: string, frontmatter: Frontmatter): Note {
  return { id, path: `/vault/${id}.md`, archived: false, frontmatter, body: "" };
}

const index = NoteIndex.fromNotes([
  note("demo", { type: "project" }),
  note("demo.g", { type: "task", status: "todo" }),
  note("demo.g.sub", { type: "task", status: "todo" }),
  note("demo.t1", { type: "task", status: "done" }),
  note("ideas", { type: "note" }),
  note("paper", { type: "project" }),
]);

describe("prefixThenFuzzy", () => {
  it("should fall back to fuzzy matches only without prefixes", () => {
    expect(prefixThenFuzzy(["alpha", "beta"], "al")).toEqual(["alpha"]);
    expect(prefixThenFuzzy(["alpha", "beta"], "bt")).toEqual(["beta"]);
    expect(prefixThenFuzzy(["alpha", "beta"], "")).toEqual(["alpha", "beta"]);
  });
});

describe("index completions", () => {
  it("should complete projects", () => {
    expect(completeProject(index, "")).toEqual(["demo", "paper"]);
    expect(completeProject(index, "p")).toEqual(["paper"]);
  });

  it("should offer parent prefixes for new names", () => {
    expect(completeNewName(index, "task", "")).toEqual(["demo.", "paper."]);
    expect(completeNewName(index, "task", "d")).toEqual(["demo."]);
    expect(completeNewName(index, "task", "demo.")).toEqual(["demo.g."]);
    expect(completeNewName(index, "note", "i")).toEqual(["ideas."]);
    expect(completeNewName(index, "project", "d")).toEqual([]);
    expect(completeNewName(index, "task", "demo.g.x")).toEqual([]);
  });

  it("should complete task names", () => {
    expect(completeTaskName(index, "demo.t")).toEqual(["demo.t1"]);
    expect(completeTaskName(index, "sub")).toEqual(["demo.g.sub"]);
  });

  it("should complete statuses alphabetically", () => {
    expect(completeStatus("")).toEqual(["blocked", "doing", "done", "dropped", "todo"]);
    expect(completeStatus("d")).toEqual(["doing", "done", "dropped"]);
  });

  it("should complete rename destinations", () => {
    expect(completeNewParent(index, "")).toEqual(["demo", "paper"]);
    expect(completeNewParent(index, "demo.")).toEqual(["demo.g"]);
    expect(completeNewParent(index, "nope.x")).toEqual([]);
  });

  it("should offer projects for new groups", () => {
    expect(completeGroupName(index, "")).toEqual(["demo.", "paper."]);
    expect(completeGroupName(index, "p")).toEqual(["paper."]);
    expect(completeGroupName(index, "demo.w")).toEqual([]);
  });

  it("should complete the tasks of the group's project", () => {
    expect(completeProjectTasks(index, "demo.writing", "")).toEqual(["g", "t1"]);
    expect(completeProjectTasks(index, "demo.writing", "t")).toEqual(["t1"]);
    expect(completeProjectTasks(index, "paper.x", "")).toEqual([]);
    expect(completeProjectTasks(index, "", "")).toEqual([]);
  });

  it("should recognize completion kinds", () => {
    expect(isCompletionKind("status")).toBe(true);
    expect(isCompletionKind("bogus")).toBe(false);
  });
});

describe("completeExistingName", () => {
  let tempDir: string;
  let vault: Vault;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "cairn-complete-test-"));
    initVault(tempDir, "2024-01-01");
    vault = openVault(tempDir, silentLogger());
    for (const id of ["demo", "demo.write", "paper"]) {
      fs.writeFileSync(path.join(tempDir, `${id}.md`), "");
    }
    fs.writeFileSync(path.join(tempDir, "archive", "thesis.md"), "");
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("should prefer prefix matches", () => {
    expect(completeExistingName(vault, "de")).toEqual(["demo", "demo.write"]);
    expect(completeExistingName(vault, "dw")).toEqual(["demo.write"]);
  });

  it("should offer archived notes only when asked", () => {
    expect(completeExistingName(vault, "th")).toEqual([]);
    expect(completeExistingName(vault, "th", { includeArchived: true })).toEqual(["archive/thesis"]);
    expect(completeExistingName(vault, "archive/")).toEqual(["archive/thesis"]);
  });

  it("should dispatch by kind", () => {
    expect(complete(vault, index, "status", "to")).toEqual(["todo"]);
    expect(complete(vault, index, "archived-name", "thes")).toEqual(["archive/thesis"]);
    expect(complete(vault, index, "group", "d")).toEqual(["demo."]);
    expect(complete(vault, index, "project-task", "", "demo.writing")).toEqual(["g", "t1"]);
  });
});
