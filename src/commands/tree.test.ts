import { describe, it, expect } from "vitest";
import { NoteIndex } from "../lib/hierarchy.js";
import type { Frontmatter, Note } from "../lib/models.js";
import { treeLines } from "./tree.js";

function note(id: string, frontmatter: Frontmatter, body = ""): Note {
  return { id, path: `/vault/${id}.md`, archived: false, frontmatter, body };
}

describe("treeLines", () => {
  const index = NoteIndex.fromNotes([
    note("demo", { type: "project" }, "# Demo Project\n"),
    note("demo.g", { type: "task", status: "in-progress" }),
    note("demo.g.sub", { type: "task", status: "todo" }),
    note("demo.t1", { type: "task", status: "done" }, "# T1\n"),
    note("ideas", { type: "note" }),
  ]);

  it("should walk every root depth first", () => {
    expect(treeLines(index)).toEqual([
      { depth: 0, id: "demo", title: "Demo Project", kind: "project" },
      { depth: 1, id: "demo.g", title: "G", kind: "group", status: "doing" },
      { depth: 2, id: "demo.g.sub", title: "Sub", kind: "task", status: "todo" },
      { depth: 1, id: "demo.t1", title: "T1", kind: "task", status: "done" },
      { depth: 0, id: "ideas", title: "Ideas", kind: "note" },
    ]);
  });

  it("should start from the given notes", () => {
    expect(treeLines(index, ["demo.g"]).map((line) => [line.depth, line.id])).toEqual([
      [0, "demo.g"],
      [1, "demo.g.sub"],
    ]);
  });

  it("should list each note once in a parent cycle", () => {
    const looped = NoteIndex.fromNotes([
      note("a", { type: "note", parent: "b" }),
      note("b", { type: "note", parent: "a" }),
    ]);
    expect(treeLines(looped, ["a"]).map((line) => [line.depth, line.id])).toEqual([
      [0, "a"],
      [1, "b"],
    ]);
  });

  it("should skip unknown roots", () => {
    expect(treeLines(index, ["missing"])).toEqual([]);
  });
});
