/**
 * Tests for vault storage: identifiers, templates and note creation.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  AlreadyExistsError,
  InvalidIdentifierError,
  MissingSectionError,
  NotFoundError,
  VaultNotInitializedError,
} from "./errors.js";
import { silentLogger } from "./logger.js";
import {
  createNote,
  formatTitle,
  identifierToPath,
  initVault,
  isValidIdentifier,
  listIdentifiers,
  listReferences,
  noteTitle,
  openVault,
  parentOf,
  readAnyNote,
  readNote,
  renderTemplate,
  slugify,
  todayIso,
  type Vault,
} from "./vault.js";

const TODAY = "2024-01-01";

describe("Identifiers", () => {
  it("should validate dotted slugs", () => {
    expect(isValidIdentifier("demo")).toBe(true);
    expect(isValidIdentifier("demo.write-draft_2")).toBe(true);
    expect(isValidIdentifier("")).toBe(false);
    expect(isValidIdentifier("demo..t1")).toBe(false);
    expect(isValidIdentifier("demo.")).toBe(false);
    expect(isValidIdentifier("demo t1")).toBe(false);
    expect(isValidIdentifier("../etc")).toBe(false);
  });

  it("should derive the parent by dropping the last segment", () => {
    expect(parentOf("a.b.c")).toBe("a.b");
    expect(parentOf("a.b")).toBe("a");
    expect(parentOf("a")).toBeNull();
  });

  it("should slugify free text", () => {
    expect(slugify("Call Bob about the Q3 report!")).toBe("call_bob_about_the_q3_report");
    expect(slugify("  --keep-dashes--  ")).toBe("--keep-dashes--");
    expect(slugify("x".repeat(80))).toHaveLength(50);
  });

  it("should format titles from the last segment", () => {
    expect(formatTitle("demo.write-draft_v2")).toBe("Write Draft V2");
    expect(formatTitle("paper")).toBe("Paper");
  });

  it("should take the title from the first heading", () => {
    expect(noteTitle({ id: "demo.t1", body: "\n# My Task\n\n# Other\n" })).toBe("My Task");
    expect(noteTitle({ id: "demo.my-task", body: "no heading" })).toBe("My Task");
  });

  it("should map identifiers to paths", () => {
    expect(identifierToPath("demo.t1", "/vault")).toBe(path.join("/vault", "demo.t1.md"));
    expect(identifierToPath("demo.t1", "/vault", { archived: true })).toBe(
      path.join("/vault", "archive", "demo.t1.md"),
    );
  });

  it("should format today's date", () => {
    expect(todayIso(new Date(2024, 2, 5))).toBe("2024-03-05");
  });
});

describe("renderTemplate", () => {
  it("should insert values literally", () => {
    expect(
      renderTemplate("# {name} {parent}", { name: "$$ {parent} $'", parent: "p", parentTitle: "", date: TODAY }),
    ).toBe("# $$ {parent} $' p");
  });

  it("should substitute every placeholder", () => {
    const template = "# {name}\n[< {parent_title}]({parent})\n{date} {name}";
    expect(
      renderTemplate(template, { name: "t1", parent: "demo", parentTitle: "Demo", date: TODAY }),
    ).toBe("# t1\n[< Demo](demo)\n2024-01-01 t1");
  });
});

describe("Vault", () => {
  let tempDir: string;
  let vault: Vault;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "cairn-vault-test-"));
    initVault(tempDir, TODAY);
    vault = openVault(tempDir, silentLogger());
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("initVault", () => {
    it("should create the vault layout", () => {
      for (const dir of ["templates", "archive", "ref"]) {
        expect(fs.statSync(path.join(tempDir, dir)).isDirectory()).toBe(true);
      }
      for (const file of ["root.md", "backlog.md", "references.bib", "templates/task.md"]) {
        expect(fs.existsSync(path.join(tempDir, file))).toBe(true);
      }
      expect(fs.readFileSync(path.join(tempDir, "backlog.md"), "utf-8")).toBe(
        "---\ncreated: 2024-01-01\nmodified: 2024-01-01\n---\n# Backlog\n\n## Inbox\n",
      );
    });

    it("should leave an existing vault alone", () => {
      fs.writeFileSync(path.join(tempDir, "backlog.md"), "custom");
      expect(initVault(tempDir, TODAY)).toEqual([]);
      expect(fs.readFileSync(path.join(tempDir, "backlog.md"), "utf-8")).toBe("custom");
    });

    it("should refuse to open a directory without root.md", () => {
      const empty = fs.mkdtempSync(path.join(os.tmpdir(), "cairn-empty-"));
      try {
        expect(() => openVault(empty, silentLogger())).toThrow(VaultNotInitializedError);
      } finally {
        fs.rmSync(empty, { recursive: true, force: true });
      }
    });
  });

  describe("listIdentifiers", () => {
    it("should skip root, backlog and dotfiles", () => {
      fs.writeFileSync(path.join(tempDir, "b.md"), "");
      fs.writeFileSync(path.join(tempDir, "a.md"), "");
      fs.writeFileSync(path.join(tempDir, ".hidden.md"), "");
      fs.writeFileSync(path.join(tempDir, "notes.txt"), "");
      fs.writeFileSync(path.join(tempDir, "archive", "old.md"), "");

      expect(listIdentifiers(vault)).toEqual(["a", "b"]);
      expect(listIdentifiers(vault, { archived: true })).toEqual(["old"]);
    });
  });

  describe("createNote", () => {
    it("should create a project from its template", () => {
      const { note, linkedFrom } = createNote(vault, { type: "project", id: "demo", today: TODAY });

      expect(linkedFrom).toBeUndefined();
      expect(fs.readFileSync(note.path, "utf-8")).toBe(
        "---\ncreated: 2024-01-01\nmodified: 2024-01-01\ntype: project\nstatus: planning\n---\n" +
          "# demo\n\n## Goal\n\n## Tasks\n",
      );
    });

    it("should create a task and list it in the project", () => {
      createNote(vault, { type: "project", id: "demo", today: TODAY });
      const { note, linkedFrom } = createNote(vault, {
        type: "task",
        id: "demo.t1",
        name: "T1",
        today: TODAY,
      });

      expect(linkedFrom).toBe("demo");
      expect(note.frontmatter.parent).toBe("demo");
      expect(note.frontmatter.status).toBe("todo");
      expect(note.body).toBe("# T1\n\n[< demo](demo)\n\n## Description\n");

      const project = fs.readFileSync(path.join(tempDir, "demo.md"), "utf-8");
      expect(project.endsWith("## Tasks\n- [ ] [T1](demo.t1)\n")).toBe(true);
    });

    it("should put the description under its heading", () => {
      createNote(vault, { type: "project", id: "demo", today: TODAY });
      const { note } = createNote(vault, {
        type: "task",
        id: "demo.call",
        description: "Call the printer",
        today: TODAY,
      });
      expect(note.body.endsWith("## Description\nCall the printer\n")).toBe(true);
    });

    it("should keep dollar signs in descriptions and parent titles", () => {
      fs.writeFileSync(path.join(tempDir, "demo.md"), "---\ntype: project\n---\n# Save $$ now\n\n## Tasks\n");
      const { note: task } = createNote(vault, {
        type: "task",
        id: "demo.pay",
        description: "Pay $$100 and $' rest",
        today: TODAY,
      });
      expect(task.body).toBe("# pay\n\n[< Save $$ now](demo)\n\n## Description\nPay $$100 and $' rest\n");

      fs.writeFileSync(path.join(tempDir, "ideas.md"), "---\ntype: note\n---\n# Cost $& $`\n");
      const { note } = createNote(vault, { type: "note", id: "ideas.sub", today: TODAY });
      expect(note.body).toBe("# sub\n\n[< Cost $& $`](ideas)\n");
    });

    it("should add the parent field and back-link to child notes", () => {
      createNote(vault, { type: "note", id: "ideas", today: TODAY });
      const { note } = createNote(vault, { type: "note", id: "ideas.sub", today: TODAY });

      expect(note.frontmatter.parent).toBe("ideas");
      expect(note.body).toBe("# sub\n\n[< ideas](ideas)\n");
      expect(readNote(vault, "ideas.sub")).toEqual(note);
    });

    it("should reject invalid and misplaced identifiers", () => {
      expect(() => createNote(vault, { type: "note", id: "bad name" })).toThrow(InvalidIdentifierError);
      expect(() => createNote(vault, { type: "project", id: "a.b" })).toThrow(
        "Invalid name 'a.b': projects are top-level",
      );
      expect(() => createNote(vault, { type: "task", id: "lonely" })).toThrow(InvalidIdentifierError);
    });

    it("should fail before writing when the parent is unusable", () => {
      expect(() => createNote(vault, { type: "task", id: "nope.t1" })).toThrow(NotFoundError);
      expect(fs.existsSync(path.join(tempDir, "nope.t1.md"))).toBe(false);

      createNote(vault, { type: "note", id: "ideas", today: TODAY });
      expect(() => createNote(vault, { type: "task", id: "ideas.t1" })).toThrow(MissingSectionError);
      expect(fs.existsSync(path.join(tempDir, "ideas.t1.md"))).toBe(false);
    });

    it("should not overwrite an existing note", () => {
      createNote(vault, { type: "project", id: "demo", today: TODAY });
      expect(() => createNote(vault, { type: "project", id: "demo" })).toThrow(AlreadyExistsError);
    });

    it("should prefer the vault's own template", () => {
      fs.writeFileSync(
        path.join(tempDir, "templates", "note.md"),
        "---\ntype: note\nsource: custom\n---\n# {name} ({date})\n",
      );
      const { note } = createNote(vault, { type: "note", id: "jot", today: TODAY });
      expect(note.frontmatter).toEqual({ type: "note", source: "custom" });
      expect(note.body).toBe("# jot (2024-01-01)\n");
    });
  });

  describe("reading", () => {
    it("should fall back to the archive", () => {
      fs.writeFileSync(path.join(tempDir, "archive", "old.md"), "---\ntype: note\n---\n# Old\n");
      const note = readAnyNote(vault, "old");
      expect(note.archived).toBe(true);
      expect(() => readNote(vault, "old")).toThrow("Note not found: old");
      expect(() => readAnyNote(vault, "missing")).toThrow(NotFoundError);
    });

    it("should attribute malformed front-matter to the note", () => {
      fs.writeFileSync(path.join(tempDir, "broken.md"), "---\ntitle: [x\n---\n");
      expect(() => readNote(vault, "broken")).toThrow(/^Malformed front-matter in broken: /);
    });
  });

  describe("listReferences", () => {
    it("should read reference metadata and skip malformed files", () => {
      fs.writeFileSync(
        path.join(tempDir, "ref", "smith2020.md"),
        "---\ntitle: Graphs\nauthors:\n  - Smith\n  - Jones\nyear: 2020\ndoi: 10.1000/test\ntags: [graphs]\n---\n",
      );
      fs.writeFileSync(path.join(tempDir, "ref", "lee2019.md"), "# Untitled Paper\n");
      fs.writeFileSync(path.join(tempDir, "ref", "bad.md"), "---\ntitle: [x\n---\n");

      expect(listReferences(vault)).toEqual([
        {
          citekey: "lee2019",
          title: "Untitled Paper",
          authors: [],
          year: undefined,
          journal: undefined,
          doi: undefined,
          tags: [],
        },
        {
          citekey: "smith2020",
          title: "Graphs",
          authors: ["Smith", "Jones"],
          year: 2020,
          journal: undefined,
          doi: "10.1000/test",
          tags: ["graphs"],
        },
      ]);
    });
  });
});
