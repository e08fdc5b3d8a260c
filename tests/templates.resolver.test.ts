import { afterEach, beforeEach, describe, it } from "mocha";
import { expect } from "chai";

import { TemplateResolutionError } from "../src/errors.js";
import { ChatMemoryStore, type ChatMemory } from "../src/memory/store.js";
import { openDatabase, type SqliteDatabase } from "../src/persistence/database.js";
import { SqliteMemoryRepository } from "../src/persistence/memoryRepository.js";
import type { JsonValue } from "../src/persistence/types.js";
import { parsePath, readResultPath } from "../src/templates/path.js";
import {
  inferTags,
  resolveArguments,
  resolveTemplates,
  toolAlias,
  type ResolvableAction,
} from "../src/templates/resolver.js";

function completed(
  id: string,
  orderIndex: number,
  toolName: string,
  result: JsonValue,
  resultVariableName: string | null = null,
): ResolvableAction {
  return { id, plannedId: null, orderIndex, toolName, result, resultVariableName };
}

async function captureResolution(promise: Promise<unknown>): Promise<TemplateResolutionError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof TemplateResolutionError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a TemplateResolutionError");
}

describe("template resolver", () => {
  const production = completed("a1", 0, "get_production_data", { rows: [{ qty: 5 }], total: 5 });

  describe("local actions", () => {
    it("keeps the referenced type for whole-string placeholders", async () => {
      const resolved = await resolveArguments(
        { count: "{{a1.total}}", padded: " {{ a1.total }} ", rows: "{{a1.rows}}" },
        { completedActions: [production], chatId: "chat" },
      );
      expect(resolved).to.deep.equal({ count: 5, padded: 5, rows: [{ qty: 5 }] });
    });

    it("stringifies embedded placeholders", async () => {
      const resolved = await resolveTemplates("Total: {{a1.total}} units, rows {{a1.rows}}", {
        completedActions: [production],
        chatId: "chat",
      });
      expect(resolved).to.equal('Total: 5 units, rows [{"qty":5}]');
    });

    it("returns the whole result when no path is given", async () => {
      const resolved = await resolveTemplates("{{a1}}", { completedActions: [production], chatId: "chat" });
      expect(resolved).to.deep.equal({ rows: [{ qty: 5 }], total: 5 });
    });

    it("walks nested objects and arrays", async () => {
      const resolved = await resolveTemplates(
        { outer: [{ inner: "{{a1.rows[0].qty}}" }, "plain", 7, null] },
        { completedActions: [production], chatId: "chat" },
      );
      expect(resolved).to.deep.equal({ outer: [{ inner: 5 }, "plain", 7, null] });
    });

    it("matches the id the planner gave an action", async () => {
      const drafted: ResolvableAction = {
        ...completed("3f2c9d", 0, "generate_pdf", { url: "http://127.0.0.1/r.pdf" }),
        plannedId: "A",
      };
      const context = { completedActions: [drafted], chatId: "chat" };

      expect(await resolveTemplates("{{A.url}}", context)).to.equal("http://127.0.0.1/r.pdf");
      expect(await resolveTemplates("{{3f2c9d.url}}", context)).to.equal("http://127.0.0.1/r.pdf");
    });

    it("resolves result variables, positional and tool aliases", async () => {
      const actions = [
        completed("x1", 0, "generate_pdf", { url: "http://127.0.0.1/r.pdf" }, "report"),
        completed("x2", 1, "shorten_link", { short: "http://127.0.0.1/s/1" }),
      ];
      const context = { completedActions: actions, chatId: "chat" };

      expect(await resolveTemplates("{{report.url}}", context)).to.equal("http://127.0.0.1/r.pdf");
      expect(await resolveTemplates("{{previous.short}}", context)).to.equal("http://127.0.0.1/s/1");
      expect(await resolveTemplates("{{LAST.short}}", context)).to.equal("http://127.0.0.1/s/1");
      expect(await resolveTemplates("{{step_1.url}}", context)).to.equal("http://127.0.0.1/r.pdf");
      expect(await resolveTemplates("{{generate_pdf_result.url}}", context)).to.equal("http://127.0.0.1/r.pdf");
    });

    it("prefers the most recent action of an aliased tool", async () => {
      const actions = [
        completed("p1", 0, "generate_pdf", { url: "first" }),
        completed("p2", 1, "generate_pdf", { url: "second" }),
      ];
      expect(await resolveTemplates("{{generate_pdf_output.url}}", { completedActions: actions, chatId: "chat" })).to.equal(
        "second",
      );
    });

    it("falls back to data envelopes and the first list item", async () => {
      const actions = [
        completed("d1", 0, "fetch_report", { data: { url: "http://127.0.0.1/d.pdf" } }),
        completed("s1", 1, "web_search", { results: [{ link: "http://127.0.0.1/hit" }, { link: "other" }] }),
      ];
      const context = { completedActions: actions, chatId: "chat" };

      expect(await resolveTemplates("{{d1.url}}", context)).to.equal("http://127.0.0.1/d.pdf");
      expect(await resolveTemplates("{{s1.link}}", context)).to.equal("http://127.0.0.1/hit");
      expect(await resolveTemplates("{{s1.results[1].link}}", context)).to.equal("other");
    });

    it("never expands substituted values again", async () => {
      const actions = [completed("n1", 0, "echo", { note: "{{n1.note}} and {{secret}}" })];
      expect(await resolveTemplates("{{n1.note}}", { completedActions: actions, chatId: "chat" })).to.equal(
        "{{n1.note}} and {{secret}}",
      );
    });

    it("leaves strings without placeholders untouched", async () => {
      expect(await resolveTemplates("{ not a placeholder }", { completedActions: [], chatId: "chat" })).to.equal(
        "{ not a placeholder }",
      );
    });
  });

  describe("chat memory", () => {
    let database: SqliteDatabase;
    let memory: ChatMemory;

    beforeEach(() => {
      database = openDatabase();
      memory = new ChatMemoryStore({ repository: new SqliteMemoryRepository({ database }) }).forChat("chat-m");
    });

    afterEach(() => {
      database.close();
    });

    it("finds values by exact key", async () => {
      await memory.put({ key: "invoice", value: { url: "http://127.0.0.1/i.pdf" }, tags: [] });
      expect(await resolveTemplates("{{invoice.url}}", { completedActions: [], memory, chatId: "chat-m" })).to.equal(
        "http://127.0.0.1/i.pdf",
      );
    });

    it("finds values by the tool that produced them", async () => {
      await memory.put({ key: "tool_result_old", value: { url: "http://127.0.0.1/p.pdf" }, tags: [], sourceTool: "generate_pdf" });
      expect(
        await resolveTemplates("{{generate_pdf_result.url}}", { completedActions: [], memory, chatId: "chat-m" }),
      ).to.equal("http://127.0.0.1/p.pdf");
    });

    it("falls back to tag heuristics and skips entries missing the path", async () => {
      await memory.put({ key: "k1", value: { file_url: "http://127.0.0.1/f.pdf" }, tags: ["file", "pdf"], sourceTool: "make_doc" });
      await memory.put({ key: "k2", value: { size: 10 }, tags: ["file"], sourceTool: "make_doc" });

      expect(
        await resolveTemplates("{{attachment.file_url}}", { completedActions: [], memory, chatId: "chat-m" }),
      ).to.equal("http://127.0.0.1/f.pdf");
    });

    it("names every strategy tried when nothing matches", async () => {
      const error = await captureResolution(
        resolveTemplates("{{a1.url}}", {
          completedActions: [completed("a1", 0, "lookup", { id: 1 })],
          memory,
          chatId: "chat-m",
        }),
      );
      expect(error.identifier).to.equal("a1");
      expect(error.path).to.equal("url");
      expect(error.strategies).to.deep.equal([
        "action_id",
        "path_miss:a1",
        "memory_key",
        "memory_tool",
        "memory_tag:file",
        "memory_tag:pdf",
      ]);
    });
  });

  it("reports unresolvable placeholders without memory", async () => {
    const error = await captureResolution(resolveTemplates("{{missing.url}}", { completedActions: [], chatId: "chat" }));
    expect(error.message).to.equal(
      "unable to resolve {{missing.url}} (tried: action_id, result_variable, positional, tool_alias)",
    );
    expect(error.code).to.equal("E-TEMPLATE");
  });

  it("refuses arguments nested beyond the depth limit", async () => {
    let nested: JsonValue = "{{a1.total}}";
    for (let level = 0; level < 40; level += 1) {
      nested = [nested];
    }
    const error = await captureResolution(resolveTemplates(nested, { completedActions: [production], chatId: "chat" }));
    expect(error.message).to.equal("arguments nest deeper than 32 levels");
  });

  it("exposes the helper heuristics", () => {
    expect(toolAlias("Create_PDF_action")).to.equal("create_pdf");
    expect(toolAlias("previous")).to.equal("previous");
    expect(inferTags({ identifier: "email_step", rawPath: "body" })).to.deep.equal(["email"]);
    expect(inferTags({ identifier: "machine_report", rawPath: null })).to.deep.equal(["file", "pdf", "data"]);
    expect(parsePath("results[0].url")).to.deep.equal(["results", 0, "url"]);
    expect(readResultPath({ result: { ok: null } }, ["ok"])).to.equal(null);
  });
});
