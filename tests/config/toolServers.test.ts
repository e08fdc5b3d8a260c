import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { loadToolServerConfig, parseToolServerConfig } from "../../src/config/toolServers.js";
import { ValidationError } from "../../src/errors.js";

function captureValidation(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a ValidationError");
}

describe("config/toolServers", () => {
  it("builds the static routing table with the first declaration winning", () => {
    const registry = parseToolServerConfig({
      servers: [
        { name: "documents", url: "http://127.0.0.1:4100/mcp", tools: ["generate_pdf", "lookup_order"] },
        { name: "mail", url: "http://127.0.0.1:4200/mcp", tools: ["send_email", "lookup_order"], credentialEnv: "MAIL_KEY" },
      ],
      defaultServer: "mail",
    });

    expect(registry.defaultServer).to.equal("mail");
    expect(Array.from(registry.staticRoutes.entries())).to.deep.equal([
      ["generate_pdf", "documents"],
      ["lookup_order", "documents"],
      ["send_email", "mail"],
    ]);
    expect(registry.servers[1].credentialEnv).to.equal("MAIL_KEY");
  });

  it("defaults to no servers and no default route", () => {
    const registry = parseToolServerConfig({});
    expect(registry.servers).to.deep.equal([]);
    expect(registry.defaultServer).to.equal(null);
    expect(registry.staticRoutes.size).to.equal(0);
  });

  it("rejects duplicate names and undeclared defaults", () => {
    const error = captureValidation(() =>
      parseToolServerConfig({
        servers: [
          { name: "mail", url: "http://127.0.0.1:4200/mcp" },
          { name: "mail", url: "http://127.0.0.1:4300/mcp" },
        ],
        defaultServer: "documents",
      }),
    );
    expect(error.message).to.equal("invalid tool server configuration");
    expect(error.details).to.deep.equal({
      issues: ['servers.1.name: duplicate server name "mail"', 'defaultServer: default server "documents" is not declared'],
    });
  });

  it("rejects unknown keys and malformed urls", () => {
    const error = captureValidation(() =>
      parseToolServerConfig({ servers: [{ name: "mail", url: "not-a-url", retries: 3 }] }),
    );
    expect(error.code).to.equal("E-VALIDATION");
  });

  it("loads the configuration from disk", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "tool-servers-"));
    try {
      const file = path.join(directory, "servers.json");
      await writeFile(file, JSON.stringify({ servers: [{ name: "mail", url: "http://127.0.0.1:4200/mcp", tools: ["send_email"] }] }));
      const registry = await loadToolServerConfig(file);
      expect(registry.staticRoutes.get("send_email")).to.equal("mail");

      await writeFile(file, "{ not json");
      let failure: unknown = null;
      try {
        await loadToolServerConfig(file);
      } catch (error) {
        failure = error;
      }
      expect(failure).to.be.instanceOf(ValidationError);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});
