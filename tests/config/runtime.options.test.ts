import { afterEach, describe, it } from "mocha";
import { expect } from "chai";

import { parseRuntimeOptions, readRuntimeDefaults, type RuntimeOptions } from "../../src/config/options.js";

const BASE: RuntimeOptions = {
  host: "127.0.0.1",
  port: 8080,
  databasePath: "./data/actionflow.db",
  toolServersPath: null,
  logFile: null,
  logLevel: "info",
  toolTimeoutMs: 30_000,
  toolRetries: 2,
  plannerUrl: null,
  plannerTimeoutMs: 60_000,
};

describe("config/options", () => {
  afterEach(() => {
    delete process.env.ACTIONFLOW_PORT;
    delete process.env.ACTIONFLOW_TOOL_RETRIES;
    delete process.env.PLANNER_URL;
    delete process.env.ACTIONFLOW_LOG_LEVEL;
  });

  it("derives defaults from the environment", () => {
    expect(readRuntimeDefaults()).to.deep.equal(BASE);

    process.env.ACTIONFLOW_PORT = "9001";
    process.env.ACTIONFLOW_TOOL_RETRIES = "0";
    process.env.PLANNER_URL = " http://127.0.0.1:7000/plan ";
    const defaults = readRuntimeDefaults();
    expect(defaults.port).to.equal(9001);
    expect(defaults.toolRetries).to.equal(0);
    expect(defaults.plannerUrl).to.equal("http://127.0.0.1:7000/plan");
  });

  it("reads the log level case-insensitively and keeps the default otherwise", () => {
    process.env.ACTIONFLOW_LOG_LEVEL = "WARN";
    expect(readRuntimeDefaults().logLevel).to.equal("warn");

    process.env.ACTIONFLOW_LOG_LEVEL = "verbose";
    expect(readRuntimeDefaults().logLevel).to.equal("info");

    expect(parseRuntimeOptions(["--log-level=Debug"], BASE).logLevel).to.equal("debug");
    expect(() => parseRuntimeOptions(["--log-level", "loud"], BASE)).to.throw(
      "Value loud for --log-level must be one of debug, info, warn, error.",
    );
  });

  it("ignores out-of-range ports from the environment", () => {
    process.env.ACTIONFLOW_PORT = "70000";
    expect(readRuntimeDefaults().port).to.equal(8080);
  });

  it("applies flags given inline or as a separate value", () => {
    const options = parseRuntimeOptions(
      ["--port=9100", "--database", ":memory:", "--tool-retries", "0", "--planner-url=http://127.0.0.1:7000/plan"],
      BASE,
    );
    expect(options).to.deep.equal({
      ...BASE,
      port: 9100,
      databasePath: ":memory:",
      toolRetries: 0,
      plannerUrl: "http://127.0.0.1:7000/plan",
    });
  });

  it("leaves the defaults untouched", () => {
    parseRuntimeOptions(["--host", "0.0.0.0"], BASE);
    expect(BASE.host).to.equal("127.0.0.1");
  });

  it("rejects unknown flags and missing values", () => {
    expect(() => parseRuntimeOptions(["--verbose"], BASE)).to.throw("Unknown flag --verbose.");
    expect(() => parseRuntimeOptions(["--port"], BASE)).to.throw("Flag --port requires a value.");
    expect(() => parseRuntimeOptions(["--port", "--host"], BASE)).to.throw("Flag --port requires a value.");
  });

  it("validates numeric and textual values", () => {
    expect(() => parseRuntimeOptions(["--port", "0"], BASE)).to.throw("Value 0 for --port must be a positive integer.");
    expect(() => parseRuntimeOptions(["--tool-timeout-ms=1.5"], BASE)).to.throw(
      "Value 1.5 for --tool-timeout-ms must be a positive integer.",
    );
    expect(() => parseRuntimeOptions(["--tool-retries", "-1"], BASE)).to.throw(
      "Value -1 for --tool-retries must be a non-negative integer.",
    );
    expect(() => parseRuntimeOptions(["--host", "  "], BASE)).to.throw("Flag --host cannot be empty.");
  });
});
