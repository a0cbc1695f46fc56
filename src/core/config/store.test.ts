import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CliError } from "../errors.js";
import { getDefaultConfig, loadConfig, maskToken } from "./store.js";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "jira-issue-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("returns defaults when the file does not exist", () => {
    expect(loadConfig(path.join(dir, "missing.json"))).toEqual({
      version: 1,
      api: { timeoutMs: 30000 },
      fields: { integer: ["customfield_10113"] },
      log: { level: "info" },
    });
  });

  it("fills in defaults around the given values", () => {
    const file = path.join(dir, "config.json");
    fs.writeFileSync(file, JSON.stringify({ fields: { integer: ["customfield_1"] }, log: { level: "debug" } }));

    const config = loadConfig(file);

    expect(config.fields.integer).toEqual(["customfield_1"]);
    expect(config.log.level).toBe("debug");
    expect(config.api.timeoutMs).toBe(30000);
  });

  it("rejects malformed JSON", () => {
    const file = path.join(dir, "config.json");
    fs.writeFileSync(file, "{ not json");
    expect(() => loadConfig(file)).toThrow(CliError);
  });

  it("names the first invalid setting", () => {
    const file = path.join(dir, "config.json");
    fs.writeFileSync(file, JSON.stringify({ api: { timeoutMs: -1 } }));
    expect(() => loadConfig(file)).toThrow(/^Invalid config format: api\.timeoutMs: /);
  });
});

describe("getDefaultConfig", () => {
  it("uses the info log level", () => {
    expect(getDefaultConfig().log.level).toBe("info");
  });
});

describe("maskToken", () => {
  it("keeps only the ends of long tokens", () => {
    expect(maskToken("test-secret-token")).toBe("test*********oken");
    expect(maskToken("short")).toBe("*****");
    expect(maskToken(undefined)).toBe("(not set)");
  });
});
