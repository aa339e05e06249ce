import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { getHelp, isError, parseArgs } from "../src/args.js";

// Simulate process.argv: ["node", "datamask", ...rest]
function parse(...rest: string[]) {
  return parseArgs(["node", "datamask", ...rest]);
}

describe("parseArgs", () => {
  it("no args masks stdin with defaults", () => {
    assert.deepEqual(parse(), {
      command: "mask",
      file: null,
      fields: null,
      disable: false,
      config: null,
      failClosed: false,
      verbose: false,
    });
  });

  it("version flag", () => {
    assert.deepEqual(parse("--version"), { command: "version" });
    assert.deepEqual(parse("-v"), { command: "version" });
  });

  it("help flag wins over everything after it", () => {
    assert.deepEqual(parse("-h"), { command: "help" });
    assert.deepEqual(parse("--help", "--bogus"), { command: "help" });
  });

  it("file positional", () => {
    const r = parse("payload.json");
    assert.ok(!isError(r));
    if (r.command === "mask") assert.equal(r.file, "payload.json");
  });

  it("dash is a file, not an option", () => {
    const r = parse("-");
    assert.ok(!isError(r));
    if (r.command === "mask") assert.equal(r.file, "-");
  });

  it("all flags together", () => {
    const r = parse(
      "--fields", "name,iban",
      "--config", "mask.json",
      "--disable",
      "--fail-closed",
      "--verbose",
      "in.json",
    );
    assert.deepEqual(r, {
      command: "mask",
      file: "in.json",
      fields: "name,iban",
      disable: true,
      config: "mask.json",
      failClosed: true,
      verbose: true,
    });
  });

  it("--fields requires a value", () => {
    const r = parse("--fields");
    assert.ok(isError(r));
    assert.equal(r.error, "--fields requires a value");
  });

  it("--config requires a value", () => {
    const r = parse("--config");
    assert.ok(isError(r));
    assert.equal(r.error, "--config requires a value");
  });

  it("unknown option is an error with help", () => {
    const r = parse("--mask-everything");
    assert.ok(isError(r));
    assert.equal(r.error, `Unknown option: --mask-everything\n\n${getHelp()}`);
  });

  it("second positional is an error", () => {
    const r = parse("a.json", "b.json");
    assert.ok(isError(r));
    assert.ok(r.error.startsWith("Unexpected argument: b.json\n\n"));
  });
});

describe("getHelp", () => {
  it("starts with the usage line", () => {
    assert.ok(getHelp().startsWith("datamask [options] [file]\n"));
  });
});
