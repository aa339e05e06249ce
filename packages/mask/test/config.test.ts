import { describe, it } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import { join } from "node:path";
import { randomBytes } from "node:crypto";
import { tmpdir } from "node:os";

import { loadConfigFile, parseConfig, resolveMaskingOptions } from "../src/config.js";
import { MaskingEngine } from "../src/engine.js";
import { silentLogger } from "../src/log.js";
import { DEFAULT_STRATEGIES } from "../src/strategies.js";

function tmpFile(extension = "json"): string {
  return join(
    tmpdir(),
    `datamask-config-test-${randomBytes(4).toString("hex")}.${extension}`,
  );
}

function strategyNames(options: { strategies?: Iterable<{ name: string }> }): string[] {
  return [...(options.strategies ?? [])].map((s) => s.name);
}

describe("resolveMaskingOptions", () => {
  it("applies defaults with an empty environment", () => {
    const options = resolveMaskingOptions(undefined, {});
    assert.equal(options.enabled, true);
    assert.equal(options.fields, null);
    assert.equal(options.failClosed, false);
    assert.equal(options.strategies, DEFAULT_STRATEGIES);
  });

  it("reads DATAMASK_ENABLED", () => {
    assert.equal(resolveMaskingOptions(undefined, { DATAMASK_ENABLED: "false" }).enabled, false);
    assert.equal(resolveMaskingOptions(undefined, { DATAMASK_ENABLED: "OFF" }).enabled, false);
    assert.equal(resolveMaskingOptions(undefined, { DATAMASK_ENABLED: "0" }).enabled, false);
    assert.equal(resolveMaskingOptions(undefined, { DATAMASK_ENABLED: "true" }).enabled, true);
  });

  it("ignores unrecognized flag values", () => {
    assert.equal(resolveMaskingOptions(undefined, { DATAMASK_ENABLED: "maybe" }).enabled, true);
  });

  it("reads DATAMASK_FIELDS as a comma-separated list", () => {
    const options = resolveMaskingOptions(undefined, { DATAMASK_FIELDS: "iban, Name" });
    assert.deepEqual(options.fields, ["iban", "name"]);
  });

  it("reads DATAMASK_FAIL_CLOSED", () => {
    assert.equal(resolveMaskingOptions(undefined, { DATAMASK_FAIL_CLOSED: "1" }).failClosed, true);
  });

  it("prefers overrides over the environment", () => {
    const options = resolveMaskingOptions(
      { enabled: true, fields: "email", failClosed: false },
      { DATAMASK_ENABLED: "0", DATAMASK_FIELDS: "name", DATAMASK_FAIL_CLOSED: "1" },
    );
    assert.equal(options.enabled, true);
    assert.equal(options.fields, "email");
    assert.equal(options.failClosed, false);
  });
});

describe("parseConfig", () => {
  it("parses an empty object into defaults", () => {
    const options = parseConfig("{}");
    assert.equal(options.enabled, undefined);
    assert.equal(options.fields, undefined);
    assert.deepEqual(strategyNames(options), ["name", "email", "phone"]);
  });

  it("accepts comments and trailing commas", () => {
    const options = parseConfig(`{
      // mask only these
      "fields": "name, iban, taxid",
      "strategies": ["account"],
      "rules": [
        { "id": "tax-id", "match": "(?i)^tax_?id$", "keep": 2 },
      ],
    }`);

    assert.deepEqual(options.fields, ["name", "iban", "taxid"]);
    assert.deepEqual(strategyNames(options), ["name", "email", "phone", "account", "tax-id"]);
  });

  it("leaves commas, brackets and slashes inside strings alone", () => {
    const options = parseConfig(`{
      "fields": "url//path, name", // trailing comment
      "rules": [
        { "id": "odd", "match": "^x,]$", },
      ],
    }`);

    assert.deepEqual(options.fields, ["url//path", "name"]);
    const odd = [...(options.strategies ?? [])].find((s) => s.name === "odd");
    assert.ok(odd);
    assert.equal(odd.matches("x,]"), true);
    assert.equal(odd.matches("x]"), false);
  });

  it("produces options the engine can run", () => {
    const options = parseConfig(`{
      "fields": ["name", "iban", "taxid"],
      "strategies": ["account"],
      "rules": [{ "id": "tax-id", "match": "^tax_?id$", "keep": 2 }]
    }`);
    const engine = new MaskingEngine({ ...options, logger: silentLogger });

    assert.equal(
      engine.maskDocument(
        '{"iban":"DE89370400440532013000","TaxId":"12-3456789","name":"Ann Lee","email":"ann@example.com"}',
      ),
      '{"iban":"DE****************3000","TaxId":"**-*****89","name":"A** L**","email":"ann@example.com"}',
    );
  });

  it("rejects unknown keys", () => {
    assert.throws(() => parseConfig('{"mode": "strict"}', "mask.json"), /^Error: mask\.json: Unrecognized key/);
  });

  it("rejects unknown strategy names with the offending path", () => {
    assert.throws(() => parseConfig('{"strategies": ["ssn"]}'), /at "strategies\.0"/);
  });

  it("rejects negative keep counts", () => {
    assert.throws(
      () => parseConfig('{"rules": [{"id": "x", "match": "x", "keep": -2}]}'),
      /at "rules\.0\.keep"/,
    );
  });

  it("rejects rules with invalid regex", () => {
    assert.throws(
      () => parseConfig('{"rules": [{"id": "broken", "match": "(["}]}'),
      /Invalid pattern for rule "broken"/,
    );
  });

  it("rejects invalid JSON", () => {
    assert.throws(() => parseConfig("{", "mask.json"), /mask\.json: invalid JSON/);
  });
});

describe("loadConfigFile", () => {
  it("loads and compiles a file", () => {
    const path = tmpFile();
    fs.writeFileSync(path, JSON.stringify({ enabled: false, fields: ["email"] }));
    try {
      const options = loadConfigFile(path);
      assert.equal(options.enabled, false);
      assert.deepEqual(options.fields, ["email"]);
    } finally {
      fs.unlinkSync(path);
    }
  });

  it("names the file in validation errors", () => {
    const path = tmpFile();
    fs.writeFileSync(path, '{"enabled": "yes"}');
    try {
      assert.throws(() => loadConfigFile(path), (err: unknown) =>
        err instanceof Error && err.message.startsWith(`${path}: `) && err.message.endsWith('at "enabled"'),
      );
    } finally {
      fs.unlinkSync(path);
    }
  });

  it("throws when the file does not exist", () => {
    assert.throws(() => loadConfigFile(tmpFile()), /ENOENT/);
  });
});
