import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import { readConfig } from "../src/config";
import { ExitCodes, LiveSyncError, formatError } from "../src/errors";
import { getStatePath, readState, recordReport } from "../src/state";
import type { SyncReport } from "../src/types";
import { createTempDir } from "./helpers";

void test("readConfig throws LiveSyncError when config is missing", async () => {
  const temp = await createTempDir();
  await assert.rejects(readConfig(temp), (error) => {
    assert.ok(error instanceof LiveSyncError);
    assert.equal(error.code, ExitCodes.Validation);
    assert.match(error.message, /Missing config/);
    assert.match(error.message, /difficulty-livesync init/);
    return true;
  });
});

void test("readConfig includes details for invalid YAML", async () => {
  const temp = await createTempDir();
  const configPath = path.join(temp, "livesync.yml");
  await fs.writeFile(configPath, "sync:\n  marker: [", "utf8");
  await assert.rejects(readConfig(temp), (error) => {
    assert.ok(error instanceof LiveSyncError);
    assert.equal(error.code, ExitCodes.Validation);
    assert.match(error.message, /Invalid YAML in/);
    assert.match(error.message, /line/);
    return true;
  });
});

void test("readConfig rejects a document that is not a mapping", async () => {
  const temp = await createTempDir();
  await fs.writeFile(path.join(temp, "livesync.yml"), "- just\n- a list\n", "utf8");
  await assert.rejects(readConfig(temp), (error) => {
    assert.ok(error instanceof LiveSyncError);
    assert.match(error.message, /check "version"/);
    return true;
  });
});

void test("readState returns null when state is missing", async () => {
  const temp = await createTempDir();
  assert.equal(await readState(temp), null);
});

void test("readState throws LiveSyncError for invalid JSON", async () => {
  const temp = await createTempDir();
  await fs.writeFile(getStatePath(temp), "{", "utf8");
  await assert.rejects(readState(temp), (error) => {
    assert.ok(error instanceof LiveSyncError);
    assert.equal(error.code, ExitCodes.Validation);
    assert.match(error.message, /Invalid JSON in/);
    return true;
  });
});

void test("readState rejects a state file with the wrong shape", async () => {
  const temp = await createTempDir();
  const shapes = [
    "[]",
    '{"version":1,"updatedAt":"2024-01-01T00:00:00.000Z","lastReport":{"startedAt":5}}',
    '{"version":1,"updatedAt":"2024-01-01T00:00:00.000Z","lastReport":' +
      '{"startedAt":"x","preserveExcluded":true,"targets":[{"path":"a","outcome":"merged"}]}}'
  ];
  for (const shape of shapes) {
    await fs.writeFile(getStatePath(temp), shape, "utf8");
    await assert.rejects(readState(temp), (error) => {
      assert.ok(error instanceof LiveSyncError);
      assert.equal(error.code, ExitCodes.Validation);
      assert.equal(error.message, `Invalid state format in ${getStatePath(temp)}`);
      return true;
    });
  }
});

void test("readState accepts a state without a report", async () => {
  const temp = await createTempDir();
  await fs.writeFile(
    getStatePath(temp),
    '{"version":1,"updatedAt":"2024-01-01T00:00:00.000Z","lastReport":null}',
    "utf8"
  );
  assert.deepEqual(await readState(temp), {
    version: 1,
    updatedAt: "2024-01-01T00:00:00.000Z",
    lastReport: null
  });
});

void test("recordReport stores the last sync report", async () => {
  const temp = await createTempDir();
  const report: SyncReport = {
    startedAt: "2024-01-01T00:00:00.000Z",
    preserveExcluded: true,
    targets: [
      { path: "/tmp/CasualDifficulty.ini", outcome: "written" },
      { path: "/tmp/HardDifficulty.ini", outcome: "failed", error: "EACCES: permission denied" }
    ]
  };

  await recordReport(temp, report);
  const state = await readState(temp);

  assert.equal(state?.version, 1);
  assert.deepEqual(state?.lastReport, report);
});

void test("formatError prefixes errno codes", () => {
  const error = Object.assign(new Error("no such file"), { code: "ENOENT" });
  assert.equal(formatError(error), "ENOENT: no such file");
  assert.equal(formatError(new Error("plain")), "plain");
  assert.equal(formatError("text"), "text");
});
