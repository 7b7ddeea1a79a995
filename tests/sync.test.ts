import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs/promises";
import path from "node:path";
import { EXCLUDED_FIELDS } from "../src/liveSync";
import { syncTargets, type SyncTargetsOptions } from "../src/sync";
import type { SyncLayout } from "../src/types";
import { createLayout, exists, writeFile } from "./helpers";

const WORK =
  "[Info]\nDifficultyNameKey=Test\n[Global]\nSpawnCount=5\nStackupLevel=9\n";

function options(layout: SyncLayout, overrides: Partial<SyncTargetsOptions> = {}): SyncTargetsOptions {
  return {
    layout,
    marker: "[Global]",
    preserveExcluded: true,
    excludedFields: { enforce: false, names: EXCLUDED_FIELDS },
    atomicWrites: false,
    now: () => new Date("2024-05-01T12:00:00.000Z"),
    ...overrides
  };
}

function target(layout: SyncLayout, name: string): string {
  return path.join(layout.activeDir, name);
}

void test("syncTargets writes every target", async () => {
  const { layout } = await createLayout();
  await writeFile(layout.workFile, WORK);
  await writeFile(target(layout, "HardDifficulty.ini"), "; hard\n[Info]\nDifficultyNameKey=Hard\n[Global]\nSpawnCount=1\n");

  const report = await syncTargets(options(layout));

  assert.equal(report.startedAt, "2024-05-01T12:00:00.000Z");
  assert.equal(report.preserveExcluded, true);
  assert.deepEqual(
    report.targets.map((result) => result.outcome),
    ["written", "written", "written"]
  );
  assert.equal(
    await fs.readFile(target(layout, "HardDifficulty.ini"), "utf8"),
    "; hard\n[Info]\nDifficultyNameKey=Hard\n[Global]\nSpawnCount=5\nStackupLevel=9\n"
  );
  assert.equal(
    await fs.readFile(target(layout, "CasualDifficulty.ini"), "utf8"),
    "[Global]\nSpawnCount=5\nStackupLevel=9\n"
  );
});

void test("syncTargets leaves targets untouched when the work file has no marker", async () => {
  const { layout } = await createLayout();
  await writeFile(layout.workFile, "[Info]\nDifficultyNameKey=Test\n");
  const hard = target(layout, "HardDifficulty.ini");
  await writeFile(hard, "[Global]\nSpawnCount=1\n");

  const report = await syncTargets(options(layout));

  assert.deepEqual(
    report.targets.map((result) => result.outcome),
    ["skipped", "skipped", "skipped"]
  );
  assert.equal(await fs.readFile(hard, "utf8"), "[Global]\nSpawnCount=1\n");
  assert.equal(await exists(target(layout, "CasualDifficulty.ini")), false);
});

void test("syncTargets skips everything without a work file", async () => {
  const { layout } = await createLayout();

  const report = await syncTargets(options(layout));

  assert.deepEqual(
    report.targets.map((result) => result.outcome),
    ["skipped", "skipped", "skipped"]
  );
  assert.equal(await exists(layout.activeDir), false);
});

void test("syncTargets reports unchanged targets once they are in sync", async () => {
  const { layout } = await createLayout();
  await writeFile(layout.workFile, WORK);
  for (const name of ["CasualDifficulty.ini", "HardDifficulty.ini", "StandardDifficulty.ini"]) {
    await writeFile(target(layout, name), "[Info]\nDifficultyNameKey=Kept\n[Global]\nSpawnCount=1\n");
  }

  const first = await syncTargets(options(layout));
  const second = await syncTargets(options(layout));

  assert.deepEqual(
    first.targets.map((result) => result.outcome),
    ["written", "written", "written"]
  );
  assert.deepEqual(
    second.targets.map((result) => result.outcome),
    ["unchanged", "unchanged", "unchanged"]
  );
});

void test("a failing target does not stop the others", async () => {
  const { layout } = await createLayout();
  await writeFile(layout.workFile, WORK);
  await fs.mkdir(target(layout, "HardDifficulty.ini"), { recursive: true });

  const report = await syncTargets(options(layout));

  assert.deepEqual(
    report.targets.map((result) => result.outcome),
    ["written", "failed", "written"]
  );
  assert.match(report.targets[1].error ?? "", /^EISDIR: /);
  assert.equal(
    await fs.readFile(target(layout, "StandardDifficulty.ini"), "utf8"),
    "[Global]\nSpawnCount=5\nStackupLevel=9\n"
  );
});

void test("excluded fields are restored only when enforced in-game", async () => {
  const previous = "[Info]\nDifficultyNameKey=Std\n[Global]\nSpawnCount=1\nStackupLevel=2\n";

  const enforced = await createLayout();
  await writeFile(enforced.layout.workFile, WORK);
  await writeFile(target(enforced.layout, "StandardDifficulty.ini"), previous);
  await syncTargets(
    options(enforced.layout, { excludedFields: { enforce: true, names: EXCLUDED_FIELDS } })
  );
  assert.equal(
    await fs.readFile(target(enforced.layout, "StandardDifficulty.ini"), "utf8"),
    "[Info]\nDifficultyNameKey=Std\n[Global]\nSpawnCount=5\nStackupLevel=2\n"
  );

  const preGame = await createLayout();
  await writeFile(preGame.layout.workFile, WORK);
  await writeFile(target(preGame.layout, "StandardDifficulty.ini"), previous);
  await syncTargets(
    options(preGame.layout, {
      preserveExcluded: false,
      excludedFields: { enforce: true, names: EXCLUDED_FIELDS }
    })
  );
  assert.equal(
    await fs.readFile(target(preGame.layout, "StandardDifficulty.ini"), "utf8"),
    "[Info]\nDifficultyNameKey=Std\n[Global]\nSpawnCount=5\nStackupLevel=9\n"
  );
});

void test("atomic writes leave no temporary files behind", async () => {
  const { layout } = await createLayout();
  await writeFile(layout.workFile, WORK);

  const report = await syncTargets(options(layout, { atomicWrites: true }));

  assert.deepEqual(
    report.targets.map((result) => result.outcome),
    ["written", "written", "written"]
  );
  const entries = (await fs.readdir(layout.activeDir)).sort();
  assert.deepEqual(entries, ["CasualDifficulty.ini", "HardDifficulty.ini", "StandardDifficulty.ini"]);
});
