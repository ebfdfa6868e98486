import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { createTempDir, removeTempDir } from "../../tests/harness/fake-process";
import { DuplicateJobNameError, MalformedStateError } from "../supervisor/errors";
import { loadDeclaredJobs, loadRuntimeJobs, saveRuntimeJobs } from "./store";

const DECLARED_JOB = {
  name: "morning-brief",
  schedule: { kind: "cron", expr: "0 7 * * *", tz: "UTC" },
  sessionTarget: "isolated",
  wakeMode: "now",
  payload: { kind: "agentTurn", message: "Summarize overnight alerts" },
};

const RUNTIME_JOB = {
  id: "job-1",
  agentId: "main",
  name: "morning-brief",
  enabled: true,
  createdAtMs: 1_000,
  updatedAtMs: 2_000,
  schedule: { kind: "cron", expr: "0 6 * * *" },
  sessionTarget: "main",
  wakeMode: "next-heartbeat",
  payload: { kind: "systemEvent", text: "old" },
  state: { lastRunAtMs: 1_500 },
  customFlag: "kept",
};

function writeJson(filePath: string, value: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(value));
}

describe("loadDeclaredJobs", () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir("declared");
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  test("returns null when no candidate exists", async () => {
    expect(await loadDeclaredJobs([path.join(dir, "a.json"), path.join(dir, "b.json")])).toBeNull();
  });

  test("falls back to the first existing candidate", async () => {
    const legacy = path.join(dir, "legacy", "jobs.json");
    writeJson(legacy, [DECLARED_JOB]);

    const result = await loadDeclaredJobs([path.join(dir, "jobs.json"), legacy]);

    expect(result?.path).toBe(legacy);
    expect(result?.jobs.map((job) => job.name)).toEqual(["morning-brief"]);
  });

  test("rejects invalid JSON", async () => {
    const filePath = path.join(dir, "jobs.json");
    fs.writeFileSync(filePath, "[{");
    await expect(loadDeclaredJobs([filePath])).rejects.toBeInstanceOf(MalformedStateError);
  });

  test("rejects unknown keys and ids in declared jobs", async () => {
    const filePath = path.join(dir, "jobs.json");
    writeJson(filePath, [{ ...DECLARED_JOB, id: "not-allowed" }]);
    await expect(loadDeclaredJobs([filePath])).rejects.toThrow(/Invalid declared jobs/);
  });

  test("rejects an invalid cron expression", async () => {
    const filePath = path.join(dir, "jobs.json");
    writeJson(filePath, [{ ...DECLARED_JOB, schedule: { kind: "cron", expr: "not a cron" } }]);
    await expect(loadDeclaredJobs([filePath])).rejects.toThrow(/schedule\.expr: Invalid cron expression/);
  });

  test("rejects duplicate names unless last-wins is configured", async () => {
    const filePath = path.join(dir, "jobs.json");
    writeJson(filePath, [DECLARED_JOB, DECLARED_JOB]);

    await expect(loadDeclaredJobs([filePath])).rejects.toBeInstanceOf(DuplicateJobNameError);
    const result = await loadDeclaredJobs([filePath], "last-wins");
    expect(result?.jobs).toHaveLength(2);
  });
});

describe("runtime jobs file", () => {
  let dir: string;
  let filePath: string;

  beforeEach(() => {
    dir = createTempDir("runtime");
    filePath = path.join(dir, "cron", "jobs.json");
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  test("a missing file is an empty array", async () => {
    const file = await loadRuntimeJobs(filePath);
    expect(file).toEqual({ path: filePath, jobs: [], unrecognized: [], shape: { kind: "array" } });
  });

  test("an unparseable file is treated as empty", async () => {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, "{ not json");
    const file = await loadRuntimeJobs(filePath);
    expect(file.jobs).toEqual([]);
    expect(file.shape).toEqual({ kind: "array" });
  });

  test("a file that is neither a list nor { jobs } is treated as empty", async () => {
    writeJson(filePath, { version: 1 });
    const file = await loadRuntimeJobs(filePath);
    expect(file.jobs).toEqual([]);
    expect(file.shape).toEqual({ kind: "array" });
  });

  test("round-trips the object shape with its other keys", async () => {
    writeJson(filePath, { version: 1, jobs: [RUNTIME_JOB] });

    const file = await loadRuntimeJobs(filePath);
    expect(file.shape).toEqual({ kind: "object", extra: { version: 1 } });
    expect(file.jobs).toEqual([RUNTIME_JOB]);

    await saveRuntimeJobs(file, file.jobs);
    expect(JSON.parse(fs.readFileSync(filePath, "utf-8"))).toEqual({ version: 1, jobs: [RUNTIME_JOB] });
  });

  test("keeps loosely shaped jobs and sets nameless entries aside", async () => {
    const halfWritten = { id: "job-2", name: "half-written" };
    const broken = { id: "job-3", name: "" };
    writeJson(filePath, [broken, halfWritten, RUNTIME_JOB, "stray"]);

    const file = await loadRuntimeJobs(filePath);
    expect(file.jobs).toEqual([halfWritten, RUNTIME_JOB]);
    expect(file.unrecognized).toEqual([broken, "stray"]);

    await saveRuntimeJobs(file, file.jobs);
    expect(JSON.parse(fs.readFileSync(filePath, "utf-8"))).toEqual([halfWritten, RUNTIME_JOB, broken, "stray"]);
  });
});
