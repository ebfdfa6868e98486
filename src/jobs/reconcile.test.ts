import { describe, expect, test } from "vitest";
import { DuplicateJobNameError } from "../supervisor/errors";
import { reconcileJobs, summarizeReconcile } from "./reconcile";
import type { DeclaredJob, RuntimeJob, ScheduledJob } from "./types";

const NOW = 1_700_000_000_000;

function declared(overrides: Partial<DeclaredJob> & { name: string }): DeclaredJob {
  return {
    schedule: { kind: "cron", expr: "0 9 * * *" },
    sessionTarget: "isolated",
    wakeMode: "now",
    payload: { kind: "agentTurn", message: `run ${overrides.name}` },
    ...overrides,
  };
}

function runtime(overrides: Partial<ScheduledJob> & { id: string; name: string } & Record<string, unknown>): ScheduledJob {
  return {
    agentId: "main",
    enabled: true,
    createdAtMs: 1_000,
    updatedAtMs: 2_000,
    schedule: { kind: "every", everyMs: 60_000 },
    sessionTarget: "main",
    wakeMode: "next-heartbeat",
    payload: { kind: "systemEvent", text: "old" },
    state: { nextRunAtMs: 5_000, lastStatus: "ok" },
    ...overrides,
  };
}

function idSequence(...ids: string[]): () => string {
  let index = 0;
  return () => {
    const id = ids[index];
    index += 1;
    if (id === undefined) {
      throw new Error("ran out of ids");
    }
    return id;
  };
}

describe("reconcileJobs", () => {
  test("updates a matched job but keeps its identity and state", () => {
    const existing = runtime({ id: "x1", name: "A", wakeMode: "next-heartbeat" });
    const result = reconcileJobs([declared({ name: "A", wakeMode: "now" })], [existing], { now: NOW });

    expect(result).toHaveLength(1);
    expect(result[0]).toEqual({
      ...existing,
      schedule: { kind: "cron", expr: "0 9 * * *" },
      sessionTarget: "isolated",
      wakeMode: "now",
      payload: { kind: "agentTurn", message: "run A" },
      updatedAtMs: NOW,
    });
    expect(result[0]?.id).toBe("x1");
    expect(result[0]?.createdAtMs).toBe(1_000);
    expect(result[0]?.state).toEqual({ nextRunAtMs: 5_000, lastStatus: "ok" });
  });

  test("takes agentId, enabled and delivery from declared only when present", () => {
    const existing = runtime({ id: "x1", name: "A", agentId: "ops", enabled: false, delivery: { channel: "old" } });

    const [kept] = reconcileJobs([declared({ name: "A" })], [existing], { now: NOW });
    expect(kept?.agentId).toBe("ops");
    expect(kept?.enabled).toBe(false);
    expect(kept?.delivery).toEqual({ channel: "old" });

    const [overridden] = reconcileJobs(
      [declared({ name: "A", agentId: "main", enabled: true, delivery: { channel: "new" } })],
      [existing],
      { now: NOW },
    );
    expect(overridden?.agentId).toBe("main");
    expect(overridden?.enabled).toBe(true);
    expect(overridden?.delivery).toEqual({ channel: "new" });
  });

  test("passes runtime-only jobs through untouched", () => {
    const userJob = runtime({ id: "u1", name: "user-reminder", extraField: { nested: [1, 2] } });
    const result = reconcileJobs([declared({ name: "A" })], [userJob], { now: NOW, generateId: idSequence("n1") });

    expect(result[0]).toBe(userJob);
    expect(result[0]).toEqual(runtime({ id: "u1", name: "user-reminder", extraField: { nested: [1, 2] } }));
  });

  test("creates declared-only jobs with defaults", () => {
    const result = reconcileJobs([declared({ name: "fresh" })], [], { now: NOW, generateId: idSequence("n1") });

    expect(result).toEqual([
      {
        id: "n1",
        agentId: "main",
        name: "fresh",
        enabled: true,
        createdAtMs: NOW,
        updatedAtMs: NOW,
        schedule: { kind: "cron", expr: "0 9 * * *" },
        sessionTarget: "isolated",
        wakeMode: "now",
        payload: { kind: "agentTurn", message: "run fresh" },
        state: {},
      },
    ]);
  });

  test("uses the configured default agent and declared delivery for new jobs", () => {
    const [job] = reconcileJobs([declared({ name: "fresh", delivery: { channel: "ops" } })], [], {
      now: NOW,
      generateId: idSequence("n1"),
      defaultAgentId: "ops-agent",
    });
    expect(job?.agentId).toBe("ops-agent");
    expect(job?.delivery).toEqual({ channel: "ops" });
  });

  test("keeps runtime order and appends new jobs in declared order", () => {
    const result = reconcileJobs(
      [declared({ name: "new-2" }), declared({ name: "B" }), declared({ name: "new-1" })],
      [runtime({ id: "a", name: "A" }), runtime({ id: "b", name: "B" })],
      { now: NOW, generateId: idSequence("id-2", "id-1") },
    );
    expect(result.map((job) => `${job.id}:${job.name}`)).toEqual(["a:A", "b:B", "id-2:new-2", "id-1:new-1"]);
  });

  test("output length is runtime plus unmatched declared", () => {
    const declaredJobs = [declared({ name: "A" }), declared({ name: "C" }), declared({ name: "D" })];
    const runtimeJobs = [runtime({ id: "a", name: "A" }), runtime({ id: "b", name: "B" })];
    const result = reconcileJobs(declaredJobs, runtimeJobs, { now: NOW });
    expect(result).toHaveLength(4);
    expect(new Set(result.map((job) => job.id)).size).toBe(4);
  });

  test("regenerates an id that collides with an existing one", () => {
    const result = reconcileJobs([declared({ name: "fresh" })], [runtime({ id: "taken", name: "A" })], {
      now: NOW,
      generateId: idSequence("taken", "free"),
    });
    expect(result[1]?.id).toBe("free");
  });

  test("matches names exactly and case-sensitively", () => {
    const result = reconcileJobs([declared({ name: "daily" })], [runtime({ id: "x", name: "Daily" })], {
      now: NOW,
      generateId: idSequence("n1"),
    });
    expect(result.map((job) => job.id)).toEqual(["x", "n1"]);
    expect(result[0]?.updatedAtMs).toBe(2_000);
  });

  test("is idempotent apart from updatedAtMs", () => {
    const declaredJobs = [declared({ name: "A" }), declared({ name: "B", enabled: false })];
    const runtimeJobs = [runtime({ id: "a", name: "A" }), runtime({ id: "u", name: "user" })];

    const once = reconcileJobs(declaredJobs, runtimeJobs, { now: NOW, generateId: idSequence("b") });
    const twice = reconcileJobs(declaredJobs, once, { now: NOW + 60_000, generateId: idSequence("never") });

    const strip = (jobs: RuntimeJob[]) => jobs.map(({ updatedAtMs: _updated, ...rest }) => rest);
    expect(strip(twice)).toEqual(strip(once));
  });

  test("rejects duplicate declared names by default", () => {
    const error = (() => {
      try {
        reconcileJobs([declared({ name: "A" }), declared({ name: "A" }), declared({ name: "B" })], []);
        return null;
      } catch (err) {
        return err;
      }
    })();
    expect(error).toBeInstanceOf(DuplicateJobNameError);
    if (error instanceof DuplicateJobNameError) {
      expect(error.names).toEqual(["A"]);
      expect(error.code).toBe("DUPLICATE_JOB_NAME");
    }
  });

  test("lets the last duplicate win when configured", () => {
    const result = reconcileJobs(
      [declared({ name: "A", wakeMode: "now" }), declared({ name: "A", wakeMode: "next-heartbeat" })],
      [runtime({ id: "x1", name: "A" })],
      { now: NOW, duplicateNames: "last-wins" },
    );
    expect(result).toHaveLength(1);
    expect(result[0]?.wakeMode).toBe("next-heartbeat");
  });

  test("does not mutate its inputs", () => {
    const runtimeJobs = [runtime({ id: "a", name: "A" })];
    const snapshot = structuredClone(runtimeJobs);
    reconcileJobs([declared({ name: "A" })], runtimeJobs, { now: NOW });
    expect(runtimeJobs).toEqual(snapshot);
  });
});

describe("summarizeReconcile", () => {
  test("counts updated, added and kept jobs", () => {
    const declaredJobs = [declared({ name: "A" }), declared({ name: "new" })];
    const runtimeJobs = [runtime({ id: "a", name: "A" }), runtime({ id: "u", name: "user" })];
    const merged = reconcileJobs(declaredJobs, runtimeJobs, { now: NOW, generateId: idSequence("n") });

    expect(summarizeReconcile(runtimeJobs, merged, declaredJobs)).toEqual({
      total: 3,
      updated: 1,
      added: 1,
      kept: 1,
    });
  });
});
