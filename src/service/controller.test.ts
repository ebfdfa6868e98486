import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { createTempDir, FakeHandle, removeTempDir, ScriptedLauncher } from "../../tests/harness/fake-process";
import { createStartupErrorArtifact, StartupErrorStore } from "../supervisor/artifact";
import { ProcessExitError, StartupTimeoutError } from "../supervisor/errors";
import { PortWaitTimeout, type PortProbe } from "../supervisor/port-probe";
import { StartupRaceDetector } from "../supervisor/startup-race";
import { StderrLog } from "../supervisor/stderr-log";
import { ServiceController } from "./controller";
import type { LocatedSupervisor } from "./locator";

const reachable: PortProbe = async () => undefined;

const unreachable: PortProbe = (options) =>
  new Promise((_resolve, reject) => {
    const timer = setTimeout(
      () => reject(new PortWaitTimeout(options.host, options.port, options.timeoutMs)),
      options.timeoutMs,
    );
    options.signal?.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        reject(options.signal?.reason);
      },
      { once: true },
    );
  });

describe("ServiceController", () => {
  let dir: string;
  let store: StartupErrorStore;
  let serviceStderr: StderrLog;

  beforeEach(() => {
    dir = createTempDir("controller");
    store = new StartupErrorStore(path.join(dir, "startup-error.json"));
    serviceStderr = new StderrLog(path.join(dir, "service-stderr.log"));
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  function createController(params: {
    located?: LocatedSupervisor;
    attached?: FakeHandle;
    launcher: ScriptedLauncher;
    probe: PortProbe | PortProbe[];
  }) {
    const probes = Array.isArray(params.probe) ? [...params.probe] : [params.probe];
    const probe: PortProbe = (options) => {
      const next = probes.length > 1 ? probes.shift() : probes[0];
      return (next ?? reachable)(options);
    };
    return new ServiceController(
      {
        launch: { command: "warden", args: ["supervise"] },
        race: { host: "127.0.0.1", port: 18789, timeoutMs: 40 },
        stderrTailLines: 2,
        killTimeoutMs: 100,
      },
      {
        locator: { locate: async () => params.located ?? null },
        launcher: params.launcher,
        detector: new StartupRaceDetector(probe),
        store,
        serviceStderr,
        attach: () => params.attached ?? new FakeHandle(params.located?.pid ?? 0),
      },
    );
  }

  test("launches a new supervisor when none is running", async () => {
    const launcher = new ScriptedLauncher(["stay-up"]);
    const result = await createController({ launcher, probe: reachable }).ensureService();

    expect(result).toMatchObject({ pid: 1000, reattached: false });
    expect(launcher.specs).toEqual([{ command: "warden", args: ["supervise"] }]);
  });

  test("re-attaches to a reachable running supervisor", async () => {
    const launcher = new ScriptedLauncher(["stay-up"]);
    const attached = new FakeHandle(77);
    const result = await createController({
      located: { pid: 77, source: "pid_file" },
      attached,
      launcher,
      probe: reachable,
    }).ensureService();

    expect(result).toMatchObject({ pid: 77, reattached: true });
    expect(launcher.handles).toHaveLength(0);
    expect(attached.signals).toEqual([]);
  });

  test("surfaces the artifact and stderr when a re-attached supervisor exits", async () => {
    const artifact = createStartupErrorArtifact("circuit_breaker_open", "Service crashed 3 times within 30s.", {
      crashCount: 3,
    });
    await store.write(artifact);
    serviceStderr.append("first\nsecond\nthird\n");
    const attached = new FakeHandle(77);
    setTimeout(() => attached.exit(null), 5);

    const error = await createController({
      located: { pid: 77, source: "process_table" },
      attached,
      launcher: new ScriptedLauncher(["stay-up"]),
      probe: unreachable,
    })
      .ensureService()
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProcessExitError);
    if (error instanceof ProcessExitError) {
      expect(error.artifact).toEqual(artifact);
      expect(error.stderr).toBe("second\nthird");
      expect(error.exitCode).toBeNull();
      expect(error.message).toBe("Supervisor exited during startup: Service crashed 3 times within 30s.");
    }
  });

  test("kills an unresponsive supervisor and starts a fresh one", async () => {
    const launcher = new ScriptedLauncher(["stay-up"]);
    const attached = new FakeHandle(77);

    const result = await createController({
      located: { pid: 77, source: "pid_file" },
      attached,
      launcher,
      probe: [unreachable, reachable],
    }).ensureService();

    expect(attached.signals).toEqual(["SIGKILL"]);
    expect(result).toMatchObject({ pid: 1000, reattached: false });
  });

  test("reports an early exit of a fresh launch", async () => {
    const error = await createController({
      launcher: new ScriptedLauncher([{ uptimeMs: 0, exitCode: 2 }]),
      probe: unreachable,
    })
      .ensureService()
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProcessExitError);
    if (error instanceof ProcessExitError) {
      expect(error.exitCode).toBe(2);
      expect(error.artifact).toBeUndefined();
      expect(error.message).toBe("Supervisor exited during startup with code 2");
    }
  });

  test("times out a fresh launch that never becomes reachable", async () => {
    serviceStderr.append("listening soon\n");
    const error = await createController({
      launcher: new ScriptedLauncher(["stay-up"]),
      probe: unreachable,
    })
      .ensureService()
      .catch((err: unknown) => err);

    expect(error).toBeInstanceOf(StartupTimeoutError);
    if (error instanceof StartupTimeoutError) {
      expect(error.timeoutMs).toBe(40);
      expect(error.stderr).toBe("listening soon");
    }
  });

  test("propagates launch failures", async () => {
    await expect(
      createController({ launcher: new ScriptedLauncher(["fail"]), probe: reachable }).ensureService(),
    ).rejects.toThrow("spawn fake-service ENOENT");
  });
});
