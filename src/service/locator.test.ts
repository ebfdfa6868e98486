import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { createTempDir, removeTempDir } from "../../tests/harness/fake-process";
import { spawnProcess } from "../supervisor/process";
import { isSupervisorCommand, parseProcessTable, SupervisorLocator, type ProcessEntry } from "./locator";
import { PidFile } from "./pid-file";

describe("parseProcessTable", () => {
  test("splits pid and arguments", () => {
    const stdout = "    1 /sbin/init\n  314 node /opt/warden/bin/warden.mjs supervise --config /etc/w.jsonc\n\n";
    expect(parseProcessTable(stdout)).toEqual([
      { pid: 1, args: "/sbin/init" },
      { pid: 314, args: "node /opt/warden/bin/warden.mjs supervise --config /etc/w.jsonc" },
    ]);
  });
});

const SUPERVISOR_COMMANDS: Array<[string, boolean]> = [
  ["warden supervise", true],
  ["/usr/local/bin/warden supervise --config x", true],
  ["node /opt/warden/bin/warden.mjs supervise", true],
  ["node --import tsx /src/app/src/cli/index.ts supervise", true],
  ["warden status", false],
  ["supervise warden", false],
  ["node server.js supervise", false],
];

describe("isSupervisorCommand", () => {
  test.each(SUPERVISOR_COMMANDS)("%s -> %s", (args, expected) => {
    expect(isSupervisorCommand(args)).toBe(expected);
  });
});

describe("SupervisorLocator", () => {
  let dir: string;
  let pidFile: PidFile;

  beforeEach(() => {
    dir = createTempDir("locator");
    pidFile = new PidFile(path.join(dir, "warden.pid"));
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  test("finds a live process through the pid file", async () => {
    const child = await spawnProcess({ command: process.execPath, args: ["-e", "setInterval(() => {}, 1000)"] });
    try {
      fs.writeFileSync(pidFile.filePath, String(child.pid));
      const locator = new SupervisorLocator(pidFile, async () => {
        throw new Error("process table should not be consulted");
      });
      expect(await locator.locate()).toEqual({ pid: child.pid, source: "pid_file" });
    } finally {
      child.kill("SIGKILL");
      await child.waitForExit();
    }
  });

  test("falls back to the process table", async () => {
    const entries: ProcessEntry[] = [
      { pid: 10, args: "node server.js" },
      { pid: 20, args: "warden supervise" },
      { pid: 30, args: "warden supervise" },
    ];
    const locator = new SupervisorLocator(pidFile, async () => entries, 20);
    expect(await locator.locate()).toEqual({ pid: 30, source: "process_table", command: "warden supervise" });
  });

  test("returns null when nothing matches or listing fails", async () => {
    expect(await new SupervisorLocator(pidFile, async () => []).locate()).toBeNull();
    const failing = new SupervisorLocator(pidFile, async () => {
      throw new Error("ps: not found");
    });
    expect(await failing.locate()).toBeNull();
  });
});
