import net from "node:net";
import { afterEach, describe, expect, test } from "vitest";
import { canConnect, PortWaitTimeout, waitForPort } from "./port-probe";

async function listen(server: net.Server): Promise<number> {
  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (typeof address !== "object" || !address) {
    throw new Error("server has no TCP address");
  }
  return address.port;
}

async function freePort(): Promise<number> {
  const server = net.createServer();
  const port = await listen(server);
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return port;
}

describe("port probe", () => {
  const servers: net.Server[] = [];

  afterEach(async () => {
    await Promise.all(
      servers.splice(0).map((server) => new Promise<void>((resolve) => server.close(() => resolve()))),
    );
  });

  test("canConnect reports a listening port", async () => {
    const server = net.createServer((socket) => socket.destroy());
    servers.push(server);
    const port = await listen(server);
    expect(await canConnect("127.0.0.1", port)).toBe(true);
  });

  test("canConnect reports a closed port", async () => {
    expect(await canConnect("127.0.0.1", await freePort())).toBe(false);
  });

  test("waitForPort resolves once a server starts listening", async () => {
    const port = await freePort();
    const server = net.createServer((socket) => socket.destroy());
    servers.push(server);
    setTimeout(() => server.listen(port, "127.0.0.1"), 100);

    await expect(
      waitForPort({ host: "127.0.0.1", port, timeoutMs: 5_000, intervalMs: 20 }),
    ).resolves.toBeUndefined();
  });

  test("waitForPort rejects with PortWaitTimeout", async () => {
    const port = await freePort();
    await expect(
      waitForPort({ host: "127.0.0.1", port, timeoutMs: 100, intervalMs: 20 }),
    ).rejects.toBeInstanceOf(PortWaitTimeout);
  });

  test("waitForPort stops when aborted", async () => {
    const port = await freePort();
    const controller = new AbortController();
    setTimeout(() => controller.abort(new Error("cancelled")), 50);
    await expect(
      waitForPort({ host: "127.0.0.1", port, timeoutMs: 5_000, intervalMs: 20, signal: controller.signal }),
    ).rejects.toThrow();
  });
});
