import assert from "node:assert/strict";
import { Socket } from "node:net";
import test from "node:test";

import type { Host } from "../host.ts";
import { createProbeExecutor, longestProbeMs } from "./executor.ts";

const host: Host = {
  address: "10.0.0.2",
  description: "app server",
  tests: [],
};

await test("createProbeExecutor", async (t) => {
  await t.test("routes TCP tests to the port range probe", async () => {
    const connected: number[] = [];
    const execute = createProbeExecutor({
      tcp: {
        timeoutMs: 1000,
        connect: ({ port }) => {
          connected.push(port);
          const socket = new Socket();
          setImmediate(() => {
            socket.emit("connect");
          });
          return socket;
        },
      },
    });

    const result = await execute(host, {
      protocol: "tcp",
      ports: { low: 22, high: 23 },
      policy: "all",
    });

    assert.strictEqual(result.ok, true);
    assert.deepStrictEqual(connected, [22, 23]);
  });

  await t.test("turns unexpected errors into failures", async () => {
    const execute = createProbeExecutor({
      tcp: {
        connect: () => {
          throw new Error("EMFILE: too many open files");
        },
      },
    });

    const result = await execute(host, {
      protocol: "tcp",
      ports: { low: 22, high: 22 },
      policy: "any",
    });

    assert.deepStrictEqual(result, {
      ok: false,
      reason: "unexpected probe error: EMFILE: too many open files",
    });
  });

  await t.test("routes ICMP tests to ping", async () => {
    const execute = createProbeExecutor({
      icmp: {
        spawnPing: () => {
          throw new Error("spawn ping EACCES");
        },
      },
    });

    const result = await execute(host, { protocol: "icmp" });

    assert.deepStrictEqual(result, { ok: false, reason: "spawn ping EACCES" });
  });
});

await test("longestProbeMs", async (t) => {
  await t.test("covers the ping wait plus its kill grace by default", () => {
    assert.strictEqual(longestProbeMs(), 1250);
  });

  await t.test("uses the TCP timeout when it is the longer one", () => {
    assert.strictEqual(longestProbeMs({ icmp: { timeoutMs: 500 }, tcp: { timeoutMs: 3000 } }), 3000);
  });
});
