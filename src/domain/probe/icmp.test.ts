import assert from "node:assert/strict";
import { EventEmitter } from "node:events";
import test from "node:test";

import { buildPingArgs, parsePingLatency, probeIcmp, type SpawnPing } from "./icmp.ts";

class FakePingProcess extends EventEmitter {
  readonly stdout = new EventEmitter();
  readonly killedWith: NodeJS.Signals[] = [];

  kill(signal?: NodeJS.Signals): boolean {
    if (signal) {
      this.killedWith.push(signal);
    }
    return true;
  }
}

type SpawnCall = {
  command: string;
  args: readonly string[];
};

function createFakeSpawn(child: FakePingProcess): { spawnPing: SpawnPing; calls: SpawnCall[] } {
  const calls: SpawnCall[] = [];
  return {
    calls,
    spawnPing: (command, args) => {
      calls.push({ command, args });
      return child;
    },
  };
}

const linuxReply = [
  "PING 10.0.0.1 (10.0.0.1) 56(84) bytes of data.",
  "64 bytes from 10.0.0.1: icmp_seq=1 ttl=64 time=12.4 ms",
  "",
  "--- 10.0.0.1 ping statistics ---",
  "1 packets transmitted, 1 received, 0% packet loss, time 0ms",
  "rtt min/avg/max/mdev = 12.400/12.400/12.400/0.000 ms",
].join("\n");

await test("buildPingArgs", async (t) => {
  await t.test("sends a single echo with the wait in whole seconds", () => {
    assert.deepStrictEqual(buildPingArgs("10.0.0.1", 1000), ["-n", "-c", "1", "-W", "1", "10.0.0.1"]);
  });

  await t.test("rounds sub-second waits up to one second", () => {
    assert.deepStrictEqual(buildPingArgs("10.0.0.1", 300), ["-n", "-c", "1", "-W", "1", "10.0.0.1"]);
  });

  await t.test("selects IPv6 for IPv6 addresses", () => {
    assert.deepStrictEqual(buildPingArgs("fd00::1", 2500), [
      "-6",
      "-n",
      "-c",
      "1",
      "-W",
      "3",
      "fd00::1",
    ]);
  });
});

await test("parsePingLatency", async (t) => {
  await t.test("reads the per-reply time", () => {
    assert.strictEqual(parsePingLatency(linuxReply), 12.4);
  });

  await t.test("reads the summary average when no reply line is present", () => {
    assert.strictEqual(
      parsePingLatency("round-trip min/avg/max/stddev = 15.086/15.512/16.001/0.000 ms"),
      15.512,
    );
  });

  await t.test("returns undefined for a nan average", () => {
    assert.strictEqual(parsePingLatency("round-trip min/avg/max/stddev = 0/nan/0/nan ms"), undefined);
  });

  await t.test("returns undefined for output without timings", () => {
    assert.strictEqual(parsePingLatency("1 packets transmitted, 0 received"), undefined);
  });
});

await test("probeIcmp", async (t) => {
  await t.test("succeeds with the parsed latency on exit code zero", async () => {
    const child = new FakePingProcess();
    const { spawnPing, calls } = createFakeSpawn(child);

    const resultPromise = probeIcmp("10.0.0.1", { spawnPing });
    child.stdout.emit("data", Buffer.from(linuxReply));
    child.emit("close", 0);

    assert.deepStrictEqual(await resultPromise, { ok: true, latencyMs: 12.4 });
    assert.deepStrictEqual(calls, [
      { command: "ping", args: ["-n", "-c", "1", "-W", "1", "10.0.0.1"] },
    ]);
  });

  await t.test("fails on a non-zero exit code", async () => {
    const child = new FakePingProcess();
    const { spawnPing } = createFakeSpawn(child);

    const resultPromise = probeIcmp("10.0.0.1", { spawnPing });
    child.emit("close", 1);

    assert.deepStrictEqual(await resultPromise, { ok: false, reason: "ping exited with code 1" });
  });

  await t.test("folds spawn errors into a failure", async () => {
    const child = new FakePingProcess();
    const { spawnPing } = createFakeSpawn(child);

    const resultPromise = probeIcmp("10.0.0.1", { spawnPing, command: "/missing/ping" });
    child.emit("error", new Error("spawn /missing/ping ENOENT"));
    child.emit("close", null);

    assert.deepStrictEqual(await resultPromise, {
      ok: false,
      reason: "spawn /missing/ping ENOENT",
    });
  });

  await t.test("folds a throwing spawn into a failure", async () => {
    const result = await probeIcmp("10.0.0.1", {
      spawnPing: () => {
        throw new Error("EPERM");
      },
    });

    assert.deepStrictEqual(result, { ok: false, reason: "EPERM" });
  });

  await t.test("kills the process once the wait runs out", async () => {
    const child = new FakePingProcess();
    const { spawnPing } = createFakeSpawn(child);

    const result = await probeIcmp("10.0.0.1", { spawnPing, timeoutMs: 10 });

    assert.deepStrictEqual(result, { ok: false, reason: "no reply within 10ms" });
    assert.deepStrictEqual(child.killedWith, ["SIGKILL"]);
  });
});
