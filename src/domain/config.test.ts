import assert from "node:assert/strict";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import test from "node:test";

import { parse as parseYaml } from "yaml";

import { loadHostsFile, parseHostsDocument, parsePortSpec } from "./config.ts";
import { ConfigurationError } from "./errors.ts";

const noLocalAddresses = () => new Set<string>();

function parseHosts(source: string, portRangeMode: "any" | "all" | "each" = "any") {
  return parseHostsDocument(parseYaml(source), {
    portRangeMode,
    localAddresses: noLocalAddresses,
  });
}

function assertConfigurationError(run: () => unknown, message: string): void {
  assert.throws(run, (error: unknown) => {
    assert.ok(error instanceof ConfigurationError);
    assert.strictEqual(error.message, message);
    return true;
  });
}

await test("parsePortSpec", async (t) => {
  await t.test("accepts a single numeric port", () => {
    assert.deepStrictEqual(parsePortSpec(22), { low: 22, high: 22 });
  });

  await t.test("accepts a numeric string", () => {
    assert.deepStrictEqual(parsePortSpec("443"), { low: 443, high: 443 });
  });

  await t.test("accepts an inclusive range", () => {
    assert.deepStrictEqual(parsePortSpec("8000-8002"), { low: 8000, high: 8002 });
  });

  await t.test("rejects a reversed range", () => {
    assert.strictEqual(parsePortSpec("9000-8000"), 'Port range "9000-8000" starts above its end');
  });

  await t.test("rejects ports above 65535", () => {
    assert.strictEqual(parsePortSpec("70000"), 'Port "70000" is outside 1-65535');
  });

  await t.test("rejects ranges wider than the limit", () => {
    assert.strictEqual(parsePortSpec("1-1000"), 'Port range "1-1000" spans more than 256 ports');
  });

  await t.test("rejects words", () => {
    assert.strictEqual(
      parsePortSpec("ssh"),
      'Invalid port "ssh", expected a number or a "low-high" range',
    );
  });
});

await test("parseHostsDocument", async (t) => {
  await t.test("gives a host without tests a single ICMP test", () => {
    const hosts = parseHosts(`
hosts:
  - 10.0.0.1:
      description: Gateway
  - 10.0.0.9:
`);

    assert.deepStrictEqual(hosts, [
      { address: "10.0.0.1", description: "Gateway", tests: [{ protocol: "icmp" }] },
      { address: "10.0.0.9", description: "10.0.0.9", tests: [{ protocol: "icmp" }] },
    ]);
  });

  await t.test("parses ICMP and TCP tests in order", () => {
    const hosts = parseHosts(`
hosts:
  - 10.0.0.2:
      description: App server
      tests:
        - protocol: icmp
        - protocol: TCP
          port: 22
        - protocol: TCP
          port: 8000-8002
          policy: all
`);

    assert.deepStrictEqual(hosts[0]?.tests, [
      { protocol: "icmp" },
      { protocol: "tcp", ports: { low: 22, high: 22 }, policy: "any" },
      { protocol: "tcp", ports: { low: 8000, high: 8002 }, policy: "all" },
    ]);
  });

  await t.test("applies the default range policy", () => {
    const hosts = parseHosts(
      `
hosts:
  - 10.0.0.2:
      tests:
        - protocol: TCP
          port: 8000-8001
`,
      "all",
    );

    assert.deepStrictEqual(hosts[0]?.tests, [
      { protocol: "tcp", ports: { low: 8000, high: 8001 }, policy: "all" },
    ]);
  });

  await t.test("expands ranges into one test per port in each mode", () => {
    const hosts = parseHosts(
      `
hosts:
  - 10.0.0.2:
      tests:
        - protocol: TCP
          port: 8000-8002
`,
      "each",
    );

    assert.deepStrictEqual(hosts[0]?.tests, [
      { protocol: "tcp", ports: { low: 8000, high: 8000 }, policy: "any" },
      { protocol: "tcp", ports: { low: 8001, high: 8001 }, policy: "any" },
      { protocol: "tcp", ports: { low: 8002, high: 8002 }, policy: "any" },
    ]);
  });

  await t.test("skips this machine's addresses when ignore_self is set", () => {
    const hosts = parseHostsDocument(
      parseYaml(`
ignore_self: true
hosts:
  - 127.0.0.1:
  - 10.0.0.1:
`),
      { localAddresses: () => new Set(["127.0.0.1"]) },
    );

    assert.deepStrictEqual(
      hosts.map((host) => host.address),
      ["10.0.0.1"],
    );
  });

  await t.test("treats a bare ignore_self key as enabled", () => {
    const hosts = parseHostsDocument(
      parseYaml("ignore_self:\nhosts:\n  - 127.0.0.1:\n  - 10.0.0.1:\n"),
      { localAddresses: () => new Set(["127.0.0.1"]) },
    );

    assert.deepStrictEqual(
      hosts.map((host) => host.address),
      ["10.0.0.1"],
    );
  });

  await t.test("keeps local addresses when ignore_self is false", () => {
    const hosts = parseHostsDocument(
      parseYaml("ignore_self: false\nhosts:\n  - 127.0.0.1:\n"),
      { localAddresses: () => new Set(["127.0.0.1"]) },
    );

    assert.deepStrictEqual(
      hosts.map((host) => host.address),
      ["127.0.0.1"],
    );
  });

  await t.test("fails when ignore_self removes every host", () => {
    assertConfigurationError(
      () =>
        parseHostsDocument(parseYaml("ignore_self: true\nhosts:\n  - 127.0.0.1:\n"), {
          localAddresses: () => new Set(["127.0.0.1"]),
        }),
      "No hosts left to monitor after ignoring local addresses",
    );
  });

  await t.test("rejects an empty hosts list", () => {
    assertConfigurationError(
      () => parseHosts("hosts: []\n"),
      "Invalid host configuration: hosts: Too small: expected array to have >=1 items",
    );
  });

  await t.test("reports every invalid host and port together", () => {
    assertConfigurationError(
      () =>
        parseHosts(`
hosts:
  - gateway.local:
  - 10.0.0.2:
      tests:
        - protocol: TCP
        - protocol: TCP
          port: 9000-8000
`),
      'Invalid host configuration: hosts.0.gateway.local: Invalid IP address "gateway.local"; ' +
        "hosts.1.10.0.0.2.tests.0.port: TCP tests must specify a port; " +
        'hosts.1.10.0.0.2.tests.1.port: Port range "9000-8000" starts above its end',
    );
  });

  await t.test("rejects unknown protocols", () => {
    assert.throws(
      () =>
        parseHosts(`
hosts:
  - 10.0.0.2:
      tests:
        - protocol: UDP
`),
      {
        message: /hosts\.0\.10\.0\.0\.2\.tests\.0\.protocol: Invalid option/,
      },
    );
  });

  await t.test("rejects host entries with several addresses", () => {
    assert.throws(
      () =>
        parseHosts(`
hosts:
  - 10.0.0.1:
    10.0.0.2:
`),
      {
        message: /hosts\.0: Each host entry must have exactly one key, the IP address/,
      },
    );
  });
});

await test("loadHostsFile", async (t) => {
  let directory: string;

  t.beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "hostwatch-config-"));
  });

  t.afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  await t.test("reads hosts from a YAML file", async () => {
    const path = join(directory, "hosts.yaml");
    await writeFile(path, "hosts:\n  - 10.0.0.1:\n      description: Gateway\n", "utf8");

    const hosts = await loadHostsFile(path, { localAddresses: noLocalAddresses });

    assert.deepStrictEqual(hosts, [
      { address: "10.0.0.1", description: "Gateway", tests: [{ protocol: "icmp" }] },
    ]);
  });

  await t.test("reports a missing file as a configuration error", async () => {
    const path = join(directory, "missing.yaml");

    await assert.rejects(loadHostsFile(path), (error: unknown) => {
      assert.ok(error instanceof ConfigurationError);
      assert.match(error.message, /^Cannot read host configuration .*missing\.yaml: ENOENT/);
      return true;
    });
  });

  await t.test("reports malformed YAML as a configuration error", async () => {
    const path = join(directory, "broken.yaml");
    await writeFile(path, "hosts:\n  - [10.0.0.1\n", "utf8");

    await assert.rejects(loadHostsFile(path), {
      name: "ConfigurationError",
      message: /^Cannot parse host configuration /,
    });
  });
});
