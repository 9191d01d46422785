import { readFile } from "node:fs/promises";
import { networkInterfaces } from "node:os";

import { parse as parseYaml } from "yaml";
import { z } from "zod";

import type { PortRangeMode } from "../lib/env.ts";
import { ipAddressString, portNumber } from "../lib/zod.ts";
import { ConfigurationError } from "./errors.ts";
import type { Host, PortRange, TestDefinition } from "./host.ts";

// Every port of a range is dialled in the same cycle.
export const MAX_PORT_RANGE_SIZE = 256;

const testEntrySchema = z.object({
  protocol: z
    .string()
    .trim()
    .default("ICMP")
    .transform((value) => value.toUpperCase())
    .pipe(z.enum(["ICMP", "TCP"])),
  port: z.union([z.number(), z.string()]).optional(),
  policy: z.enum(["any", "all"]).optional(),
});

const hostDetailsSchema = z
  .object({
    description: z.union([z.string(), z.number()]).optional(),
    tests: z.array(testEntrySchema).nullish(),
  })
  .nullish();

const configDocumentSchema = z.object({
  // A bare `ignore_self:` key parses as null and turns the option on.
  ignore_self: z.boolean().nullish(),
  hosts: z
    .array(
      z.record(z.string(), hostDetailsSchema).refine((entry) => Object.keys(entry).length === 1, {
        message: "Each host entry must have exactly one key, the IP address",
      }),
    )
    .min(1),
});

type TestEntry = z.infer<typeof testEntrySchema>;

export type ParseHostsOptions = {
  portRangeMode?: PortRangeMode;
  localAddresses?: () => ReadonlySet<string>;
};

function listLocalAddresses(): ReadonlySet<string> {
  const addresses = new Set<string>();
  for (const interfaceAddresses of Object.values(networkInterfaces())) {
    for (const { address } of interfaceAddresses ?? []) {
      addresses.add(address);
    }
  }
  return addresses;
}

function formatPath(path: readonly PropertyKey[]): string {
  return path.map(String).join(".");
}

export function parsePortSpec(value: number | string): PortRange | string {
  if (typeof value === "number") {
    const port = portNumber.safeParse(value);
    return port.success ? { low: port.data, high: port.data } : `Invalid port ${value}`;
  }

  const match = value.trim().match(/^(\d+)(?:\s*-\s*(\d+))?$/);
  if (!match) {
    return `Invalid port "${value}", expected a number or a "low-high" range`;
  }

  const low = portNumber.safeParse(match[1]);
  const high = portNumber.safeParse(match[2] ?? match[1]);
  if (!low.success || !high.success) {
    return `Port "${value}" is outside 1-65535`;
  }
  if (low.data > high.data) {
    return `Port range "${value}" starts above its end`;
  }
  if (high.data - low.data + 1 > MAX_PORT_RANGE_SIZE) {
    return `Port range "${value}" spans more than ${MAX_PORT_RANGE_SIZE} ports`;
  }

  return { low: low.data, high: high.data };
}

function buildTests(
  entries: readonly TestEntry[],
  portRangeMode: PortRangeMode,
  path: readonly PropertyKey[],
  issues: string[],
): TestDefinition[] {
  const tests: TestDefinition[] = [];

  entries.forEach((entry, index) => {
    if (entry.protocol === "ICMP") {
      tests.push({ protocol: "icmp" });
      return;
    }

    const portPath = formatPath([...path, index, "port"]);
    if (entry.port === undefined) {
      issues.push(`${portPath}: TCP tests must specify a port`);
      return;
    }

    const ports = parsePortSpec(entry.port);
    if (typeof ports === "string") {
      issues.push(`${portPath}: ${ports}`);
      return;
    }

    if (portRangeMode === "each" && entry.policy === undefined) {
      for (let port = ports.low; port <= ports.high; port += 1) {
        tests.push({ protocol: "tcp", ports: { low: port, high: port }, policy: "any" });
      }
      return;
    }

    const policy = entry.policy ?? (portRangeMode === "each" ? "any" : portRangeMode);
    tests.push({ protocol: "tcp", ports, policy });
  });

  return tests;
}

/**
 * Turns a parsed host document into hosts. A host without tests gets a single
 * ICMP test. All problems are collected and raised together.
 */
export function parseHostsDocument(
  document: unknown,
  { portRangeMode = "any", localAddresses = listLocalAddresses }: ParseHostsOptions = {},
): Host[] {
  const parsed = configDocumentSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigurationError(
      "Invalid host configuration",
      parsed.error.issues.map((issue) => `${formatPath(issue.path)}: ${issue.message}`),
    );
  }

  const ignoreSelf = parsed.data.ignore_self !== undefined && parsed.data.ignore_self !== false;
  const ignored = ignoreSelf ? localAddresses() : new Set<string>();
  const issues: string[] = [];
  const hosts: Host[] = [];

  parsed.data.hosts.forEach((entry, index) => {
    for (const [key, details] of Object.entries(entry)) {
      const path = ["hosts", index, key];
      const address = ipAddressString.safeParse(key);
      if (!address.success) {
        issues.push(`${formatPath(path)}: Invalid IP address "${key}"`);
        continue;
      }

      if (ignored.has(address.data)) {
        continue;
      }

      const tests = details?.tests?.length
        ? buildTests(details.tests, portRangeMode, [...path, "tests"], issues)
        : [{ protocol: "icmp" } satisfies TestDefinition];

      hosts.push({
        address: address.data,
        description:
          details?.description === undefined ? address.data : String(details.description),
        tests,
      });
    }
  });

  if (issues.length > 0) {
    throw new ConfigurationError("Invalid host configuration", issues);
  }

  if (hosts.length === 0) {
    throw new ConfigurationError("No hosts left to monitor after ignoring local addresses");
  }

  return hosts;
}

export async function loadHostsFile(path: string, options?: ParseHostsOptions): Promise<Host[]> {
  let source: string;
  try {
    source = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read host configuration ${path}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  let document: unknown;
  try {
    document = parseYaml(source);
  } catch (error) {
    throw new ConfigurationError(`Cannot parse host configuration ${path}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  return parseHostsDocument(document, options);
}
