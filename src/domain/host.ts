export type PortRangePolicy = "any" | "all";

export type PortRange = {
  low: number;
  high: number;
};

export type IcmpTestDefinition = {
  protocol: "icmp";
};

export type TcpTestDefinition = {
  protocol: "tcp";
  ports: PortRange;
  policy: PortRangePolicy;
};

export type TestDefinition = IcmpTestDefinition | TcpTestDefinition;

export type Protocol = TestDefinition["protocol"];

export type Host = {
  address: string;
  description: string;
  tests: readonly TestDefinition[];
};

function formatPortRange({ low, high }: PortRange): string {
  return low === high ? String(low) : `${low}-${high}`;
}

export function testKey(host: Pick<Host, "address">, test: TestDefinition): string {
  switch (test.protocol) {
    case "icmp":
      return `${host.address}/icmp`;
    case "tcp":
      return `${host.address}/tcp/${formatPortRange(test.ports)}`;
  }
}

export function testLabel(test: TestDefinition): string {
  switch (test.protocol) {
    case "icmp":
      return "ICMP";
    case "tcp":
      return test.ports.low === test.ports.high
        ? `TCP port ${test.ports.low}`
        : `TCP ports ${formatPortRange(test.ports)}`;
  }
}
