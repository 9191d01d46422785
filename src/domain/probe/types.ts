export type ProbeResult =
  | {
      ok: true;
      latencyMs: number | undefined;
    }
  | {
      ok: false;
      reason: string;
    };

export function probeSucceeded(latencyMs: number | undefined): ProbeResult {
  return { ok: true, latencyMs };
}

export function probeFailed(reason: string): ProbeResult {
  return { ok: false, reason };
}

export function roundLatency(latencyMs: number): number {
  return Math.round(latencyMs * 100) / 100;
}
