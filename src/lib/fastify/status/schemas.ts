import { z } from "zod";

import { testStatuses } from "../../../domain/status.ts";

export const checkStatusSchema = z.enum(["ok", "warn", "error"]);

export const healthResponseSchema = z.object({
  status: checkStatusSchema,
  cycle: z.number().int().nullable(),
  checks: z.record(z.string(), checkStatusSchema),
});

const testStatusSchema = z.enum(testStatuses);

const testSnapshotSchema = z.object({
  key: z.string(),
  label: z.string(),
  protocol: z.enum(["icmp", "tcp"]),
  status: testStatusSchema.nullable(),
  latencyMs: z.number().nullable(),
  lastUpAt: z.string().nullable(),
  lastChangeAt: z.string().nullable(),
  failureReason: z.string().nullable(),
  history: z.array(testStatusSchema.nullable()),
});

export const snapshotResponseSchema = z.object({
  cycle: z.number().int(),
  startedAt: z.string(),
  completedAt: z.string(),
  summary: z.object({
    total: z.number().int(),
    up: z.number().int(),
    slow: z.number().int(),
    down: z.number().int(),
    pending: z.number().int(),
  }),
  hosts: z.array(
    z.object({
      address: z.string(),
      description: z.string(),
      tests: z.array(testSnapshotSchema),
    }),
  ),
});
