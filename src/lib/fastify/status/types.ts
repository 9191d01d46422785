import type { z } from "zod";

import type { Snapshot } from "../../../domain/snapshot.ts";
import type {
  checkStatusSchema,
  healthResponseSchema,
  snapshotResponseSchema,
} from "./schemas.ts";

export type CheckStatus = z.infer<typeof checkStatusSchema>;

export type HealthResponse = z.infer<typeof healthResponseSchema>;

export type SnapshotResponse = z.infer<typeof snapshotResponseSchema>;

export type SnapshotSource = () => Snapshot | undefined;
