import fastifyPlugin from "fastify-plugin";
import type { FastifyPluginCallbackZod } from "fastify-type-provider-zod";

import { healthResponseSchema, snapshotResponseSchema } from "./schemas.ts";
import { collectChecks, determineOverallStatus, toSnapshotResponse } from "./status.ts";
import type { SnapshotSource } from "./types.ts";

export type StatusPluginOptions = {
  getSnapshot: SnapshotSource;
};

const statusPluginImpl: FastifyPluginCallbackZod<StatusPluginOptions> = (
  server,
  options,
  done,
): void => {
  server.get(
    "/health",
    {
      schema: {
        response: {
          200: healthResponseSchema,
          503: healthResponseSchema,
        },
      },
    },
    async (_, reply) => {
      const snapshot = options.getSnapshot();
      if (!snapshot) {
        reply.code(503);
        return { status: "warn" as const, cycle: null, checks: {} };
      }

      const checks = collectChecks(snapshot);
      const status = determineOverallStatus(checks);
      const statusCode = status === "error" ? 503 : 200;

      reply.code(statusCode);

      return { status, cycle: snapshot.cycle, checks };
    },
  );

  server.get(
    "/snapshot",
    {
      schema: {
        response: {
          200: snapshotResponseSchema,
        },
      },
    },
    (_, reply) => {
      const snapshot = options.getSnapshot();
      if (!snapshot) {
        reply.serviceUnavailable("No probe cycle has completed yet.");
        return;
      }

      reply.code(200).send(toSnapshotResponse(snapshot));
    },
  );

  done();
};

export const statusPlugin = fastifyPlugin(statusPluginImpl, {
  fastify: "5.x",
  name: "status",
  dependencies: ["@fastify/sensible"],
});
