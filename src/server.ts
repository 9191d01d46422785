import fastifySensible from "@fastify/sensible";
import fastify, { type FastifyInstance } from "fastify";
import { serializerCompiler, validatorCompiler } from "fastify-type-provider-zod";

import type { LogLevel } from "./lib/env.ts";
import { statusPlugin } from "./lib/fastify/status/plugin.ts";
import type { SnapshotSource } from "./lib/fastify/status/types.ts";

type CreateFastifyServerOptions = {
  getSnapshot: SnapshotSource;
  logLevel?: LogLevel | undefined;
};

export function createFastifyServer({
  getSnapshot,
  logLevel,
}: CreateFastifyServerOptions): FastifyInstance {
  const server = fastify({
    logger:
      logLevel === undefined
        ? false
        : {
            level: logLevel,
            stream: process.stderr,
          },
  });

  server.setValidatorCompiler(validatorCompiler);
  server.setSerializerCompiler(serializerCompiler);

  server.register(fastifySensible);

  server.register(statusPlugin, {
    getSnapshot,
  });

  return server;
}
