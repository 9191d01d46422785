import { isIP } from "node:net";

import { z } from "zod";

function blankAsUndefined(value: unknown): unknown {
  if (typeof value !== "string") {
    return value;
  }

  if (value.trim() === "") {
    return;
  }

  return value;
}

export function optionalNonBlank<TSchema extends z.ZodType>(schema: TSchema) {
  return z.preprocess(blankAsUndefined, z.optional(schema));
}

export const optionalNonBlankString = optionalNonBlank(z.string());

export const ipAddressString = z
  .string()
  .trim()
  .refine((value) => isIP(value) !== 0, {
    message: "Invalid IP address",
  });

export const portNumber = z.coerce.number().int().min(1).max(65_535);

export const positiveMilliseconds = z.coerce.number().int().min(1);
