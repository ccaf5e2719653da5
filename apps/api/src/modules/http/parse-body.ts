import { BadRequestException } from "@nestjs/common";
import type { z } from "zod";

/** Parses a request body, turning zod issues into a 400 with a readable message. */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`);
    throw new BadRequestException(issues.join("; "));
  }
  return result.data;
}
