import type { z } from "zod";

export const toValidationError = (error: z.ZodError, source: "params" | "query" | "body") => ({
  detail: error.issues.map((issue) => ({
    type: issue.code,
    loc: [source, ...issue.path],
    msg: issue.message
  }))
});
