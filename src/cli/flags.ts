import type { z } from "zod";

import { formatIssues } from "../core/config-loader.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

/** Validates commander's parsed options; bad values surface as an input error. */
export function parseFlags<T extends z.ZodTypeAny>(schema: T, value: unknown, commandName: string): z.infer<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.input,
      title: `Invalid options for \`${commandName}\`.`,
      message: formatIssues(parsed.error.issues),
      hint: `Run \`import-gate ${commandName} --help\` for usage.`,
    });
  }
  return parsed.data;
}
