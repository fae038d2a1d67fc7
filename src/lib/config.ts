import { z } from "zod";

const flag = z
  .enum(["0", "1"], {
    errorMap: () => ({ message: 'expected "0" or "1"' }),
  })
  .default("0")
  .transform((value) => value === "1");

const envSchema = z.object({
  BANK_UNIFY_DEBUG: flag,
  BANK_UNIFY_STRICT: flag,
});

export type Config = {
  // Print the stack of a fatal error after its message.
  debug: boolean;
  // Exit non-zero when any row was skipped.
  strict: boolean;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join(", ");
    throw new Error(`invalid environment: ${details}`);
  }
  return {
    debug: result.data.BANK_UNIFY_DEBUG,
    strict: result.data.BANK_UNIFY_STRICT,
  };
}
