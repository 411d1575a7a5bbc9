import { z } from "zod";

const EnvSchema = z.object({
  TRACKER_OUTPUT: z.enum(["text", "json"]).default("text"),
  TRACKER_APPROVER: z.string().min(1).default("M1"),
});

export interface TrackerConfig {
  output: "text" | "json";
  /** User id the demo driver approves with. */
  approverId: string;
}

/**
 * Reads the demo driver's settings from the environment.
 * Throws if a variable is set to an unsupported value.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TrackerConfig {
  const parsed = EnvSchema.safeParse({
    TRACKER_OUTPUT: env["TRACKER_OUTPUT"],
    TRACKER_APPROVER: env["TRACKER_APPROVER"],
  });
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }
  return {
    output: parsed.data.TRACKER_OUTPUT,
    approverId: parsed.data.TRACKER_APPROVER,
  };
}
