import { z } from "zod";

/**
 * Snapshot of the web application's settings that the readiness checks read.
 * Optional keys stay undefined when not configured; presence is the signal.
 */
export const SettingsSchema = z.object({
  DEBUG: z.boolean().default(false),
  SECRET_KEY: z.string({ required_error: "SECRET_KEY is required" }),
  TENANT_DOMAIN: z.string().optional(),
  ALLOWED_HOSTS: z.array(z.string()).default([]),
  TENANT_MODEL: z.string().optional(),
});

export type Settings = z.infer<typeof SettingsSchema>;
