import { z } from "zod";

/** Largest delay setTimeout honours; anything above fires after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

const positiveMs = z
  .number()
  .int()
  .positive()
  .max(MAX_TIMER_DELAY_MS, `must not exceed ${MAX_TIMER_DELAY_MS}ms`);

export const localTransportConfigSchema = z
  .object({
    // Timeouts
    commandTimeoutMs: positiveMs.optional(),
    sessionResponseTimeoutMs: positiveMs.optional(),

    // Session acquisition
    pipeConnectAttempts: z.number().int().min(1).optional(),
    pipeConnectIntervalMs: positiveMs.optional(),
    pipeNamePrefix: z
      .string()
      .regex(/^[A-Za-z0-9_-]+$/, "must contain only letters, digits, '_' or '-'")
      .optional(),
    sessionEnabled: z.boolean().optional(),

    // Windows scripting host
    scriptingHost: z.string().min(1).optional(),
  })
  .strict();
