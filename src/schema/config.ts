import { z } from 'zod';

// ── Browser block ───────────────────────────────────────────

export const browserConfigSchema = z.object({
  binary: z.string().min(1).optional(),
  profileDir: z.string().min(1).optional(),
  debugPort: z.number().int().min(1).max(65_535).optional(),
  headless: z.boolean().optional(),
});

export type BrowserConfig = z.infer<typeof browserConfigSchema>;

// ── Pacing block (milliseconds) ─────────────────────────────

export const pacingConfigSchema = z.object({
  challengePoll: z.number().int().positive().optional(),
  enrichDelay: z.number().int().nonnegative().optional(),
  elementWait: z.number().int().positive().optional(),
});

export type PacingConfig = z.infer<typeof pacingConfigSchema>;

// ── Full config file ────────────────────────────────────────

export const fileConfigSchema = z.object({
  storeUrl: z.string().url().optional(),
  output: z.string().min(1).optional(),
  challengeMarker: z.string().min(1).optional(),
  browser: browserConfigSchema.optional().default({}),
  pacing: pacingConfigSchema.optional().default({}),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
