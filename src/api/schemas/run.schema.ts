import { z } from 'zod';

const delaySeconds = z.number().nonnegative().max(3600);

export const startRunSchema = z
  .object({
    username: z.string().min(1),
    password: z.string().min(1),
    gameUrl: z.string().url(),
    spreadsheetPath: z.string().min(1),
    minDelaySeconds: delaySeconds.optional(),
    maxDelaySeconds: delaySeconds.optional(),
    maxBetPrice: z.number().positive().optional(),
  })
  .refine(
    (v) =>
      v.minDelaySeconds === undefined ||
      v.maxDelaySeconds === undefined ||
      v.minDelaySeconds <= v.maxDelaySeconds,
    { message: 'minDelaySeconds must not exceed maxDelaySeconds', path: ['minDelaySeconds'] },
  );

export type StartRunBody = z.infer<typeof startRunSchema>;

export const delayRangeSchema = z
  .object({
    minSeconds: delaySeconds,
    maxSeconds: delaySeconds,
  })
  .refine((v) => v.minSeconds <= v.maxSeconds, {
    message: 'minSeconds must not exceed maxSeconds',
    path: ['minSeconds'],
  });

export type DelayRangeBody = z.infer<typeof delayRangeSchema>;

export const spreadsheetPathSchema = z.object({
  path: z.string().min(1),
});

export type SpreadsheetPathBody = z.infer<typeof spreadsheetPathSchema>;
