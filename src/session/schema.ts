/**
 * Session file schema.
 * Validation of athlete-entered numbers lives here, not in the calculations.
 */

import { z } from 'zod';

const positive = z.number().finite().positive();
const durationList = z.array(positive).min(2, 'at least 2 efforts are required');

const protocolSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('three-minute'),
    maxIntensity: positive,
    endIntensity: positive,
  }),
  z.object({
    kind: z.literal('time-trial'),
    durations: durationList,
    distances: z.array(positive).min(2, 'at least 2 trials are required'),
  }),
  z.object({
    kind: z.literal('time-to-exhaustion'),
    durations: durationList,
    intensities: z.array(positive).min(2, 'at least 2 efforts are required'),
  }),
  z.object({
    kind: z.literal('three-five-minute'),
    distance3Min: positive,
    distance5Min: positive,
  }),
  z.object({
    kind: z.literal('ramp'),
    finalIntensity: positive,
    timeToExhaustion: positive,
    rampRate: positive,
  }),
]);

const profileSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('steady'),
    intensityPct: z.number().min(70).max(110).optional(),
  }),
  z.object({
    kind: z.literal('intervals'),
    workPct: z.number().min(100).max(150).optional(),
    restPct: z.number().min(50).max(90).optional(),
    workSeconds: z.number().int().min(30).max(300).optional(),
    restSeconds: z.number().int().min(30).max(300).optional(),
  }),
  z.object({
    kind: z.literal('variable'),
    basePct: z.number().min(70).max(100).optional(),
    variabilityPct: z.number().min(5).max(30).optional(),
  }),
  z.object({
    kind: z.literal('race'),
  }),
]);

export const sessionSchema = z
  .object({
    sport: z.enum(['running', 'cycling']),
    /** Unit of running distance inputs and of displayed pace */
    unit: z.enum(['meters', 'kilometers', 'miles']).default('meters'),
    protocol: protocolSchema.optional(),
    /** Known threshold / reserve, used instead of a protocol */
    estimate: z.object({ threshold: positive, reserve: z.number().finite().nonnegative() }).optional(),
    simulation: z
      .object({
        profile: profileSchema,
        durationMinutes: z.number().int().min(5).max(60).default(20),
        tau: positive.optional(),
      })
      .optional(),
  })
  .superRefine((session, ctx) => {
    if (!session.protocol === !session.estimate) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'provide exactly one of protocol or estimate',
        path: ['protocol'],
      });
    }

    const protocol = session.protocol;
    if (!protocol) return;

    if (protocol.kind === 'three-five-minute' && session.sport !== 'running') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'the 3/5-minute test is for running only',
        path: ['protocol', 'kind'],
      });
    }
    if (protocol.kind === 'time-trial' && protocol.durations.length !== protocol.distances.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'durations and distances must have the same length',
        path: ['protocol', 'distances'],
      });
    }
    if (protocol.kind === 'time-to-exhaustion' && protocol.durations.length !== protocol.intensities.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'durations and intensities must have the same length',
        path: ['protocol', 'intensities'],
      });
    }
  });

export type Session = z.infer<typeof sessionSchema>;
/** Raw session before defaults are applied */
export type SessionInput = z.input<typeof sessionSchema>;

/**
 * Format zod issues one per line as "path: message"
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}
