import { z } from 'zod';
import { parseRole } from '../roles.js';
import { DEFAULT_TOPOLOGY, topologyProblems } from '../topology.js';
import { DEFAULT_INSTRUCTION_TEMPLATE } from '../instructions.js';

export const RoleSchema = z.string().transform((value, ctx) => {
  const role = parseRole(value);
  if (!role) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Unknown role "${value}" (expected coordinator, supervisor or worker<N>)`,
    });
    return z.NEVER;
  }
  return role;
});

export const SessionSchema = z.object({
  name: z.string().min(1),
  panes: z.array(RoleSchema).min(1),
});

/**
 * How the bootstrap waits between staging instructions and submitting them.
 * `fixed` sleeps; `probe` polls pane output for a ready pattern.
 */
export const BarrierSchema = z.discriminatedUnion('mode', [
  z.object({
    mode: z.literal('fixed'),
    settleMs: z.number().int().min(0).default(2000),
  }),
  z.object({
    mode: z.literal('probe'),
    readyPattern: z.string().min(1).refine(
      (pattern) => {
        try {
          new RegExp(pattern);
          return true;
        } catch {
          return false;
        }
      },
      { message: 'readyPattern must be a valid regular expression' }
    ),
    timeoutMs: z.number().int().min(1000).default(30000),
    pollIntervalMs: z.number().int().min(100).default(1000),
  }),
]);

/**
 * crew.json schema. Every field is optional; an empty object gives the
 * default two-session topology.
 */
export const CrewConfigSchema = z
  .object({
    sessions: z
      .array(SessionSchema)
      .min(1)
      .default(() => DEFAULT_TOPOLOGY.sessions.map((session) => ({ name: session.name, panes: [...session.panes] }))),

    // Assistant launched in every pane
    assistantCommand: z.string().min(1).default('claude'),

    // Shared document each role is told to read
    instructionFile: z.string().min(1).default('CLAUDE.md'),
    instructionTemplate: z.string().min(1).default(DEFAULT_INSTRUCTION_TEMPLATE),

    // Completion markers, relative to the working directory
    markerDir: z.string().min(1).default('./tmp'),

    barrier: BarrierSchema.default({ mode: 'fixed', settleMs: 2000 }),

    logDirectory: z.string().min(1).optional(),
  })
  .superRefine((config, ctx) => {
    for (const problem of topologyProblems({ sessions: config.sessions })) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['sessions'], message: problem });
    }
  });

export type CrewConfig = z.infer<typeof CrewConfigSchema>;
export type BarrierConfig = z.infer<typeof BarrierSchema>;
