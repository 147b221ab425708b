import { z } from 'zod';
import type { MovePlan, Settings } from '../types/game';

// Position validation. Coordinates are not bounded here: off-board
// positions are a rule rejection (MOVE_OFF_BOARD), not a malformed plan.
export const PositionSchema = z.object({
  x: z.number().int(),
  y: z.number().int(),
});

export const HandModeSchema = z.enum(['per_world', 'global']);
export const TimeDirectionPolicySchema = z.enum(['past_only', 'bidirectional']);
export const CheckAttackModeSchema = z.enum(['possible', 'certain']);

export const SettingsSchema = z.object({
  maxWorlds: z.number().int().min(1),
  maxTimeJump: z.number().int().min(0),
  handMode: HandModeSchema,
  timeDirectionPolicy: TimeDirectionPolicySchema,
  checkAttackMode: CheckAttackModeSchema,
});

export type SettingsInput = z.infer<typeof SettingsSchema>;

// Move plan validation
// NOTE: front ends typically build plans from loose form inputs; missing
// fields take the same defaults an empty input box would.
export const MovePlanSchema = z.object({
  mode: z.enum(['move', 'drop']),
  from: PositionSchema.default({ x: 0, y: 0 }),
  to: PositionSchema,
  handIndex: z.number().int().default(0),
  promote: z.boolean().default(false),
  deltaWorld: z.number().int().default(0),
  deltaTime: z.number().int().default(0),
});

export type MovePlanInput = z.input<typeof MovePlanSchema>;

export interface SchemaIssue {
  path: string;
  message: string;
}

export type SchemaParseResult<T> =
  | { success: true; data: T }
  | { success: false; errors: SchemaIssue[] };

function toIssues(error: z.ZodError): SchemaIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

export function parseMovePlan(input: unknown): SchemaParseResult<MovePlan> {
  const result = MovePlanSchema.safeParse(input);
  if (!result.success) {
    return { success: false, errors: toIssues(result.error) };
  }
  return { success: true, data: result.data };
}

export function parseSettings(input: unknown): SchemaParseResult<Settings> {
  const result = SettingsSchema.safeParse(input);
  if (!result.success) {
    return { success: false, errors: toIssues(result.error) };
  }
  return { success: true, data: result.data };
}
