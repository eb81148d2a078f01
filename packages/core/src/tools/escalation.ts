import { z } from 'zod';

import type { ToolHandler } from './types';

const DEFAULT_REASON = 'Customer asked to speak with a manager';

const escalationArgumentsSchema = z
  .object({
    reason: z.string().trim().optional(),
  })
  .passthrough();

export const escalateToHuman: ToolHandler = ({ arguments: args }) => {
  const parsed = escalationArgumentsSchema.safeParse(args);
  if (!parsed.success) {
    return { ok: false, error: 'Escalation reason must be a string' };
  }

  return {
    ok: true,
    output: { status: 'success', message: 'A manager has been notified' },
    effects: [{ type: 'escalation_requested', reason: parsed.data.reason || DEFAULT_REASON }],
  };
};
