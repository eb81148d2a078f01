import { z } from 'zod';

import { InvalidTurnRequestError } from '../errors';

const MAX_TEXT_LENGTH = 8000;

const turnParamsSchema = z.object({
  userId: z.string().trim().min(1, 'must not be empty').max(256, 'must be at most 256 characters'),
});

const turnBodySchema = z.object({
  text: z
    .string({ required_error: 'is required', invalid_type_error: 'must be a string' })
    .trim()
    .min(1, 'must not be empty')
    .max(MAX_TEXT_LENGTH, `must be at most ${MAX_TEXT_LENGTH} characters`),
});

export interface TurnRequest {
  userId: string;
  text: string;
}

/**
 * Validate the path parameters and body of a turn request. Validation
 * failures surface as {@link InvalidTurnRequestError} so the route answers
 * 400 before the orchestrator is touched.
 */
export function parseTurnRequest(params: unknown, body: unknown): TurnRequest {
  const parsedParams = turnParamsSchema.safeParse(params);
  if (!parsedParams.success) {
    throw toRequestError(parsedParams.error);
  }

  const parsedBody = turnBodySchema.safeParse(body);
  if (!parsedBody.success) {
    throw toRequestError(parsedBody.error);
  }

  return { userId: parsedParams.data.userId, text: parsedBody.data.text };
}

function toRequestError(error: z.ZodError): InvalidTurnRequestError {
  const issue = error.issues[0];
  const path = issue?.path.join('.');
  const detail = issue ? `${path ? `${path} ` : ''}${issue.message}` : 'unknown issue';
  return new InvalidTurnRequestError(`Invalid turn request: ${detail}`);
}
