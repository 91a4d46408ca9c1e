import { z } from 'zod';
import type { TransitionEvent } from '../types/stateProgram';
import type { ReplicatedEvent } from '../types/replication';
import { MalformedTransitionError } from '../errors';

/**
 * Zod schemas for transition events arriving from a transport.
 *
 * The envelope is validated here; the transition payload is validated by the
 * schema the application supplies, so each program stays the single source of
 * truth for its own transition shapes.
 */

export const PlayerIdSchema = z.string().min(1).max(128);

export const TransitionEventEnvelopeSchema = z.object({
  originator: PlayerIdSchema.nullable(),
  timestamp: z.number().int().nonnegative(),
  transition: z.unknown(),
});

export const ReplicatedEventEnvelopeSchema = z.object({
  sessionId: z.string().min(1),
  seq: z.number().int().positive(),
  event: TransitionEventEnvelopeSchema,
});

export type TransitionEventEnvelope = z.infer<typeof TransitionEventEnvelopeSchema>;
export type ReplicatedEventEnvelope = z.infer<typeof ReplicatedEventEnvelopeSchema>;

function toIssues(error: z.ZodError, prefix: string[] = []): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => ({
    path: [...prefix, ...issue.path.map(String)].join('.'),
    message: issue.message,
  }));
}

function parseTransition<T>(
  transition: unknown,
  transitionSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
  prefix: string[]
): T {
  const result = transitionSchema.safeParse(transition);
  if (!result.success) {
    throw new MalformedTransitionError(toIssues(result.error, prefix));
  }
  return result.data;
}

export function parseTransitionEvent<T>(
  input: unknown,
  transitionSchema: z.ZodType<T, z.ZodTypeDef, unknown>
): TransitionEvent<T> {
  const envelope = TransitionEventEnvelopeSchema.safeParse(input);
  if (!envelope.success) {
    throw new MalformedTransitionError(toIssues(envelope.error));
  }

  return {
    originator: envelope.data.originator,
    timestamp: envelope.data.timestamp,
    transition: parseTransition(envelope.data.transition, transitionSchema, ['transition']),
  };
}

export function parseReplicatedEvent<T>(
  input: unknown,
  transitionSchema: z.ZodType<T, z.ZodTypeDef, unknown>
): ReplicatedEvent<T> {
  const envelope = ReplicatedEventEnvelopeSchema.safeParse(input);
  if (!envelope.success) {
    throw new MalformedTransitionError(toIssues(envelope.error));
  }

  const { sessionId, seq, event } = envelope.data;
  return {
    sessionId,
    seq,
    event: {
      originator: event.originator,
      timestamp: event.timestamp,
      transition: parseTransition(event.transition, transitionSchema, ['event', 'transition']),
    },
  };
}
