import { z } from 'zod';

/**
 * Zod schema for an event draft handed to the bus.
 *
 * Topic presence and registration are checked by the bus itself
 * (they map to UnregisteredTopicError); this schema covers the rest.
 */
export const eventDraftSchema = z.object({
  topic: z.string().min(1),
  source: z.string().min(1, 'Source cannot be empty'),
  payload: z.record(z.string(), z.unknown()),
  correlationId: z.string().min(1).nullable().optional(),
});

export const intentSchema = z.object({
  name: z.string().min(1),
  confidence: z.number().min(0).max(1),
  entities: z.record(z.string(), z.string()),
});

/**
 * Payload of `conversation.turn` events.
 *
 * Subscribers re-validate it: the bus delivers opaque payloads.
 */
export const turnEventPayloadSchema = z.object({
  turnId: z.string().min(1),
  sessionId: z.string().min(1),
  sequenceNumber: z.number().int().min(1),
  userInput: z.string(),
  detectedIntent: intentSchema.nullable(),
  assistantResponse: z.string(),
  status: z.enum(['COMPLETE', 'DEGRADED']),
  createdAt: z.string().datetime({ offset: true }),
  processingDurationMs: z.number().min(0),
  metadata: z.record(z.string(), z.unknown()),
});

export type TurnEventPayload = z.infer<typeof turnEventPayloadSchema>;
