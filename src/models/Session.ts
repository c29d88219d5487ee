import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { Session } from '../types/session';

export const SlotSetSchema = z.object({
  name: z.string().optional(),
  destination: z.string().optional(),
  course: z.string().optional(),
});

export const TranscriptEntrySchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
});

// Files written before session ids existed carry only `history` and `slots`.
export const SessionSchema = z.object({
  sessionId: z
    .string()
    .min(1)
    .default(() => uuidv4()),
  slots: SlotSetSchema,
  history: z.array(TranscriptEntrySchema),
});

export function serializeSession(session: Session): string {
  return `${JSON.stringify(session, null, 2)}\n`;
}

/** Throws on malformed JSON or a structurally invalid session. */
export function deserializeSession(serialized: string): Session {
  const parsed: unknown = JSON.parse(serialized);
  const session = SessionSchema.parse(parsed);
  const slots: Session['slots'] = {};
  if (session.slots.name !== undefined) slots.name = session.slots.name;
  if (session.slots.destination !== undefined) {
    slots.destination = session.slots.destination;
  }
  if (session.slots.course !== undefined) slots.course = session.slots.course;

  return {
    sessionId: session.sessionId,
    slots,
    history: session.history,
  };
}
