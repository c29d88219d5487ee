import { Session, SLOT_NAMES, SlotName, SlotSet } from '../types/session';

const MAX_SLOT_WORDS = 6;
const TRIM_CHARS = ' .!?';

// Order matters: the first pattern that matches decides the slot, and the
// value is always taken from the last capture group.
export const SLOT_PATTERNS: Readonly<Record<SlotName, readonly RegExp[]>> = {
  name: [
    /\bmy name is\s+([A-Z][a-zA-Z]+(?:\s+[A-Z][a-zA-Z]+)*)/i,
    /\bi am\s+([A-Z][a-zA-Z]+(?:\s+[A-Z][a-zA-Z]+)*)/i,
  ],
  destination: [
    /\b(study|want to study|plan to study)\s+(?:in|at)\s+([A-Za-z\s]+)/i,
    /\bdestination\s*:\s*([A-Za-z\s]+)/i,
  ],
  course: [
    /\b(interested in|want to study|course is)\s+([A-Za-z\s]+)/i,
    /\bmajor\s*:\s*([A-Za-z\s]+)/i,
  ],
};

function trimChars(value: string, chars: string): string {
  let start = 0;
  let end = value.length;
  while (start < end && chars.includes(value[start])) start++;
  while (end > start && chars.includes(value[end - 1])) end--;
  return value.slice(start, end);
}

function acceptValue(raw: string | undefined): string | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const value = trimChars(raw, TRIM_CHARS);
  const words = value.split(/\s+/).filter((word) => word.length > 0);
  if (words.length === 0 || words.length > MAX_SLOT_WORDS) {
    return undefined;
  }
  return value;
}

export function extractSlots(userText: string): SlotSet {
  const slots: SlotSet = {};

  for (const slot of SLOT_NAMES) {
    for (const pattern of SLOT_PATTERNS[slot]) {
      const match = pattern.exec(userText);
      if (!match) {
        continue;
      }
      const value = acceptValue(match[match.length - 1]);
      if (value !== undefined) {
        slots[slot] = value;
      }
      break;
    }
  }

  return slots;
}

export function applySlots(session: Session, userText: string): Session {
  const extracted = extractSlots(userText);
  if (Object.keys(extracted).length === 0) {
    return session;
  }
  return {
    ...session,
    slots: { ...session.slots, ...extracted },
  };
}
