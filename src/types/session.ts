export const SLOT_NAMES = ['name', 'destination', 'course'] as const;

export type SlotName = (typeof SLOT_NAMES)[number];

export type SlotSet = Partial<Record<SlotName, string>>;

export type TranscriptRole = 'user' | 'assistant';

export interface TranscriptEntry {
  role: TranscriptRole;
  content: string;
}

export interface Session {
  sessionId: string;
  slots: SlotSet;
  history: TranscriptEntry[];
}
