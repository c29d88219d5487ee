import { ChatMessage } from '../types/ai-provider';
import { Session, SlotSet } from '../types/session';

export const BASE_PROMPT =
  'You are EduGuide, a helpful academic assistant. ' +
  'You should only answer questions related to education: universities, ' +
  'scholarships, study abroad, courses, exams, and student life. ' +
  'If asked about something else, politely say that you only answer education-related questions.\n\n' +
  'Consider any context provided (name, destination, course) when shaping your replies.';

export function buildSystemContext(slots: SlotSet): string {
  const details: string[] = [];
  if (slots.name) {
    details.push(`User's name: ${slots.name}`);
  }
  if (slots.destination) {
    details.push(`Preferred study destination: ${slots.destination}`);
  }
  if (slots.course) {
    details.push(`Interested course/degree: ${slots.course}`);
  }

  if (details.length === 0) {
    return BASE_PROMPT;
  }
  return `${BASE_PROMPT}\n\nContext:\n- ${details.join('\n- ')}`;
}

export function buildMessages(
  session: Session,
  historyWindow: number
): ChatMessage[] {
  const recent = historyWindow > 0 ? session.history.slice(-historyWindow) : [];
  return [
    { role: 'system', content: buildSystemContext(session.slots) },
    ...recent.map(
      (entry): ChatMessage => ({ role: entry.role, content: entry.content })
    ),
  ];
}
