import { Session, SLOT_NAMES, SlotName } from '../types/session';
import { MemoryStore } from './MemoryStore';
import { logger } from '../utils/logger';

export type Command = 'reset' | 'summary' | 'exit';

const COMMANDS: readonly Command[] = ['reset', 'summary', 'exit'];

const SLOT_LABELS: Record<SlotName, string> = {
  name: 'Name',
  destination: 'Destination',
  course: 'Course',
};

export interface CommandResult {
  session: Session;
  output: string;
  shouldExit: boolean;
}

export function parseCommand(input: string): Command | null {
  const normalized = input.trim().toLowerCase();
  return COMMANDS.find((command) => command === normalized) ?? null;
}

export function renderSummary(session: Session): string {
  const lines = ['--- Session Summary ---'];
  for (const slot of SLOT_NAMES) {
    lines.push(`${SLOT_LABELS[slot]}: ${session.slots[slot] ?? '(not set)'}`);
  }
  lines.push('');
  if (session.history.length === 0) {
    lines.push('(no conversation yet)');
  }
  for (const entry of session.history) {
    const role = entry.role === 'user' ? 'User' : 'Assistant';
    lines.push(`${role}: ${entry.content}`);
  }
  lines.push('-----------------------');
  return lines.join('\n');
}

export class CommandDispatcher {
  constructor(private readonly memoryStore: MemoryStore) {}

  async dispatch(command: Command, session: Session): Promise<CommandResult> {
    logger.info('Dispatching command', {
      command,
      sessionId: session.sessionId,
    });

    switch (command) {
      case 'reset': {
        const fresh = await this.memoryStore.reset();
        return { session: fresh, output: 'Memory cleared.', shouldExit: false };
      }
      case 'summary':
        return {
          session,
          output: renderSummary(session),
          shouldExit: false,
        };
      case 'exit':
        await this.memoryStore.save(session);
        return { session, output: 'Goodbye!', shouldExit: true };
    }
  }
}
