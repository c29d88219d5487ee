import { Session } from '../types/session';
import { AIProvider, TokenHandler } from '../types/ai-provider';
import { MemoryStore } from './MemoryStore';
import { applySlots } from './SlotExtractor';
import { buildMessages } from './PromptBuilder';
import { logger } from '../utils/logger';
import { toErrorMessage } from '../utils/errors';

export const GENERIC_ERROR_REPLY =
  "I'm sorry, I encountered an issue. Could you please try again?";

export interface TurnResult {
  reply: string;
  updatedSession: Session;
  failed: boolean;
}

export interface ConversationManagerOptions {
  historyWindow?: number;
}

export class ConversationManager {
  private readonly historyWindow: number;

  constructor(
    private readonly provider: AIProvider,
    private readonly memoryStore: MemoryStore,
    options: ConversationManagerOptions = {}
  ) {
    this.historyWindow = options.historyWindow ?? 20;
    logger.info('ConversationManager initialized', {
      model: provider.model,
      historyWindow: this.historyWindow,
    });
  }

  async handleTurn(
    session: Session,
    userText: string,
    onToken?: TokenHandler
  ): Promise<TurnResult> {
    const withUserTurn = applySlots(
      {
        ...session,
        history: [...session.history, { role: 'user', content: userText }],
      },
      userText
    );
    logger.info('User turn recorded', {
      sessionId: withUserTurn.sessionId,
      slots: withUserTurn.slots,
    });
    // The user's message is kept even if the completion below fails.
    await this.memoryStore.save(withUserTurn);

    const messages = buildMessages(withUserTurn, this.historyWindow);

    let reply: string;
    try {
      reply = await this.provider.streamChat(messages, onToken);
    } catch (error) {
      logger.error('Error generating reply', {
        sessionId: withUserTurn.sessionId,
        error: toErrorMessage(error),
      });
      return {
        reply: GENERIC_ERROR_REPLY,
        updatedSession: withUserTurn,
        failed: true,
      };
    }

    const updatedSession: Session = {
      ...withUserTurn,
      history: [...withUserTurn.history, { role: 'assistant', content: reply }],
    };
    await this.memoryStore.save(updatedSession);
    logger.info('Assistant turn recorded', {
      sessionId: updatedSession.sessionId,
      turns: updatedSession.history.length,
    });

    return { reply, updatedSession, failed: false };
  }
}
