export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export type TokenHandler = (token: string) => void | Promise<void>;

export interface AIProvider {
  readonly model: string;
  /**
   * Streams a chat completion, handing every non-empty delta to `onToken`
   * before resolving with the full (trimmed) reply.
   */
  streamChat(messages: ChatMessage[], onToken?: TokenHandler): Promise<string>;
}
