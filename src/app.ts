#!/usr/bin/env node
import readline from 'readline';
import { Readable, Writable } from 'stream';
import { AppConfig, loadConfigFromEnvironment } from './config/index';
import { TogetherAIProvider } from './providers/together/index';
import { MemoryStore } from './services/MemoryStore';
import { ConversationManager } from './services/ConversationManager';
import { CommandDispatcher, parseCommand } from './services/CommandDispatcher';
import { AIProvider } from './types/ai-provider';
import { Typewriter } from './utils/typewriter';
import { configureLogger, logger } from './utils/logger';
import { ConfigurationError, toErrorMessage } from './utils/errors';

export const WELCOME_BANNER = [
  'Welcome to EduGuide Chatbot',
  'Ask me about study abroad, scholarships, courses, etc.',
  "Type 'exit' to quit, 'reset' to clear memory, 'summary' to see session summary.",
  '',
].join('\n');

export interface ChatOptions {
  provider: AIProvider;
  memoryStore: MemoryStore;
  input: Readable;
  output: Writable;
  terminal?: boolean;
  historyWindow?: number;
  typingDelayMs?: number;
}

export async function runChat(options: ChatOptions): Promise<void> {
  const { provider, memoryStore, input, output } = options;
  const conversationManager = new ConversationManager(provider, memoryStore, {
    historyWindow: options.historyWindow,
  });
  const dispatcher = new CommandDispatcher(memoryStore);
  const typewriter = new Typewriter(output, options.typingDelayMs ?? 10);

  let session = await memoryStore.load();
  output.write(`${WELCOME_BANNER}\n`);

  const rl = readline.createInterface({
    input,
    output,
    terminal: options.terminal ?? false,
  });
  rl.setPrompt('You: ');
  const onInterrupt = (): void => rl.close();
  // raw-mode terminals report Ctrl-C to readline, piped input gets the signal
  rl.on('SIGINT', onInterrupt);
  process.once('SIGINT', onInterrupt);

  let exited = false;
  try {
    rl.prompt();
    for await (const line of rl) {
      const userText = line.trim();
      if (!userText) {
        rl.prompt();
        continue;
      }

      const command = parseCommand(userText);
      if (command) {
        const result = await dispatcher.dispatch(command, session);
        session = result.session;
        output.write(`${result.output}\n`);
        if (result.shouldExit) {
          exited = true;
          break;
        }
        output.write('\n');
        rl.prompt();
        continue;
      }

      output.write('AI: ');
      let streamed = false;
      const { reply, updatedSession, failed } =
        await conversationManager.handleTurn(session, userText, async (token) => {
          streamed = true;
          await typewriter.write(token);
        });
      session = updatedSession;
      if (failed) {
        if (streamed) {
          output.write('\n');
        }
        await typewriter.type(reply);
      }
      output.write('\n\n');
      rl.prompt();
    }
  } finally {
    process.off('SIGINT', onInterrupt);
    rl.close();
  }

  if (!exited) {
    await memoryStore.save(session);
    output.write('\nGoodbye!\n');
  }
  logger.info('Chat session ended', { sessionId: session.sessionId });
}

function loadConfigOrReport(): AppConfig | undefined {
  try {
    return loadConfigFromEnvironment();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
      console.error(
        'Set TOGETHER_API_KEY (and optionally TOGETHER_BASE_URL, MODEL_NAME) in the environment or a .env file.'
      );
      return undefined;
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const config = loadConfigOrReport();
  if (!config) {
    process.exitCode = 1;
    return;
  }
  configureLogger(config.log.level, config.log.file);

  await runChat({
    provider: new TogetherAIProvider(config.together),
    memoryStore: new MemoryStore(config.memory.filePath),
    input: process.stdin,
    output: process.stdout,
    terminal: process.stdin.isTTY === true,
    historyWindow: config.memory.historyWindow,
    typingDelayMs: config.typingDelayMs,
  });
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Fatal error', { error: toErrorMessage(error) });
    console.error(toErrorMessage(error));
    process.exitCode = 1;
  });
}
