import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { Session } from '../types/session';
import { deserializeSession, serializeSession } from '../models/Session';
import { logger } from '../utils/logger';
import { toErrorMessage } from '../utils/errors';

export function createEmptySession(): Session {
  return {
    sessionId: uuidv4(),
    slots: {},
    history: [],
  };
}

export class MemoryStore {
  readonly filePath: string;

  constructor(filePath: string = 'edu_memory.json') {
    this.filePath = path.resolve(filePath);
  }

  async load(): Promise<Session> {
    let serialized: string;
    try {
      serialized = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        logger.info('No stored session, starting fresh', {
          filePath: this.filePath,
        });
      } else {
        logger.warn('Could not read stored session, starting fresh', {
          filePath: this.filePath,
          error: toErrorMessage(error),
        });
      }
      return createEmptySession();
    }

    try {
      const session = deserializeSession(serialized);
      logger.info('Stored session loaded', {
        sessionId: session.sessionId,
        filePath: this.filePath,
        turns: session.history.length,
      });
      return session;
    } catch (error) {
      logger.warn('Stored session is malformed, starting fresh', {
        filePath: this.filePath,
        error: toErrorMessage(error),
      });
      return createEmptySession();
    }
  }

  /** Resolves to `false` when the write failed; the failure is logged, not thrown. */
  async save(session: Session): Promise<boolean> {
    const tmpPath = `${this.filePath}.tmp-${process.pid}`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, serializeSession(session), 'utf8');
      await fs.rename(tmpPath, this.filePath);
      logger.debug('Session saved', {
        sessionId: session.sessionId,
        filePath: this.filePath,
      });
      return true;
    } catch (error) {
      logger.error('Error saving session', {
        sessionId: session.sessionId,
        filePath: this.filePath,
        error: toErrorMessage(error),
      });
      await fs.rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
        logger.debug('Could not remove temporary session file', {
          tmpPath,
          error: toErrorMessage(cleanupError),
        });
      });
      return false;
    }
  }

  async reset(): Promise<Session> {
    const session = createEmptySession();
    await this.save(session);
    logger.info('Session reset', { sessionId: session.sessionId });
    return session;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
