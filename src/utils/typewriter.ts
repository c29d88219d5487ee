import { setTimeout as sleep } from 'timers/promises';

export interface TextSink {
  write(chunk: string): unknown;
}

/** Simulated typing: each write is followed by a short pause. */
export class Typewriter {
  constructor(
    private readonly out: TextSink,
    private readonly delayMs: number = 10
  ) {}

  async write(chunk: string): Promise<void> {
    this.out.write(chunk);
    if (this.delayMs > 0) {
      await sleep(this.delayMs);
    }
  }

  async type(text: string): Promise<void> {
    for (const char of text) {
      await this.write(char);
    }
  }
}
