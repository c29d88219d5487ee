import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { AIProvider, ChatMessage, TokenHandler } from "../src/types/ai-provider";

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "eduguide-"));
}

export function cleanup(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function readJson(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(filePath, "utf8"));
}

/** Streams a fixed list of tokens, or fails when `error` is set. */
export class FakeProvider implements AIProvider {
  readonly model = "fake-model";
  readonly calls: ChatMessage[][] = [];

  constructor(
    private readonly tokens: string[],
    private readonly error?: Error
  ) {}

  async streamChat(messages: ChatMessage[], onToken?: TokenHandler): Promise<string> {
    this.calls.push(messages);
    if (this.error) {
      throw this.error;
    }
    for (const token of this.tokens) {
      if (onToken) {
        await onToken(token);
      }
    }
    return this.tokens.join("").trim();
  }
}
