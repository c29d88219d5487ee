import test from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import path from "node:path";
import { PassThrough } from "node:stream";
import { WELCOME_BANNER, runChat } from "../src/app";
import { MemoryStore } from "../src/services/MemoryStore";
import { GENERIC_ERROR_REPLY } from "../src/services/ConversationManager";
import { FakeProvider, cleanup, makeTempDir } from "./helpers";

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function chatIo(
  lines: string,
  keepOpen = false
): { input: PassThrough; output: PassThrough; written: () => string } {
  const input = new PassThrough();
  const output = new PassThrough();
  const chunks: string[] = [];
  output.on("data", (chunk: Buffer) => chunks.push(chunk.toString("utf8")));
  if (keepOpen) {
    input.write(lines);
  } else {
    input.end(lines);
  }
  return { input, output, written: () => chunks.join("") };
}

test("chat loop answers, summarises and exits", async () => {
  const dir = makeTempDir();
  try {
    const store = new MemoryStore(path.join(dir, "memory.json"));
    const io = chatIo("my name is Ayesha\n\nsummary\nEXIT\nignored\n");

    await runChat({
      provider: new FakeProvider(["Hello ", "Ayesha!"]),
      memoryStore: store,
      input: io.input,
      output: io.output,
      typingDelayMs: 0,
    });
    await flush();

    const summary = [
      "--- Session Summary ---",
      "Name: Ayesha",
      "Destination: (not set)",
      "Course: (not set)",
      "",
      "User: my name is Ayesha",
      "Assistant: Hello Ayesha!",
      "-----------------------",
    ].join("\n");
    assert.equal(
      io.written(),
      `${WELCOME_BANNER}\nYou: AI: Hello Ayesha!\n\nYou: You: ${summary}\n\nYou: Goodbye!\n`
    );

    const restored = await new MemoryStore(store.filePath).load();
    assert.deepEqual(restored.slots, { name: "Ayesha" });
    assert.equal(restored.history.length, 2);
  } finally {
    cleanup(dir);
  }
});

test("end of input saves the session and says goodbye", async () => {
  const dir = makeTempDir();
  try {
    const store = new MemoryStore(path.join(dir, "memory.json"));
    const io = chatIo("destination: Japan\n");

    await runChat({
      provider: new FakeProvider([], new Error("network down")),
      memoryStore: store,
      input: io.input,
      output: io.output,
      typingDelayMs: 0,
    });
    await flush();

    assert.equal(
      io.written(),
      `${WELCOME_BANNER}\nYou: AI: ${GENERIC_ERROR_REPLY}\n\nYou: \nGoodbye!\n`
    );
    const restored = await new MemoryStore(store.filePath).load();
    assert.deepEqual(restored.slots, { destination: "Japan" });
    assert.deepEqual(restored.history, [{ role: "user", content: "destination: Japan" }]);
  } finally {
    cleanup(dir);
  }
});

test("terminal redraw after backspace keeps the You: prompt", async () => {
  const dir = makeTempDir();
  try {
    const store = new MemoryStore(path.join(dir, "memory.json"));
    const input = new PassThrough();
    const output = new PassThrough();
    const chunks: string[] = [];
    output.on("data", (chunk: Buffer) => chunks.push(chunk.toString("utf8")));
    input.write("exix");
    input.write("\x7f");
    input.end("t\r");

    await runChat({
      provider: new FakeProvider(["unused"]),
      memoryStore: store,
      input,
      output,
      terminal: true,
      typingDelayMs: 0,
    });
    await flush();

    const written = chunks.join("");
    assert.ok(written.includes("\u001b[1G\u001b[0JYou: exi"), written);
    assert.equal(written.includes("> "), false);
    assert.ok(written.endsWith("Goodbye!\n"));
  } finally {
    cleanup(dir);
  }
});

test("interrupt on piped input saves the session and says goodbye", async () => {
  const dir = makeTempDir();
  try {
    const store = new MemoryStore(path.join(dir, "memory.json"));
    const io = chatIo("", true);
    const before = process.listeners("SIGINT");

    const chat = runChat({
      provider: new FakeProvider(["unused"]),
      memoryStore: store,
      input: io.input,
      output: io.output,
      typingDelayMs: 0,
    });
    while (!io.written().endsWith("You: ")) {
      await flush();
    }
    const added = process.listeners("SIGINT").filter((listener) => !before.includes(listener));
    assert.equal(added.length, 1);
    // invoked directly: emitting SIGINT would also reach the test runner's handler
    for (const listener of added) {
      listener("SIGINT");
    }
    await chat;
    await flush();

    assert.equal(io.written(), `${WELCOME_BANNER}\nYou: \nGoodbye!\n`);
    assert.equal(fs.existsSync(store.filePath), true);
    assert.deepEqual(process.listeners("SIGINT"), before);
  } finally {
    cleanup(dir);
  }
});
