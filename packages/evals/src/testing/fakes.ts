import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { vi, type Mock } from "vitest";
import type { ChatClient, ChatTurn } from "@medeval/core";
import type { Logger } from "@medeval/shared";

export interface FakeChatClient extends ChatClient {
  calls: ChatTurn[][];
}

/**
 * Chat client whose reply is computed from the user turn. A thrown error
 * from `reply` becomes a rejected request.
 */
export function fakeChatClient(
  reply: (userContent: string, call: number) => string,
  model = "fake-model",
): FakeChatClient {
  const calls: ChatTurn[][] = [];
  return {
    model,
    calls,
    async complete(turns) {
      calls.push([...turns]);
      const user = turns.find((turn) => turn.role === "user");
      return reply(user?.content ?? "", calls.length);
    },
  };
}

export interface SpyLogger extends Logger {
  warn: Mock<Logger["warn"]>;
  error: Mock<Logger["error"]>;
}

/** Logger that prints nothing; `warn` and `error` are spies. */
export function silentLogger(): SpyLogger {
  const log: SpyLogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn<Logger["warn"]>(),
    error: vi.fn<Logger["error"]>(),
    child: () => log,
  };
  return log;
}

export function recordingSleep() {
  const delays: number[] = [];
  const sleep = async (ms: number): Promise<void> => {
    delays.push(ms);
  };
  return { sleep, delays };
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "medeval-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeJson(path: string, value: unknown): Promise<void> {
  await writeFile(path, JSON.stringify(value), "utf-8");
}

export async function readJson(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, "utf-8"));
}
