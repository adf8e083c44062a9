import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { ILogger, LogLevel, LogMetadata } from '../src/domain/common/ILogger';
import { ICompletionOracle } from '../src/domain/services/ICompletionOracle';
import { INotifier } from '../src/domain/services/INotifier';
import { ChannelDeliveryError } from '../src/domain/common/Errors';
import { Config } from '../src/infrastructure/config/Config';
import { QuickReplyButton } from '../src/types';

/**
 * Test helper utilities
 */

export const PROMPTS_DIR = path.resolve(__dirname, '../prompts');

/** 2026-03-10T09:00:00.000Z */
export const T0 = Date.UTC(2026, 2, 10, 9, 0, 0);

export class TestDataDir {
  private testDir: string;

  constructor() {
    // Use a unique test directory for each test
    this.testDir = path.join(os.tmpdir(), `learning-coach-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`);
  }

  getPath(): string {
    return this.testDir;
  }

  async cleanup(): Promise<void> {
    await fs.rm(this.testDir, { recursive: true, force: true });
  }
}

/**
 * A clock the test moves by hand.
 */
export class ManualClock {
  constructor(public now: number = T0) {}

  readonly clock = (): number => this.now;

  advance(ms: number): void {
    this.now += ms;
  }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  meta?: LogMetadata;
}

/**
 * Logger that records entries instead of printing them.
 */
export class RecordingLogger implements ILogger {
  constructor(public readonly entries: LogEntry[] = [], private readonly context: LogMetadata = {}) {}

  error(message: string, error?: Error, meta?: LogMetadata): void {
    this.entries.push({ level: 'error', message, meta: { ...this.context, ...meta, error: error?.message } });
  }

  warn(message: string, meta?: LogMetadata): void {
    this.entries.push({ level: 'warn', message, meta: { ...this.context, ...meta } });
  }

  info(message: string, meta?: LogMetadata): void {
    this.entries.push({ level: 'info', message, meta: { ...this.context, ...meta } });
  }

  debug(message: string, meta?: LogMetadata): void {
    this.entries.push({ level: 'debug', message, meta: { ...this.context, ...meta } });
  }

  child(context: LogMetadata): ILogger {
    return new RecordingLogger(this.entries, { ...this.context, ...context });
  }

  setLevel(_level: LogLevel): void {
    // Everything is recorded
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter(e => e.level === level).map(e => e.message);
  }
}

type OracleReply = string | Error | ((prompt: string) => string);

/**
 * Oracle that answers from a script, in order, and records every prompt.
 */
export class ScriptedOracle implements ICompletionOracle {
  readonly prompts: string[] = [];
  private readonly replies: OracleReply[];

  constructor(...replies: OracleReply[]) {
    this.replies = replies;
  }

  enqueue(...replies: OracleReply[]): void {
    this.replies.push(...replies);
  }

  get remaining(): number {
    return this.replies.length;
  }

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error(`No scripted oracle reply for prompt #${this.prompts.length}`);
    }
    if (reply instanceof Error) throw reply;
    return typeof reply === 'function' ? reply(prompt) : reply;
  }
}

export interface SentMessage {
  userId: string;
  message: string;
  buttons: QuickReplyButton[];
}

/**
 * Notifier that records outbound messages; `failing` makes every send throw.
 */
export class RecordingNotifier implements INotifier {
  readonly sent: SentMessage[] = [];
  failing = false;

  async send(userId: string, message: string, buttons: QuickReplyButton[] = []): Promise<void> {
    if (this.failing) {
      throw new ChannelDeliveryError('Channel unavailable');
    }
    this.sent.push({ userId, message, buttons });
  }
}

/**
 * Configuration for tests: isolated data dir, real prompt templates.
 */
export function createTestConfig(dataDir: string): Config {
  return new Config(
    { NODE_ENV: 'test' },
    {
      dataDir,
      promptsDir: PROMPTS_DIR,
      log: { level: 'error', format: 'json' }
    }
  );
}

/**
 * Wait for a condition to be true
 */
export async function waitFor(
  condition: () => boolean | Promise<boolean>,
  timeout: number = 5000,
  interval: number = 20
): Promise<void> {
  const startTime = Date.now();

  while (Date.now() - startTime < timeout) {
    if (await condition()) {
      return;
    }
    await new Promise(resolve => setTimeout(resolve, interval));
  }

  throw new Error(`Timeout waiting for condition after ${timeout}ms`);
}
