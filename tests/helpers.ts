import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  AuthOutcome,
  InputOptions,
  Logger,
  ProgressObserver,
  Prompter,
  ScpWriteChannel,
  SecureSession,
  TransferProgress,
} from '../src/types.js';

export type ShutdownStep = 'sendEof' | 'waitEof' | 'close' | 'waitClose';

export class FakeScpChannel implements ScpWriteChannel {
  readonly calls: string[] = [];
  readonly writes: Buffer[] = [];
  failAt: ShutdownStep | 'write' | null = null;

  async write(chunk: Buffer): Promise<void> {
    this.calls.push('write');
    if (this.failAt === 'write') throw new Error('channel write failed');
    this.writes.push(chunk);
  }

  sendEof(): Promise<void> {
    return this.step('sendEof');
  }

  waitEof(): Promise<void> {
    return this.step('waitEof');
  }

  close(): Promise<void> {
    return this.step('close');
  }

  waitClose(): Promise<void> {
    return this.step('waitClose');
  }

  private async step(name: ShutdownStep): Promise<void> {
    this.calls.push(name);
    if (this.failAt === name) throw new Error(`${name} failed`);
  }
}

export interface AuthCall {
  method: 'publickey' | 'password';
  username: string;
  keyPath?: string;
  passphrase?: string;
  password?: string;
}

export class FakeSession implements SecureSession {
  authenticated = false;
  ended = false;
  readonly authCalls: AuthCall[] = [];
  readonly channel = new FakeScpChannel();
  opened: { remotePath: string; mode: number; size: number } | null = null;
  // 按调用顺序返回的认证结果，用尽后一律拒绝
  outcomes: AuthOutcome[] = [];

  async authPublicKey(username: string, keyPath: string, passphrase?: string): Promise<AuthOutcome> {
    this.authCalls.push({ method: 'publickey', username, keyPath, passphrase });
    return this.nextOutcome();
  }

  async authPassword(username: string, password: string): Promise<AuthOutcome> {
    this.authCalls.push({ method: 'password', username, password });
    return this.nextOutcome();
  }

  async openScpWrite(remotePath: string, mode: number, size: number): Promise<ScpWriteChannel> {
    this.opened = { remotePath, mode, size };
    return this.channel;
  }

  end(): void {
    this.ended = true;
  }

  private nextOutcome(): AuthOutcome {
    const outcome = this.outcomes.shift() ?? { kind: 'rejected' };
    if (outcome.kind === 'succeeded') {
      this.authenticated = true;
    }
    return outcome;
  }
}

export class ScriptedPrompter implements Prompter {
  readonly asked: string[] = [];

  constructor(private answers: string[]) {}

  async input(message: string, _options?: InputOptions): Promise<string> {
    return this.answer(message);
  }

  async secret(message: string): Promise<string> {
    return this.answer(message);
  }

  private answer(message: string): string {
    this.asked.push(message);
    const next = this.answers.shift();
    if (next === undefined) {
      throw new Error(`Unexpected prompt: ${message}`);
    }
    return next;
  }
}

export class RecordingLogger implements Logger {
  readonly lines: string[] = [];

  info(message: string): void {
    this.lines.push(`info: ${message}`);
  }

  warn(message: string): void {
    this.lines.push(`warn: ${message}`);
  }

  error(message: string): void {
    this.lines.push(`error: ${message}`);
  }

  success(message: string): void {
    this.lines.push(`success: ${message}`);
  }

  debug(message: string): void {
    this.lines.push(`debug: ${message}`);
  }
}

export class RecordingProgress implements ProgressObserver {
  total: number | null = null;
  readonly updates: number[] = [];
  completed: TransferProgress | null = null;
  failed: Error | null = null;

  start(total: number): void {
    this.total = total;
  }

  update(progress: TransferProgress): void {
    this.updates.push(progress.transferred);
  }

  complete(progress: TransferProgress): void {
    this.completed = progress;
  }

  fail(error: Error): void {
    this.failed = error;
  }
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'scp-prompt-'));
}

export function writeTempFile(dir: string, name: string, size: number): string {
  const filePath = path.join(dir, name);
  const data = Buffer.alloc(size);
  for (let i = 0; i < size; i++) {
    data[i] = i % 251;
  }
  fs.writeFileSync(filePath, data);
  return filePath;
}
