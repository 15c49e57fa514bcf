/**
 * SCP Channel - scp sink 协议
 *
 * 在 exec 通道（`scp -t <path>`）上推送单个文件：
 *   远端就绪 \0 → C<mode> <size> <name>\n → \0 → 数据 → \0 → \0
 */

import * as path from 'path';
import { Duplex } from 'stream';
import { TransferError, toError } from './errors.js';
import { ScpWriteChannel } from './types.js';

const SCP_OK = 0;
const SCP_WARNING = 1;
const SCP_ERROR = 2;

export interface ScpFileHeader {
  remotePath: string;
  mode: number;
  size: number;
}

export function formatScpHeader(header: ScpFileHeader): string {
  const mode = (header.mode & 0o7777).toString(8).padStart(4, '0');
  const name = path.posix.basename(header.remotePath) || 'file';
  return `C${mode} ${header.size} ${name}\n`;
}

/**
 * 从通道读取远端应答
 */
class ScpReplyReader {
  private buffer: Buffer = Buffer.alloc(0);
  private waiter: (() => void) | null = null;
  private ended = false;
  private failure: Error | null = null;

  constructor(stream: Duplex) {
    stream.on('data', (data: Buffer | string) => {
      const chunk = typeof data === 'string' ? Buffer.from(data, 'utf-8') : data;
      this.buffer = Buffer.concat([this.buffer, chunk]);
      this.notify();
    });
    stream.on('end', () => {
      this.ended = true;
      this.notify();
    });
    stream.on('error', (err: Error) => {
      this.failure = err;
      this.notify();
    });
    stream.on('close', () => {
      this.ended = true;
      this.notify();
    });
  }

  async readByte(): Promise<number> {
    await this.waitFor(() => this.buffer.length >= 1);
    const byte = this.buffer[0];
    this.buffer = this.buffer.subarray(1);
    return byte;
  }

  async readLine(): Promise<string> {
    await this.waitFor(() => this.buffer.includes(0x0a));
    const newline = this.buffer.indexOf(0x0a);
    const line = this.buffer.subarray(0, newline).toString('utf-8');
    this.buffer = this.buffer.subarray(newline + 1);
    return line;
  }

  private async waitFor(ready: () => boolean): Promise<void> {
    while (!ready()) {
      if (this.failure) {
        throw this.failure;
      }
      if (this.ended) {
        throw new Error('SCP channel closed unexpectedly');
      }
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }

  private notify(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}

export class ScpChannel implements ScpWriteChannel {
  private reader: ScpReplyReader;
  private eofReceived = false;
  private closed = false;
  private exitCode: number | null = null;
  private streamError: Error | null = null;
  private eofWaiters: Array<(err?: Error) => void> = [];
  private closeWaiters: Array<() => void> = [];

  private constructor(private stream: Duplex) {
    this.reader = new ScpReplyReader(stream);

    stream.on('end', () => {
      this.eofReceived = true;
      this.flushEofWaiters();
    });
    stream.on('error', (err: Error) => {
      this.streamError = err;
      this.flushEofWaiters();
    });
    stream.on('exit', (code: unknown) => {
      if (typeof code === 'number') {
        this.exitCode = code;
      }
    });
    stream.on('close', () => {
      this.closed = true;
      this.flushEofWaiters();
      const waiters = this.closeWaiters;
      this.closeWaiters = [];
      waiters.forEach((resolve) => resolve());
    });
  }

  /**
   * 完成 scp 握手并声明文件头，返回可写通道
   */
  static async open(stream: Duplex, header: ScpFileHeader): Promise<ScpChannel> {
    const channel = new ScpChannel(stream);
    await channel.expectAck('SCP not ready');
    await channel.send(Buffer.from(formatScpHeader(header), 'utf-8'));
    await channel.expectAck('SCP header rejected');
    return channel;
  }

  write(chunk: Buffer): Promise<void> {
    return this.send(chunk);
  }

  /**
   * 发送文件结束标记 \0，等待远端确认后关闭写端
   */
  async sendEof(): Promise<void> {
    await this.send(Buffer.from([SCP_OK]));
    await this.expectAck('SCP transfer failed');
    await new Promise<void>((resolve) => {
      this.stream.end(() => resolve());
    });
  }

  waitEof(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.eofWaiters.push((err) => (err ? reject(err) : resolve()));
      this.flushEofWaiters();
    });
  }

  async close(): Promise<void> {
    this.stream.destroy();
  }

  async waitClose(): Promise<void> {
    if (!this.closed) {
      await new Promise<void>((resolve) => this.closeWaiters.push(resolve));
    }
    if (this.exitCode !== null && this.exitCode !== 0) {
      throw new TransferError(`Remote scp exited with status ${this.exitCode}`);
    }
  }

  private send(data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stream.write(data, (err?: Error | null) => {
        if (err) reject(new TransferError('Failed to write to SCP channel', { cause: err }));
        else resolve();
      });
    });
  }

  private async expectAck(context: string): Promise<void> {
    let code: number;
    try {
      code = await this.reader.readByte();
    } catch (err) {
      throw new TransferError(context, { cause: toError(err) });
    }
    if (code === SCP_OK) {
      return;
    }

    let detail = '';
    if (code === SCP_WARNING || code === SCP_ERROR) {
      detail = await this.reader.readLine().catch((err: unknown) => toError(err).message);
    } else {
      detail = `unexpected response byte ${code}`;
    }
    throw new TransferError(`${context}: ${detail.trim()}`);
  }

  private flushEofWaiters(): void {
    let outcome: Error | undefined;
    if (this.eofReceived) {
      outcome = undefined;
    } else if (this.streamError) {
      outcome = this.streamError;
    } else if (this.closed) {
      outcome = new Error('SCP channel closed before remote EOF');
    } else {
      return;
    }
    const waiters = this.eofWaiters;
    this.eofWaiters = [];
    waiters.forEach((settle) => settle(outcome));
  }
}
