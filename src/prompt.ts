/**
 * 终端交互输入
 */

import * as readline from 'readline';
import { InputOptions, Prompter } from './types.js';

export interface PrompterStreams {
  input: NodeJS.ReadableStream & { isTTY?: boolean; setRawMode?: (mode: boolean) => unknown };
  output: NodeJS.WritableStream;
}

const INPUT_CLOSED = 'Input closed before an answer was given';

export class TerminalPrompter implements Prompter {
  private streams: PrompterStreams;
  // 整个生命周期共用一个 readline，一次到达的多行按顺序排队
  private reader: readline.Interface | null = null;
  private queuedLines: string[] = [];
  private lineWaiter: { resolve: (line: string) => void; reject: (err: Error) => void } | null = null;
  private inputClosed = false;

  constructor(streams?: PrompterStreams) {
    this.streams = streams ?? { input: process.stdin, output: process.stdout };
  }

  /**
   * 读取一行输入，必填项为空时重新提问
   */
  async input(message: string, options: InputOptions = {}): Promise<string> {
    const prompt = `${message}: `;

    for (;;) {
      const answer = (await this.nextLine(prompt)).trim();
      if (answer || options.allowEmpty) {
        return answer;
      }
    }
  }

  /**
   * 读取敏感输入（密码、私钥口令），TTY 下以 * 回显
   */
  secret(message: string): Promise<string> {
    const prompt = `${message}: `;
    const { input, output } = this.streams;

    if (!input.isTTY || !input.setRawMode) {
      return this.nextLine(prompt);
    }
    const setRawMode = input.setRawMode.bind(input);

    // 原始模式下按键不能再被 readline 当作行读走
    this.releaseReader();

    return new Promise((resolve) => {
      output.write(prompt);
      let secret = '';

      setRawMode(true);
      input.resume();
      input.setEncoding('utf8');

      const finish = () => {
        setRawMode(false);
        input.removeListener('data', onData);
        input.pause();
        output.write('\n');
        resolve(secret);
      };

      const onData = (data: string | Buffer) => {
        for (const char of data.toString()) {
          switch (char) {
            case '\n':
            case '\r':
            case '\u0004': // Ctrl+D
              finish();
              return;
            case '\u0003': // Ctrl+C
              setRawMode(false);
              output.write('\n');
              process.exit(1);
              break;
            case '\u007F': // Backspace
            case '\b':
              if (secret.length > 0) {
                secret = secret.slice(0, -1);
                output.write('\b \b');
              }
              break;
            default:
              secret += char;
              output.write('*');
              break;
          }
        }
      };

      input.on('data', onData);
    });
  }

  /**
   * 释放输入流，之后的提问直接失败
   */
  close(): void {
    this.inputClosed = true;
    this.releaseReader();
    this.failWaiter();
  }

  private nextLine(prompt: string): Promise<string> {
    this.streams.output.write(prompt);

    const queued = this.queuedLines.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.inputClosed) {
      return Promise.reject(new Error(INPUT_CLOSED));
    }

    this.ensureReader();
    return new Promise((resolve, reject) => {
      this.lineWaiter = { resolve, reject };
    });
  }

  private ensureReader(): void {
    if (this.reader) {
      return;
    }

    const rl = readline.createInterface({ input: this.streams.input, terminal: false });
    rl.on('line', (line) => {
      const waiter = this.lineWaiter;
      this.lineWaiter = null;
      if (waiter) waiter.resolve(line);
      else this.queuedLines.push(line);
    });
    rl.on('close', () => {
      this.inputClosed = true;
      this.reader = null;
      this.failWaiter();
    });
    this.reader = rl;
  }

  private releaseReader(): void {
    const rl = this.reader;
    if (!rl) {
      return;
    }
    this.reader = null;
    rl.removeAllListeners('close');
    rl.close();
  }

  private failWaiter(): void {
    const waiter = this.lineWaiter;
    this.lineWaiter = null;
    waiter?.reject(new Error(INPUT_CLOSED));
  }
}
