/**
 * SSH Session Manager - 连接与认证
 *
 * 功能：
 * - 建立 TCP 连接并完成 SSH 握手
 * - 逐个提交认证方法（公钥、带口令公钥、密码），返回每次尝试的结果
 * - 认证后通过 exec 通道打开 scp 拷贝通道
 */

import ssh2 from 'ssh2';
import type { Client as SshClient, ClientChannel, NextAuthHandler } from 'ssh2';
import * as fs from 'fs';
import { ScpChannel } from './scp-channel.js';
import { TransportError, toError } from './errors.js';
import {
  AuthOutcome,
  SSHConnectionConfig,
  ScpWriteChannel,
  SecureSession,
} from './types.js';

// ssh2 是 CommonJS 模块，命名导出需从默认导出解构
const { Client, utils } = ssh2;

type AuthRequest = Parameters<NextAuthHandler>[0];

const DEFAULT_KEEPALIVE_INTERVAL = 30000;  // 30秒
const DEFAULT_KEEPALIVE_COUNT_MAX = 3;
// ready 计时覆盖认证期间的交互输入
const DEFAULT_READY_TIMEOUT = 5 * 60 * 1000;

/**
 * 转义远程路径中的单引号
 */
export function quoteRemotePath(remotePath: string): string {
  return `'${remotePath.replace(/'/g, "'\\''")}'`;
}

export class SshSession implements SecureSession {
  private client: SshClient;
  private nextAuth: NextAuthHandler | null = null;
  private pendingHandshake: { resolve: () => void; reject: (err: Error) => void } | null = null;
  private pendingAttempt: ((outcome: AuthOutcome) => void) | null = null;
  private connectionError: Error | null = null;
  private isAuthenticated = false;

  private constructor(private config: SSHConnectionConfig) {
    this.client = new Client();
  }

  /**
   * 建立 SSH 连接，握手完成、服务端要求认证时返回
   */
  static async connect(config: SSHConnectionConfig): Promise<SshSession> {
    const session = new SshSession(config);
    await session.handshake();
    return session;
  }

  get authenticated(): boolean {
    return this.isAuthenticated;
  }

  async authPublicKey(username: string, keyPath: string, passphrase?: string): Promise<AuthOutcome> {
    let key: Buffer;
    try {
      key = await fs.promises.readFile(keyPath);
    } catch (err) {
      return { kind: 'rejected', reason: `Cannot read key ${keyPath}: ${toError(err).message}` };
    }

    // 本地先解析，加密私钥缺少口令时不必打扰服务端
    const parsed = utils.parseKey(key, passphrase);
    if (parsed instanceof Error) {
      return { kind: 'rejected', reason: parsed.message };
    }

    return this.attempt({ type: 'publickey', username, key, passphrase });
  }

  authPassword(username: string, password: string): Promise<AuthOutcome> {
    return this.attempt({ type: 'password', username, password });
  }

  /**
   * 打开 scp 拷贝通道（仅在认证成功后）
   */
  async openScpWrite(remotePath: string, mode: number, size: number): Promise<ScpWriteChannel> {
    if (!this.isAuthenticated) {
      throw new TransportError('Cannot open SCP channel before authentication');
    }

    const stream = await new Promise<ClientChannel>((resolve, reject) => {
      this.client.exec(`scp -t ${quoteRemotePath(remotePath)}`, (err, channel) => {
        if (err) reject(new TransportError(`Failed to open SCP channel: ${err.message}`, { cause: err }));
        else resolve(channel);
      });
    });

    return ScpChannel.open(stream, { remotePath, mode, size });
  }

  end(): void {
    this.client.end();
  }

  private handshake(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.pendingHandshake = { resolve, reject };

      this.client.on('ready', () => this.onReady());

      this.client.on('error', (err) => {
        this.onFailure(new TransportError(`SSH connection failed: ${err.message}`, { cause: err }));
      });

      this.client.on('close', () => {
        this.onFailure(new TransportError('SSH connection closed'));
      });

      this.client.connect({
        host: this.config.host,
        port: this.config.port || 22,
        readyTimeout: this.config.readyTimeout || DEFAULT_READY_TIMEOUT,
        keepaliveInterval: this.config.keepaliveInterval || DEFAULT_KEEPALIVE_INTERVAL,
        keepaliveCountMax: this.config.keepaliveCountMax || DEFAULT_KEEPALIVE_COUNT_MAX,
        authHandler: (_methodsLeft, _partialSuccess, next) => this.onAuthRequest(next),
      });
    });
  }

  /**
   * 提交一个认证方法：ready 为成功，再次被要求认证为拒绝
   */
  private attempt(request: AuthRequest): Promise<AuthOutcome> {
    if (this.connectionError) {
      return Promise.resolve({ kind: 'transport-error', error: this.connectionError });
    }
    if (this.isAuthenticated) {
      return Promise.resolve({ kind: 'succeeded' });
    }

    const next = this.nextAuth;
    if (!next) {
      return Promise.resolve({
        kind: 'transport-error',
        error: new TransportError('Server is not awaiting authentication'),
      });
    }
    this.nextAuth = null;

    return new Promise((resolve) => {
      this.pendingAttempt = resolve;
      next(request);
    });
  }

  private onAuthRequest(next: NextAuthHandler): void {
    this.nextAuth = next;

    if (this.pendingHandshake) {
      const { resolve } = this.pendingHandshake;
      this.pendingHandshake = null;
      resolve();
      return;
    }
    this.settleAttempt({ kind: 'rejected' });
  }

  private onReady(): void {
    this.isAuthenticated = true;

    if (this.pendingHandshake) {
      const { resolve } = this.pendingHandshake;
      this.pendingHandshake = null;
      resolve();
    }
    this.settleAttempt({ kind: 'succeeded' });
  }

  private onFailure(error: Error): void {
    if (!this.connectionError) {
      this.connectionError = error;
    }

    if (this.pendingHandshake) {
      const { reject } = this.pendingHandshake;
      this.pendingHandshake = null;
      reject(this.connectionError);
    }
    this.settleAttempt({ kind: 'transport-error', error: this.connectionError });
  }

  private settleAttempt(outcome: AuthOutcome): void {
    const settle = this.pendingAttempt;
    this.pendingAttempt = null;
    settle?.(outcome);
  }
}

export function openSshSession(target: { host: string; port: number }): Promise<SecureSession> {
  return SshSession.connect({ host: target.host, port: target.port });
}
