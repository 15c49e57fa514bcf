/**
 * scp-prompt - 类型定义
 */

export interface SSHConnectionConfig {
  host: string;
  port: number;
  // 高级配置
  keepaliveInterval?: number;  // 心跳间隔（毫秒）
  keepaliveCountMax?: number;  // 最大心跳失败次数
  readyTimeout?: number;       // 握手到认证完成的超时（毫秒）
}

export interface TransferConfig {
  readonly localFilePath: string;
  readonly remoteHost: string;
  readonly port: number;
  readonly remotePath: string;
  readonly username: string;
}

// 命令行预设值，存在时跳过对应的提示
export interface ConfigPresets {
  localFile?: string;
  host?: string;
  port?: string;
  username?: string;
  remotePath?: string;
}

/**
 * 单次认证尝试的结果
 */
export type AuthOutcome =
  | { kind: 'succeeded' }
  | { kind: 'rejected'; reason?: string }
  | { kind: 'transport-error'; error: Error };

export type AuthMethod = 'publickey' | 'publickey-passphrase' | 'password';

export type AuthResult =
  | { authenticated: true; method: AuthMethod; keyPath?: string }
  | { authenticated: false };

export interface AuthCapableSession {
  authPublicKey(username: string, keyPath: string, passphrase?: string): Promise<AuthOutcome>;
  authPassword(username: string, password: string): Promise<AuthOutcome>;
}

/**
 * 远程拷贝通道（scp sink）
 */
export interface ScpWriteChannel {
  write(chunk: Buffer): Promise<void>;
  sendEof(): Promise<void>;
  waitEof(): Promise<void>;
  close(): Promise<void>;
  waitClose(): Promise<void>;
}

export interface SecureSession extends AuthCapableSession {
  readonly authenticated: boolean;
  openScpWrite(remotePath: string, mode: number, size: number): Promise<ScpWriteChannel>;
  end(): void;
}

export interface TransferProgress {
  transferred: number;
  total: number;
  percent: number;
}

export interface ProgressObserver {
  start(total: number): void;
  update(progress: TransferProgress): void;
  complete(progress: TransferProgress): void;
  fail(error: Error): void;
}

export interface TransferResult {
  remotePath: string;
  size: number;
  chunks: number;
}

export interface InputOptions {
  allowEmpty?: boolean;
}

export interface Prompter {
  input(message: string, options?: InputOptions): Promise<string>;
  secret(message: string): Promise<string>;
}

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  success(message: string): void;
  debug(message: string): void;
}
