/**
 * Authenticator - 认证协商
 *
 * 顺序：~/.ssh/id_rsa → id_ed25519 → id_ecdsa（先无口令，再提示口令）→ 密码。
 * 首个成功即结束；服务端拒绝则继续下一项；传输错误立即中止。
 */

import * as fs from 'fs';
import * as path from 'path';
import { TransportError } from './errors.js';
import {
  AuthCapableSession,
  AuthMethod,
  AuthOutcome,
  AuthResult,
  Logger,
  Prompter,
} from './types.js';

export const DEFAULT_KEY_NAMES = ['id_rsa', 'id_ed25519', 'id_ecdsa'] as const;

export interface AuthStrategy {
  method: AuthMethod;
  keyPath?: string;
  // 返回 false 时跳过该策略（例如私钥文件不存在）
  isAvailable(): boolean;
  attempt(session: AuthCapableSession, username: string): Promise<AuthOutcome>;
}

export interface AuthenticatorOptions {
  homeDir?: string;
  logger: Logger;
  fileExists?: (filePath: string) => boolean;
}

export function candidateKeyPaths(homeDir: string | undefined): string[] {
  if (!homeDir) {
    return [];
  }
  return DEFAULT_KEY_NAMES.map((name) => path.join(homeDir, '.ssh', name));
}

export class Authenticator {
  private prompter: Pick<Prompter, 'secret'>;
  private logger: Logger;
  private homeDir?: string;
  private fileExists: (filePath: string) => boolean;

  constructor(prompter: Pick<Prompter, 'secret'>, options: AuthenticatorOptions) {
    this.prompter = prompter;
    this.logger = options.logger;
    this.homeDir = options.homeDir;
    this.fileExists = options.fileExists ?? fs.existsSync;
  }

  /**
   * 依次尝试所有认证策略
   */
  async authenticate(session: AuthCapableSession, username: string): Promise<AuthResult> {
    for (const strategy of this.buildStrategies()) {
      if (!strategy.isAvailable()) {
        continue;
      }

      const outcome = await strategy.attempt(session, username);
      switch (outcome.kind) {
        case 'succeeded':
          this.logger.success(successMessage(strategy.method));
          return strategy.keyPath
            ? { authenticated: true, method: strategy.method, keyPath: strategy.keyPath }
            : { authenticated: true, method: strategy.method };
        case 'transport-error':
          throw new TransportError(`Authentication aborted: ${outcome.error.message}`, {
            cause: outcome.error,
          });
        case 'rejected':
          if (outcome.reason) {
            this.logger.debug(`${strategy.method} rejected: ${outcome.reason}`);
          }
          if (strategy.method === 'password') {
            this.logger.error('Password authentication failed');
          }
          break;
      }
    }

    return { authenticated: false };
  }

  buildStrategies(): AuthStrategy[] {
    const strategies: AuthStrategy[] = [];

    for (const keyPath of candidateKeyPaths(this.homeDir)) {
      // 无口令尝试失败后才提示口令
      strategies.push({
        method: 'publickey',
        keyPath,
        isAvailable: () => this.fileExists(keyPath),
        attempt: (session, username) => {
          this.logger.info(`🔑 Trying SSH key: ${keyPath}`);
          return session.authPublicKey(username, keyPath);
        },
      });
      strategies.push({
        method: 'publickey-passphrase',
        keyPath,
        isAvailable: () => this.fileExists(keyPath),
        attempt: async (session, username) => {
          this.logger.warn('🔐 SSH key requires passphrase');
          const passphrase = await this.prompter.secret('🔑 SSH key passphrase');
          return session.authPublicKey(username, keyPath, passphrase);
        },
      });
    }

    strategies.push({
      method: 'password',
      isAvailable: () => true,
      attempt: async (session, username) => {
        this.logger.warn('🔐 SSH key authentication failed, trying password authentication');
        const password = await this.prompter.secret('🔑 Password');
        return session.authPassword(username, password);
      },
    });

    return strategies;
  }
}

function successMessage(method: AuthMethod): string {
  switch (method) {
    case 'publickey':
      return 'Authenticated with SSH key (no passphrase)';
    case 'publickey-passphrase':
      return 'Authenticated with SSH key (with passphrase)';
    case 'password':
      return 'Authenticated with password';
  }
}
