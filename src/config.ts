/**
 * Transfer Config - 传输配置
 *
 * 收集并校验本次传输的参数：本地文件、远程主机、端口、用户名、远程路径
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigurationError } from './errors.js';
import { ConfigPresets, Logger, Prompter, TransferConfig } from './types.js';

export const DEFAULT_SSH_PORT = 22;

export interface PortParseResult {
  port: number;
  warning?: string;
}

export interface TransferAnswers {
  localFilePath: string;
  remoteHost: string;
  port: number;
  username: string;
  remotePath?: string;
}

/**
 * 解析端口输入，空值或非法值回退到 22
 */
export function parsePort(input: string): PortParseResult {
  const trimmed = input.trim();
  if (!trimmed) {
    return { port: DEFAULT_SSH_PORT };
  }

  if (/^\+?\d+$/.test(trimmed)) {
    const port = parseInt(trimmed, 10);
    if (port >= 1 && port <= 65535) {
      return { port };
    }
  }

  return {
    port: DEFAULT_SSH_PORT,
    warning: `Invalid port number, using default ${DEFAULT_SSH_PORT}`,
  };
}

export function defaultRemotePath(username: string, localFilePath: string): string {
  return `/home/${username}/${path.basename(localFilePath)}`;
}

export function isRegularFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

export function buildTransferConfig(answers: TransferAnswers): TransferConfig {
  const localFilePath = answers.localFilePath.trim();
  const remoteHost = answers.remoteHost.trim();
  const username = answers.username.trim();

  if (!localFilePath || !isRegularFile(localFilePath)) {
    throw new ConfigurationError(`Local file does not exist: ${localFilePath}`);
  }
  if (!remoteHost) {
    throw new ConfigurationError('Remote host is required');
  }
  if (!username) {
    throw new ConfigurationError('Username is required');
  }
  if (!Number.isInteger(answers.port) || answers.port < 1 || answers.port > 65535) {
    throw new ConfigurationError(`Invalid port: ${answers.port}`);
  }

  const remotePath = answers.remotePath?.trim() || defaultRemotePath(username, localFilePath);

  return Object.freeze({
    localFilePath,
    remoteHost,
    port: answers.port,
    remotePath,
    username,
  });
}

/**
 * 交互式收集配置，命令行预设值跳过对应提示
 */
export async function collectTransferConfig(
  prompter: Prompter,
  presets: ConfigPresets,
  logger: Logger
): Promise<TransferConfig> {
  const localFilePath = presets.localFile ?? await prompter.input('📁 Local file path');

  // 本地文件立即检查，不存在时不再继续提问
  if (!isRegularFile(localFilePath.trim())) {
    throw new ConfigurationError(`Local file does not exist: ${localFilePath}`);
  }

  const remoteHost = presets.host
    ?? await prompter.input('🌐 Remote host (e.g., example.com or 192.168.1.100)');

  const portInput = presets.port
    ?? await prompter.input('🔌 Port (optional, press Enter for default 22)', { allowEmpty: true });
  const { port, warning } = parsePort(portInput);
  if (warning) {
    logger.warn(warning);
  }

  const username = presets.username ?? await prompter.input('👤 Username');

  let remotePath = presets.remotePath;
  if (remotePath === undefined) {
    const fallback = defaultRemotePath(username.trim(), localFilePath.trim());
    remotePath = await prompter.input(
      `📂 Remote path (optional, press Enter for default: ${fallback})`,
      { allowEmpty: true }
    );
  }

  return buildTransferConfig({ localFilePath, remoteHost, port, username, remotePath });
}

/**
 * 版本号取自 package.json（src/ 与 dist/ 都位于包根目录下一层）
 */
export function readPackageVersion(packageJsonUrl: URL): string {
  const manifest: unknown = JSON.parse(fs.readFileSync(packageJsonUrl, 'utf-8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest
    && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}
