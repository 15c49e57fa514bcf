/**
 * 上传流程：收集配置 → 连接 → 认证 → 传输
 */

import { Authenticator } from './authenticator.js';
import { collectTransferConfig } from './config.js';
import { AuthFailureError } from './errors.js';
import { transferFile } from './transfer.js';
import {
  AuthResult,
  ConfigPresets,
  Logger,
  ProgressObserver,
  Prompter,
  SecureSession,
  TransferConfig,
  TransferResult,
} from './types.js';

export interface UploadDependencies {
  prompter: Prompter;
  logger: Logger;
  openSession(target: { host: string; port: number }): Promise<SecureSession>;
  createProgress?: (config: TransferConfig) => ProgressObserver;
  homeDir?: string;
  fileExists?: (filePath: string) => boolean;
}

export interface UploadSummary {
  config: TransferConfig;
  auth: AuthResult;
  result: TransferResult;
}

export async function runUpload(
  presets: ConfigPresets,
  deps: UploadDependencies
): Promise<UploadSummary> {
  const { prompter, logger } = deps;
  const config = await collectTransferConfig(prompter, presets, logger);
  logger.debug(
    `Target ${config.username}@${config.remoteHost}:${config.port} -> ${config.remotePath}`
  );

  logger.info('🔗 Connecting to remote host...');
  const session = await deps.openSession({ host: config.remoteHost, port: config.port });

  try {
    const authenticator = new Authenticator(prompter, {
      homeDir: deps.homeDir,
      logger,
      fileExists: deps.fileExists,
    });
    const auth = await authenticator.authenticate(session, config.username);
    if (!auth.authenticated) {
      throw new AuthFailureError();
    }

    logger.success('Connected and authenticated successfully!');
    logger.info('📤 Starting file transfer...');

    const result = await transferFile(session, config, deps.createProgress?.(config));
    return { config, auth, result };
  } finally {
    session.end();
  }
}
