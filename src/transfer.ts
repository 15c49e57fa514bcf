/**
 * SSH File Transfer - 分块上传
 */

import { open, FileHandle } from 'fs/promises';
import { LocalFileError, ScpError, TransferError, toError } from './errors.js';
import {
  ProgressObserver,
  ScpWriteChannel,
  SecureSession,
  TransferConfig,
  TransferProgress,
  TransferResult,
} from './types.js';

export const CHUNK_SIZE = 8192;
export const REMOTE_FILE_MODE = 0o644;

function progressOf(transferred: number, total: number): TransferProgress {
  return {
    transferred,
    total,
    percent: total > 0 ? Math.round((transferred / total) * 100) : 100,
  };
}

/**
 * 通道关闭四步，任一步失败即整体失败
 */
async function shutdownChannel(channel: ScpWriteChannel): Promise<void> {
  const steps: Array<[string, () => Promise<void>]> = [
    ['send EOF', () => channel.sendEof()],
    ['wait for remote EOF', () => channel.waitEof()],
    ['close channel', () => channel.close()],
    ['wait for channel close', () => channel.waitClose()],
  ];

  for (const [label, step] of steps) {
    try {
      await step();
    } catch (err) {
      throw new TransferError(`Failed to ${label}`, { cause: toError(err) });
    }
  }
}

/**
 * 上传文件
 */
export async function transferFile(
  session: SecureSession,
  config: TransferConfig,
  observer?: ProgressObserver
): Promise<TransferResult> {
  if (!session.authenticated) {
    throw new TransferError('Cannot transfer before authentication succeeds');
  }

  let handle: FileHandle;
  try {
    handle = await open(config.localFilePath, 'r');
  } catch (err) {
    throw new LocalFileError(`Cannot open local file: ${config.localFilePath}`, { cause: toError(err) });
  }

  try {
    let totalSize: number;
    try {
      totalSize = (await handle.stat()).size;
    } catch (err) {
      throw new LocalFileError(`Cannot read size of local file: ${config.localFilePath}`, {
        cause: toError(err),
      });
    }

    observer?.start(totalSize);

    const channel = await session.openScpWrite(config.remotePath, REMOTE_FILE_MODE, totalSize);

    const buffer = Buffer.alloc(CHUNK_SIZE);
    let transferred = 0;
    let chunks = 0;

    for (;;) {
      let bytesRead: number;
      try {
        ({ bytesRead } = await handle.read(buffer, 0, CHUNK_SIZE, null));
      } catch (err) {
        throw new LocalFileError(`Failed to read local file: ${config.localFilePath}`, {
          cause: toError(err),
        });
      }
      if (bytesRead === 0) {
        break;
      }

      // 声明长度是权威值，远端只接收这么多字节
      if (transferred + bytesRead > totalSize) {
        throw new TransferError(
          `Local file grew during transfer (declared ${totalSize} bytes)`
        );
      }

      await channel.write(Buffer.from(buffer.subarray(0, bytesRead)));
      transferred += bytesRead;
      chunks++;
      observer?.update(progressOf(transferred, totalSize));
    }

    if (transferred !== totalSize) {
      throw new TransferError(
        `Local file shrank during transfer (sent ${transferred} of ${totalSize} bytes)`
      );
    }

    await shutdownChannel(channel);

    observer?.complete(progressOf(transferred, totalSize));
    return { remotePath: config.remotePath, size: totalSize, chunks };
  } catch (err) {
    const error = err instanceof ScpError
      ? err
      : new TransferError('Transfer failed', { cause: toError(err) });
    observer?.fail(error);
    throw error;
  } finally {
    await handle.close();
  }
}
