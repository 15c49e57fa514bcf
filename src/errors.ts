/**
 * 错误类型
 *
 * 所有错误对本次运行都是终止性的，区分类型只为报告清晰。
 */

export type ScpErrorCode =
  | 'CONFIGURATION'
  | 'AUTH_FAILURE'
  | 'TRANSPORT'
  | 'LOCAL_FILE'
  | 'TRANSFER';

export class ScpError extends Error {
  readonly code: ScpErrorCode;

  constructor(code: ScpErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigurationError extends ScpError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION', message, options);
  }
}

export class AuthFailureError extends ScpError {
  constructor(message = 'Authentication failed') {
    super('AUTH_FAILURE', message);
  }
}

export class TransportError extends ScpError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSPORT', message, options);
  }
}

export class LocalFileError extends ScpError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('LOCAL_FILE', message, options);
  }
}

export class TransferError extends ScpError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSFER', message, options);
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * 展开 cause 链，生成面向用户的错误描述
 */
export function describeError(err: unknown): string {
  const parts: string[] = [];
  let current: unknown = err;
  while (current !== undefined && parts.length < 5) {
    const error = toError(current);
    if (!parts.includes(error.message)) {
      parts.push(error.message);
    }
    current = error.cause;
  }
  return parts.join(': ');
}
