import { log } from './logger';

// 自定义错误类
export class AppError extends Error {
  public readonly isOperational: boolean;

  constructor(message: string, options: { cause?: unknown; isOperational?: boolean } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AppError';
    this.isOperational = options.isOperational ?? true;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * 环境变量无法转换为目标类型 (整数/布尔/时长格式错误, 必填项缺失)
 */
export class ConfigParseError extends AppError {
  constructor(
    public readonly key: string,
    public readonly fieldPath: string,
    public readonly typeName: string,
    public readonly value: string | undefined,
    cause: unknown
  ) {
    super(
      value === undefined
        ? `required key ${key} missing value`
        : `assigning ${key} to ${fieldPath}: converting '${value}' to type ${typeName}: ${describeError(cause)}`,
      { cause }
    );
    this.name = 'ConfigParseError';
  }
}

/**
 * 配置语义错误 - 由构建应用的 provider 在校验字段值时抛出, 会触发回滚
 */
export class BadConfigError extends AppError {
  constructor(reason: string, options: { cause?: unknown } = {}) {
    super(`bad config: ${reason}`, options);
    this.name = 'BadConfigError';
  }
}

// 配置文件读写错误
export class ConfigStoreError extends AppError {
  constructor(message: string, public readonly path: string, cause?: unknown) {
    super(`${message}: ${path}`, { cause });
    this.name = 'ConfigStoreError';
  }
}

export type StoreUnavailableReason = 'not_found' | 'io';

// 回滚时拿不到可用的备用配置
export class StoreUnavailableError extends AppError {
  constructor(message: string, public readonly reason: StoreUnavailableReason, cause?: unknown) {
    super(message, { cause });
    this.name = 'StoreUnavailableError';
  }
}

// 应用构建成功但无法保存当前配置
export class PersistError extends AppError {
  constructor(cause: unknown) {
    super(`failed to persist last known good config: ${describeError(cause)}`, { cause });
    this.name = 'PersistError';
  }
}

export class LifecycleTimeoutError extends AppError {
  constructor(public readonly operation: 'start' | 'stop', public readonly timeoutMs: number) {
    super(`application ${operation} timed out after ${timeoutMs}ms`);
    this.name = 'LifecycleTimeoutError';
  }
}

export type BootstrapPhase =
  | 'loader_init'
  | 'current_config_load'
  | 'fallback_load'
  | 'app_construction'
  | 'fallback_app_construction'
  | 'config_persist';

const PHASE_MESSAGES: Record<BootstrapPhase, string> = {
  loader_init: 'failed to init loader config',
  current_config_load: 'failed to load current config from env',
  fallback_load: 'failed to load fallback config',
  app_construction: 'failed to create app with current config',
  fallback_app_construction: 'failed to create app with last known good config',
  config_persist: 'failed to save current config'
};

/**
 * 启动失败, phase 标明失败发生在哪一步.
 * rejection 保存触发回滚的原始配置错误 (如果有).
 */
export class BootstrapError extends AppError {
  constructor(
    public readonly phase: BootstrapPhase,
    cause: unknown,
    public readonly rejection?: Error
  ) {
    super(`${PHASE_MESSAGES[phase]}: ${describeError(cause)}`, { cause, isOperational: false });
    this.name = 'BootstrapError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * 沿 cause 链查找指定类型的错误, 不限层数
 */
export function findCause<T extends Error>(
  error: unknown,
  type: abstract new (...args: never[]) => T
): T | undefined {
  const seen = new Set<unknown>();
  let current = error;

  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof type) {
      return current;
    }
    seen.add(current);
    current = current.cause;
  }

  return undefined;
}

// 错误处理
export function handleError(error: Error, context?: string): void {
  const errorContext = context ? `[${context}] ` : '';

  if (error instanceof AppError && error.isOperational) {
    log.warn(`${errorContext}${error.message}`, {
      name: error.name,
      stack: error.stack
    });
  } else {
    log.error(`${errorContext}${error.message}`, {
      stack: error.stack,
      name: error.name
    });
  }
}

// 全局未捕获异常处理
export function setupGlobalErrorHandling(): void {
  process.on('uncaughtException', (error: Error) => {
    log.error('💥 Uncaught exception', { error: error.message, stack: error.stack });
    process.exit(1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    log.error('💥 Unhandled rejection', { reason: describeError(reason) });
    process.exit(1);
  });
}
