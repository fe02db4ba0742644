import { promises as fs } from 'fs';
import path from 'path';
import v8 from 'v8';
import { ConfigStoreError } from '../../utils/errors';
import { log } from '../../utils/logger';

export const DEFAULT_FALLBACK_CONFIG_PATH = 'last_known_good_config';

const RECORD_FORMAT = 'last-known-good-config/v1';

export interface ConfigCodec<T> {
  encode(config: T): Buffer;
  decode(data: Buffer): T;
}

export type LoadResult<T> =
  | { status: 'found'; config: T }
  | { status: 'not_found' }
  | { status: 'error'; error: ConfigStoreError };

/**
 * 最后一次可用配置的持久化存储
 */
export interface ConfigStore<T> {
  load(): Promise<LoadResult<T>>;
  save(config: T): Promise<void>;
}

/**
 * V8 结构化序列化. 记录带格式标记, 解码后用 isConfig 校验结构,
 * 损坏或不匹配的记录按读取错误处理.
 */
export function createV8Codec<T>(isConfig: (value: unknown) => value is T): ConfigCodec<T> {
  return {
    encode: (config: T): Buffer => v8.serialize({ format: RECORD_FORMAT, config }),
    decode: (data: Buffer): T => {
      const record: unknown = v8.deserialize(data);

      if (typeof record !== 'object' || record === null || !('format' in record) || !('config' in record)) {
        throw new Error('unrecognized config record');
      }
      if (record.format !== RECORD_FORMAT) {
        throw new Error(`unsupported config record format: ${String(record.format)}`);
      }
      if (!isConfig(record.config)) {
        throw new Error('config record does not match the expected shape');
      }
      return record.config;
    }
  };
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileConfigStore<T> implements ConfigStore<T> {
  constructor(
    private readonly codec: ConfigCodec<T>,
    private readonly filePath: string = DEFAULT_FALLBACK_CONFIG_PATH
  ) {}

  async load(): Promise<LoadResult<T>> {
    let data: Buffer;
    try {
      data = await fs.readFile(this.filePath);
    } catch (error) {
      if (isNotFound(error)) {
        return { status: 'not_found' };
      }
      return {
        status: 'error',
        error: new ConfigStoreError('failed to read config record', this.filePath, error)
      };
    }

    try {
      return { status: 'found', config: this.codec.decode(data) };
    } catch (error) {
      return {
        status: 'error',
        error: new ConfigStoreError('failed to decode config record', this.filePath, error)
      };
    }
  }

  /**
   * 先写临时文件再 rename, 进程中途崩溃不会留下半截的记录
   */
  async save(config: T): Promise<void> {
    let data: Buffer;
    try {
      data = this.codec.encode(config);
    } catch (error) {
      throw new ConfigStoreError('failed to encode config record', this.filePath, error);
    }

    const tempPath = `${this.filePath}.${process.pid}.tmp`;

    try {
      await fs.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
      const handle = await fs.open(tempPath, 'w');
      try {
        await handle.writeFile(data);
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        log.warn('⚠️ Failed to remove temporary config record', { path: tempPath, error: cleanupError });
      });
      throw new ConfigStoreError('failed to write config record', this.filePath, error);
    }

    log.debug('💾 Last known good config saved', { path: this.filePath, bytes: data.length });
  }
}
