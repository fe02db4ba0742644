import { ConfigParseError } from '../../utils/errors';
import { TimeParser } from '../../utils/timeParser';

export interface FieldOptions<T> {
  default?: T;
  required?: boolean;
}

export type ConfigReader<T> = (env: EnvReader) => T;

export type ResolveResult<T> =
  | { ok: true; config: T }
  | { ok: false; error: ConfigParseError };

const TRUE_VALUES = new Set(['1', 't', 'T', 'TRUE', 'true', 'True']);
const FALSE_VALUES = new Set(['0', 'f', 'F', 'FALSE', 'false', 'False']);
const INTEGER_PATTERN = /^([+-])?(0[xX][0-9a-fA-F]+|0[oO][0-7]+|0[bB][01]+|\d+)$/;

/**
 * 字段路径转环境变量名
 * envKey('APP', 'echoHandler.responseTimeout') === 'APP_ECHO_HANDLER_RESPONSE_TIMEOUT'
 */
export function envKey(prefix: string, fieldPath: string): string {
  const segments = fieldPath
    .split('.')
    .filter(segment => segment.length > 0)
    .map(segment => segment.replace(/([a-z0-9])([A-Z])/g, '$1_$2').toUpperCase());

  return prefix ? [prefix.toUpperCase(), ...segments].join('_') : segments.join('_');
}

function parseInteger(raw: string): number {
  const match = INTEGER_PATTERN.exec(raw.trim());
  if (!match) {
    throw new Error(`invalid integer syntax "${raw}"`);
  }

  const magnitude = Number(match[2]);
  const value = match[1] === '-' ? -magnitude : magnitude;
  if (!Number.isSafeInteger(value)) {
    throw new Error(`value out of range "${raw}"`);
  }
  return value;
}

function parseFloatValue(raw: string): number {
  const value = Number(raw.trim());
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new Error(`invalid number syntax "${raw}"`);
  }
  return value;
}

function parseBoolean(raw: string): boolean {
  const trimmed = raw.trim();
  if (TRUE_VALUES.has(trimmed)) {
    return true;
  }
  if (FALSE_VALUES.has(trimmed)) {
    return false;
  }
  throw new Error(`invalid boolean syntax "${raw}"`);
}

/**
 * 按前缀读取环境变量并做类型转换.
 * 未设置 (或为空字符串) 时返回默认值, 没有默认值则返回该类型的零值.
 * 转换失败抛出 ConfigParseError.
 */
export class EnvReader {
  constructor(
    private readonly prefix: string,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  keyFor(fieldPath: string): string {
    return envKey(this.prefix, fieldPath);
  }

  string(fieldPath: string, options: FieldOptions<string> = {}): string {
    return this.read(fieldPath, 'string', options, raw => raw, '');
  }

  int(fieldPath: string, options: FieldOptions<number> = {}): number {
    return this.read(fieldPath, 'int', options, parseInteger, 0);
  }

  float(fieldPath: string, options: FieldOptions<number> = {}): number {
    return this.read(fieldPath, 'float', options, parseFloatValue, 0);
  }

  bool(fieldPath: string, options: FieldOptions<boolean> = {}): boolean {
    return this.read(fieldPath, 'bool', options, parseBoolean, false);
  }

  /**
   * 返回毫秒
   */
  duration(fieldPath: string, options: FieldOptions<number> = {}): number {
    return this.read(fieldPath, 'duration', options, raw => TimeParser.parseDuration(raw), 0);
  }

  // 逗号分隔
  list(fieldPath: string, options: FieldOptions<string[]> = {}): string[] {
    return this.read(
      fieldPath,
      'list',
      options,
      raw => raw.split(',').map(item => item.trim()).filter(item => item.length > 0),
      []
    );
  }

  private read<T>(
    fieldPath: string,
    typeName: string,
    options: FieldOptions<T>,
    convert: (raw: string) => T,
    zero: T
  ): T {
    const key = this.keyFor(fieldPath);
    const raw = this.env[key];

    if (raw === undefined || raw === '') {
      if (options.default !== undefined) {
        return options.default;
      }
      if (options.required) {
        throw new ConfigParseError(key, fieldPath, typeName, undefined, new Error(`${key} is not set`));
      }
      return zero;
    }

    try {
      return convert(raw);
    } catch (error) {
      throw new ConfigParseError(key, fieldPath, typeName, raw, error);
    }
  }
}

/**
 * 从环境变量解析应用配置. 只捕获类型转换错误, 语义校验留给构建阶段.
 */
export function resolveConfig<T>(
  prefix: string,
  read: ConfigReader<T>,
  env: NodeJS.ProcessEnv = process.env
): ResolveResult<T> {
  try {
    return { ok: true, config: read(new EnvReader(prefix, env)) };
  } catch (error) {
    if (error instanceof ConfigParseError) {
      return { ok: false, error };
    }
    throw error;
  }
}
