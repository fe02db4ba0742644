import { EnvReader } from '../../core/config/EnvResolver';
import { BadConfigError } from '../../utils/errors';

export const ECHO_APP_CONFIG_PREFIX = 'APP';

export const MIN_SERVER_PORT = 8000;
export const MAX_SERVER_PORT = 8999;

export interface EchoHandlerConfig {
  // 毫秒
  responseTimeout: number;
}

export interface ServerConfig {
  host: string;
  port: number;
}

export interface EchoAppConfig {
  echoHandler: EchoHandlerConfig;
  server: ServerConfig;
}

/**
 * APP_ECHO_HANDLER_RESPONSE_TIMEOUT, APP_SERVER_HOST, APP_SERVER_PORT
 */
export function readEchoAppConfig(env: EnvReader): EchoAppConfig {
  return {
    echoHandler: {
      responseTimeout: env.duration('echoHandler.responseTimeout')
    },
    server: {
      host: env.string('server.host'),
      port: env.int('server.port')
    }
  };
}

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

// 从备用配置文件解码时校验结构
export function isEchoAppConfig(value: unknown): value is EchoAppConfig {
  if (!isObject(value) || !('echoHandler' in value) || !('server' in value)) {
    return false;
  }

  const { echoHandler, server } = value;
  return (
    isObject(echoHandler) &&
    'responseTimeout' in echoHandler &&
    typeof echoHandler.responseTimeout === 'number' &&
    isObject(server) &&
    'host' in server &&
    typeof server.host === 'string' &&
    'port' in server &&
    typeof server.port === 'number'
  );
}

/**
 * 语义校验, 失败抛出 BadConfigError
 */
export function validateServerConfig(server: ServerConfig): void {
  if (server.host === '') {
    throw new BadConfigError("server host can't be empty");
  }
  if (!Number.isInteger(server.port) || server.port < MIN_SERVER_PORT || server.port > MAX_SERVER_PORT) {
    throw new BadConfigError(`server port should be between ${MIN_SERVER_PORT} and ${MAX_SERVER_PORT}`);
  }
}
