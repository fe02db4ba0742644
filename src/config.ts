import { EnvReader } from './core/config/EnvResolver';
import { DEFAULT_FALLBACK_CONFIG_PATH } from './core/config/ConfigStore';

export const LOADER_CONFIG_PREFIX = 'LOADER';

export const DEFAULT_LOADER_START_TIMEOUT = 60 * 1000;
export const DEFAULT_LOADER_STOP_TIMEOUT = 60 * 1000;

/**
 * 加载器自身的配置
 */
export interface LoaderConfig {
  // 当前运行的配置是否来自备用配置
  usesFallbackConfig: boolean;
  ignoreFallbackConfig: boolean;
  // 最近一次被拒绝的配置的错误原因
  configError?: string;
  startTimeout: number;
  stopTimeout: number;
  fallbackConfigPath: string;
}

// 从 LOADER_* 环境变量加载, 时长为 0 时使用默认值
export function loadLoaderConfig(env: NodeJS.ProcessEnv = process.env): LoaderConfig {
  const reader = new EnvReader(LOADER_CONFIG_PREFIX, env);

  const startTimeout = reader.duration('startTimeout');
  const stopTimeout = reader.duration('stopTimeout');

  return {
    usesFallbackConfig: false,
    ignoreFallbackConfig: reader.bool('ignoreFallbackConfig'),
    startTimeout: startTimeout === 0 ? DEFAULT_LOADER_START_TIMEOUT : startTimeout,
    stopTimeout: stopTimeout === 0 ? DEFAULT_LOADER_STOP_TIMEOUT : stopTimeout,
    fallbackConfigPath: reader.string('fallbackConfigPath', { default: DEFAULT_FALLBACK_CONFIG_PATH })
  };
}
