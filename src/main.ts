import 'dotenv/config';
import { ApplicationBootstrap, FileConfigStore, createV8Codec } from './core';
import {
  ECHO_APP_CONFIG_PREFIX,
  EchoAppConfig,
  createEchoAppBuilder,
  isEchoAppConfig,
  readEchoAppConfig
} from './services/echo';
import { handleError, setupGlobalErrorHandling } from './utils/errors';
import { log } from './utils/logger';

/**
 * 应用主入口点
 * 加载配置 (失败时回滚到最后一次可用配置), 启动 echo 服务, 收到信号后退出
 */
async function main(): Promise<void> {
  setupGlobalErrorHandling();

  log.info('🚀 Starting echo application', {
    environment: process.env.NODE_ENV || 'development',
    nodeVersion: process.version,
    pid: process.pid
  });

  const loader = await ApplicationBootstrap.load<EchoAppConfig>({
    prefix: ECHO_APP_CONFIG_PREFIX,
    readConfig: readEchoAppConfig,
    builder: createEchoAppBuilder(),
    createStore: loaderConfig => new FileConfigStore(createV8Codec(isEchoAppConfig), loaderConfig.fallbackConfigPath)
  });

  const { usesFallbackConfig, configError } = loader.config();
  if (usesFallbackConfig) {
    log.warn('⚠️ Running on last known good config', { configError });
  }

  loader.listenForSignals();
  await loader.run();
}

// 启动应用
if (require.main === module) {
  main().then(
    () => process.exit(0),
    (error: unknown) => {
      handleError(error instanceof Error ? error : new Error(String(error)), 'main');
      process.exit(1);
    }
  );
}
