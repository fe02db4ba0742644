import { Application } from './Application';
import { AppBuilder, BuildOutcome, classifyBuildError } from './AppBuilder';
import { Config, ConfigProvider, deepFreeze } from './config/ConfigProvider';
import { ConfigStore } from './config/ConfigStore';
import { ConfigReader, ResolveResult, resolveConfig } from './config/EnvResolver';
import { LoaderConfig, loadLoaderConfig } from '../config';
import {
  AppError,
  BadConfigError,
  BootstrapError,
  BootstrapPhase,
  ConfigParseError,
  PersistError,
  StoreUnavailableError,
  describeError
} from '../utils/errors';
import { log } from '../utils/logger';
import { TimeParser } from '../utils/timeParser';

export interface BootstrapOptions<T> {
  // 应用配置的环境变量前缀, 如 APP
  prefix: string;
  readConfig: ConfigReader<T>;
  builder: AppBuilder<T>;
  createStore(loaderConfig: LoaderConfig): ConfigStore<T>;
  env?: NodeJS.ProcessEnv;
}

type ConfigRejection = ConfigParseError | BadConfigError;

/**
 * 加载配置并构建应用. 当前配置不可用时回滚到上一次能正常启动的配置.
 *
 * 流程:
 * 1. 从 LOADER_* 加载自身配置
 * 2. 从环境变量解析应用配置, 解析失败直接回滚 (不进入构建)
 * 3. 用当前配置构建应用, BadConfigError 触发回滚, 其他错误直接失败
 * 4. 回滚: 读取备用配置, 用它再构建一次, 只重试一次
 * 5. 用当前配置构建成功后保存为新的备用配置 (用备用配置启动时不保存)
 */
export class ApplicationBootstrap<T> implements ConfigProvider<T> {
  private snapshot?: Config<T>;
  private application?: Application;
  private rollbackApplied = false;
  private buildAttempts = 0;
  private readonly abortController = new AbortController();

  private constructor(private readonly options: BootstrapOptions<T>) {}

  static async load<T>(options: BootstrapOptions<T>): Promise<ApplicationBootstrap<T>> {
    const loader = new ApplicationBootstrap(options);
    await loader.createApp();
    return loader;
  }

  config(): Config<T> {
    if (!this.snapshot) {
      throw new AppError('Config is not resolved yet', { isOperational: false });
    }
    return this.snapshot;
  }

  /**
   * 组件通过这个 signal 感知启动失败
   */
  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  /**
   * 并发执行应用的启动流程, 和应用的 done 信号竞争, 先到者为准.
   * 启动失败时错误原样抛出, 并 abort signal.
   * done 先到时 start() 已经返回, 之后的启动失败只记录日志, 不再 abort.
   */
  async start(): Promise<void> {
    const application = this.requireApplication();
    let settled = false;

    const started = application.start(this.abortController.signal).then(
      () => 'started' as const,
      (error: unknown) => {
        if (!settled) {
          this.abortController.abort(error);
        }
        throw error;
      }
    );
    const done = application.done().then(() => 'done' as const);

    const winner = await Promise.race([started, done]);
    settled = true;

    if (winner === 'done') {
      log.info('Application finished before start completed');
      started.catch((error: unknown) => {
        log.warn('⚠️ Start routine failed after application finished', { error: describeError(error) });
      });
    }
  }

  stop(): Promise<void> {
    return this.requireApplication().stop();
  }

  /**
   * 启动, 等待 done 信号, 然后停止
   */
  async run(): Promise<void> {
    await this.start();
    const reason = await this.requireApplication().done();
    log.info('🛑 Application finished', { reason });
    await this.stop();
  }

  shutdown(reason?: string): void {
    this.requireApplication().shutdown(reason);
  }

  listenForSignals(): void {
    this.requireApplication().listenForSignals();
  }

  getStatus() {
    const config = this.snapshot;
    return {
      usesFallbackConfig: config?.usesFallbackConfig ?? false,
      configError: config?.configError,
      buildAttempts: this.buildAttempts,
      application: this.application?.getStatus()
    };
  }

  // Private methods

  private async createApp(): Promise<void> {
    let loaderConfig: LoaderConfig;
    try {
      loaderConfig = loadLoaderConfig(this.options.env);
    } catch (error) {
      throw new BootstrapError('loader_init', error);
    }

    log.info('🔧 Loader config loaded', {
      ignoreFallbackConfig: loaderConfig.ignoreFallbackConfig,
      startTimeout: TimeParser.formatDuration(loaderConfig.startTimeout),
      stopTimeout: TimeParser.formatDuration(loaderConfig.stopTimeout),
      fallbackConfigPath: loaderConfig.fallbackConfigPath
    });

    const store = this.options.createStore(loaderConfig);

    let resolved: ResolveResult<T>;
    try {
      resolved = resolveConfig(this.options.prefix, this.options.readConfig, this.options.env);
    } catch (error) {
      throw new BootstrapError('current_config_load', error);
    }

    let rejection: ConfigRejection;

    if (resolved.ok) {
      this.install({ ...loaderConfig, app: resolved.config });

      const outcome = await this.build();
      if (outcome.kind === 'built') {
        await this.persist(store);
        return;
      }
      if (outcome.kind === 'failed') {
        throw new BootstrapError('app_construction', outcome.error);
      }

      rejection = outcome.error;
      log.warn('⚠️ Current config rejected by application', { error: rejection.message });
      await this.rollback(loaderConfig, store, rejection, 'app_construction');
    } else {
      rejection = resolved.error;
      log.warn('⚠️ Failed to parse current config', { error: rejection.message });
      await this.rollback(loaderConfig, store, rejection, 'current_config_load');
    }

    // 用备用配置再试一次, 失败就不再重试
    const fallbackOutcome = await this.build();
    if (fallbackOutcome.kind !== 'built') {
      throw new BootstrapError('fallback_app_construction', fallbackOutcome.error, rejection);
    }

    log.warn('⏪ Application built with last known good config', { configError: rejection.message });
  }

  private async build(): Promise<BuildOutcome> {
    const { startTimeout, stopTimeout } = this.config();
    const application = new Application({ startTimeout, stopTimeout });

    this.buildAttempts++;
    log.info('🏗️ Building application', {
      attempt: this.buildAttempts,
      usesFallbackConfig: this.config().usesFallbackConfig
    });

    let outcome: BuildOutcome;
    try {
      outcome = await this.options.builder.build({ config: this, lifecycle: application });
    } catch (error) {
      outcome = classifyBuildError(error);
    }

    if (outcome.kind === 'built') {
      this.application = application;
    }
    return outcome;
  }

  private async rollback(
    loaderConfig: LoaderConfig,
    store: ConfigStore<T>,
    rejection: ConfigRejection,
    phase: BootstrapPhase
  ): Promise<void> {
    if (loaderConfig.ignoreFallbackConfig) {
      log.warn('Fallback config is ignored');
      throw new BootstrapError(phase, rejection);
    }

    if (this.rollbackApplied) {
      throw new BootstrapError('fallback_app_construction', rejection, rejection);
    }

    const result = await store.load().catch((error: unknown) => ({ status: 'error' as const, error }));

    if (result.status === 'not_found') {
      throw new BootstrapError(
        'fallback_load',
        new StoreUnavailableError('last known good config does not exist', 'not_found'),
        rejection
      );
    }
    if (result.status === 'error') {
      throw new BootstrapError(
        'fallback_load',
        new StoreUnavailableError(`last known good config is unreadable: ${describeError(result.error)}`, 'io', result.error),
        rejection
      );
    }

    this.rollbackApplied = true;
    this.install({
      ...loaderConfig,
      usesFallbackConfig: true,
      configError: rejection.message,
      app: result.config
    });

    log.warn('⏪ Rolled back to last known good config', { configError: rejection.message });
  }

  private async persist(store: ConfigStore<T>): Promise<void> {
    const { usesFallbackConfig, app } = this.config();

    // 备用配置不会被重新保存
    if (usesFallbackConfig) {
      return;
    }

    try {
      await store.save(app);
    } catch (error) {
      throw new BootstrapError('config_persist', new PersistError(error));
    }

    log.info('💾 Current config saved as last known good config');
  }

  // 每次都换一份新的冻结快照, 不修改旧的
  private install(config: Config<T>): void {
    this.snapshot = deepFreeze({ ...config, app: structuredClone(config.app) });
  }

  private requireApplication(): Application {
    if (!this.application) {
      throw new AppError('Application is not built', { isOperational: false });
    }
    return this.application;
  }
}
