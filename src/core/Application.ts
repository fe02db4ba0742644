import { AppError, LifecycleTimeoutError, describeError } from '../utils/errors';
import { log } from '../utils/logger';
import { TimeParser } from '../utils/timeParser';
import { withTimeout } from '../utils/timeout';

export interface LifecycleHook {
  name: string;
  /**
   * signal 在启动超时或启动失败时被 abort
   */
  onStart?(signal: AbortSignal): Promise<void> | void;
  onStop?(): Promise<void> | void;
}

export interface Lifecycle {
  append(hook: LifecycleHook): void;
}

export interface ApplicationConfig {
  startTimeout: number;
  stopTimeout: number;
}

export type ApplicationState = 'created' | 'starting' | 'started' | 'stopping' | 'stopped';

export class Application implements Lifecycle {
  private hooks: LifecycleHook[] = [];
  private startedHooks: LifecycleHook[] = [];
  private state: ApplicationState = 'created';
  private startupTimestamp?: number;
  private stopping?: Promise<void>;
  private shutdownReason?: string;
  private resolveDone: (reason: string) => void = () => undefined;
  private readonly donePromise: Promise<string>;
  private signalHandlers: Array<{ signal: NodeJS.Signals; handler: () => void }> = [];

  constructor(private readonly config: ApplicationConfig) {
    this.donePromise = new Promise<string>(resolve => {
      this.resolveDone = resolve;
    });
  }

  append(hook: LifecycleHook): void {
    if (this.state !== 'created') {
      throw new AppError(`Cannot append hook ${hook.name}: application is ${this.state}`, { isOperational: false });
    }
    this.hooks.push(hook);
  }

  /**
   * 按注册顺序执行所有 onStart, 总耗时受 startTimeout 限制.
   * 任何一个失败 (或超时) 都会把已经启动的 hook 逆序停掉, 然后抛出原始错误.
   */
  async start(signal?: AbortSignal): Promise<void> {
    if (this.state !== 'created') {
      throw new AppError(`Application cannot start: already ${this.state}`, { isOperational: false });
    }

    this.state = 'starting';
    this.startupTimestamp = Date.now();

    const startAbort = new AbortController();
    const forwardAbort = () => startAbort.abort(signal?.reason);
    signal?.addEventListener('abort', forwardAbort, { once: true });

    log.info('🚀 Starting application', {
      hooks: this.hooks.length,
      startTimeout: TimeParser.formatDuration(this.config.startTimeout)
    });

    try {
      await withTimeout(
        this.runStartHooks(startAbort.signal),
        this.config.startTimeout,
        () => new LifecycleTimeoutError('start', this.config.startTimeout)
      );
    } catch (error) {
      startAbort.abort(error);
      this.state = 'stopping';
      log.error('❌ Failed to start application', { error: describeError(error) });
      await this.rollbackStart();
      throw error;
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }

    if (!this.isStarting()) {
      throw new AppError('Application was stopped while starting');
    }

    this.state = 'started';
    log.info('✅ Application started successfully', { startupTimeMs: Date.now() - this.startupTimestamp });
  }

  /**
   * 逆序执行 onStop, 总耗时受 stopTimeout 限制. 超时只报告, 不会一直等下去.
   */
  async stop(): Promise<void> {
    if (this.state === 'stopping' && this.stopping) {
      return this.stopping;
    }

    if (this.state !== 'started' && this.state !== 'starting') {
      log.warn('Application not started', { state: this.state });
      return;
    }

    this.state = 'stopping';
    this.stopping = this.runStop().finally(() => this.shutdown('stopped'));
    return this.stopping;
  }

  /**
   * 应用结束 (收到信号或调用 shutdown) 时 resolve, 值为结束原因
   */
  done(): Promise<string> {
    return this.donePromise;
  }

  shutdown(reason = 'shutdown'): void {
    if (this.shutdownReason !== undefined) {
      return;
    }
    this.shutdownReason = reason;
    this.resolveDone(reason);
  }

  listenForSignals(signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM']): void {
    for (const signal of signals) {
      const handler = () => {
        log.info(`📡 Received ${signal}, starting graceful shutdown`);
        this.shutdown(signal);
      };
      process.once(signal, handler);
      this.signalHandlers.push({ signal, handler });
    }
  }

  getStatus() {
    return {
      state: this.state,
      hooks: this.hooks.length,
      startedHooks: this.startedHooks.length,
      uptime: this.startupTimestamp && this.state === 'started' ? Date.now() - this.startupTimestamp : 0,
      shutdownReason: this.shutdownReason
    };
  }

  // Private methods

  private async runStartHooks(signal: AbortSignal): Promise<void> {
    for (const hook of this.hooks) {
      if (signal.aborted) {
        throw signal.reason;
      }

      if (hook.onStart) {
        await hook.onStart(signal);
        log.debug(`✅ Hook started: ${hook.name}`);
      }

      // 超时后才完成的 hook 不再记入, 直接停掉
      if (!this.isStarting()) {
        await this.stopHook(hook);
        return;
      }
      this.startedHooks.push(hook);
    }
  }

  private isStarting(): boolean {
    return this.state === 'starting';
  }

  private async rollbackStart(): Promise<void> {
    try {
      await this.runStop();
    } catch (error) {
      log.warn('⚠️ Error while rolling back application start', { error: describeError(error) });
    }
  }

  private async runStop(): Promise<void> {
    log.info('🛑 Stopping application', {
      hooks: this.startedHooks.length,
      stopTimeout: TimeParser.formatDuration(this.config.stopTimeout)
    });

    const hooks = [...this.startedHooks].reverse();
    this.startedHooks = [];

    try {
      await withTimeout(
        this.runStopHooks(hooks),
        this.config.stopTimeout,
        () => new LifecycleTimeoutError('stop', this.config.stopTimeout)
      );
      log.info('✅ Application stopped gracefully');
    } catch (error) {
      log.error('⚠️ Application did not stop cleanly', { error: describeError(error) });
      throw error;
    } finally {
      this.state = 'stopped';
      this.removeSignalHandlers();
    }
  }

  private async runStopHooks(hooks: LifecycleHook[]): Promise<void> {
    let firstError: unknown;

    for (const hook of hooks) {
      try {
        await this.stopHook(hook);
      } catch (error) {
        log.warn(`⚠️ Error stopping hook: ${hook.name}`, { error: describeError(error) });
        // 继续停止其他 hook
        if (firstError === undefined) {
          firstError = error;
        }
      }
    }

    if (firstError !== undefined) {
      throw firstError;
    }
  }

  private async stopHook(hook: LifecycleHook): Promise<void> {
    if (hook.onStop) {
      await hook.onStop();
      log.debug(`✅ Hook stopped: ${hook.name}`);
    }
  }

  private removeSignalHandlers(): void {
    for (const { signal, handler } of this.signalHandlers) {
      process.removeListener(signal, handler);
    }
    this.signalHandlers = [];
  }
}
