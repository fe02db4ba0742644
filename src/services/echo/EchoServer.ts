import http from 'http';
import { EchoHandler } from './EchoHandler';
import { log } from '../../utils/logger';

export class EchoServer {
  private readonly server: http.Server;

  constructor(
    public readonly host: string,
    public readonly port: number,
    handler: EchoHandler
  ) {
    this.server = http.createServer(handler.listener);
  }

  get address(): string {
    return `${this.host}:${this.port}`;
  }

  get listening(): boolean {
    return this.server.listening;
  }

  /**
   * 开始监听. signal 被 abort 时关闭服务.
   */
  start(signal: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => reject(error);

      this.server.once('error', onError);
      this.server.listen(this.port, this.host, () => {
        this.server.removeListener('error', onError);
        log.info(`🌐 Echo server listening on ${this.address}`);

        signal.addEventListener(
          'abort',
          () => {
            this.stop().catch((error: unknown) => log.warn('⚠️ Failed to close echo server', { error }));
          },
          { once: true }
        );
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    if (!this.server.listening) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.server.close(error => {
        if (error) {
          reject(error);
          return;
        }
        log.info('🌐 Echo server stopped');
        resolve();
      });
      this.server.closeAllConnections();
    });
  }
}
