import type { IncomingMessage, ServerResponse } from 'http';
import { EchoAppConfig } from './EchoAppConfig';
import { ConfigProvider } from '../../core/config/ConfigProvider';
import { describeError } from '../../utils/errors';
import { log } from '../../utils/logger';
import { sleep } from '../../utils/timeout';

export interface EchoResponse {
  statusCode: number;
  body: string;
}

/**
 * 每个请求都返回当前的完整配置 (JSON), 用于观察是否在使用备用配置
 */
export class EchoHandler {
  constructor(
    private readonly configProvider: ConfigProvider<EchoAppConfig>,
    private readonly wait: (ms: number) => Promise<unknown> = sleep
  ) {}

  async respond(): Promise<EchoResponse> {
    // 每次请求都重新取配置, 不缓存
    const responseTimeout = this.configProvider.config().app.echoHandler.responseTimeout;
    if (responseTimeout > 0) {
      await this.wait(responseTimeout);
    }

    try {
      return { statusCode: 200, body: JSON.stringify(this.configProvider.config()) };
    } catch (error) {
      return { statusCode: 500, body: describeError(error) };
    }
  }

  readonly listener = (req: IncomingMessage, res: ServerResponse): void => {
    this.respond().then(
      ({ statusCode, body }) => {
        log.http(`${req.method ?? 'GET'} ${req.url ?? '/'} ${statusCode}`);
        res.writeHead(statusCode, {
          'Content-Type': statusCode === 200 ? 'application/json' : 'text/plain'
        });
        res.end(body);
      },
      (error: unknown) => {
        log.error('❌ Echo handler failed', { error: describeError(error) });
        res.writeHead(500, { 'Content-Type': 'text/plain' });
        res.end(describeError(error));
      }
    );
  };
}
