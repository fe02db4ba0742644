import { Lifecycle, LifecycleHook } from '../../src/core/Application';
import { Config, ConfigProvider } from '../../src/core/config/ConfigProvider';
import {
  EchoAppConfig,
  EchoHandler,
  createEchoAppBuilder,
  isEchoAppConfig,
  validateServerConfig
} from '../../src/services/echo';
import { BadConfigError } from '../../src/utils/errors';

function snapshot(app: EchoAppConfig, overrides: Partial<Config<EchoAppConfig>> = {}): Config<EchoAppConfig> {
  return {
    usesFallbackConfig: false,
    ignoreFallbackConfig: false,
    startTimeout: 60000,
    stopTimeout: 60000,
    fallbackConfigPath: 'last_known_good_config',
    app,
    ...overrides
  };
}

class StaticConfigProvider implements ConfigProvider<EchoAppConfig> {
  constructor(public current: Config<EchoAppConfig>) {}

  config(): Config<EchoAppConfig> {
    return this.current;
  }
}

class RecordingLifecycle implements Lifecycle {
  hooks: LifecycleHook[] = [];

  append(hook: LifecycleHook): void {
    this.hooks.push(hook);
  }
}

const appConfig: EchoAppConfig = {
  echoHandler: { responseTimeout: 0 },
  server: { host: '127.0.0.1', port: 8080 }
};

describe('Echo application', () => {
  describe('isEchoAppConfig', () => {
    test('should accept a complete config', () => {
      expect(isEchoAppConfig(appConfig)).toBe(true);
    });

    test('should reject values of another shape', () => {
      expect(isEchoAppConfig(null)).toBe(false);
      expect(isEchoAppConfig({ server: appConfig.server })).toBe(false);
      expect(isEchoAppConfig({ ...appConfig, server: { host: '127.0.0.1', port: '8080' } })).toBe(false);
      expect(isEchoAppConfig({ ...appConfig, echoHandler: {} })).toBe(false);
    });
  });

  describe('validateServerConfig', () => {
    test('should accept ports at both ends of the range', () => {
      expect(() => validateServerConfig({ host: 'localhost', port: 8000 })).not.toThrow();
      expect(() => validateServerConfig({ host: 'localhost', port: 8999 })).not.toThrow();
    });

    test('should reject an empty host', () => {
      expect(() => validateServerConfig({ host: '', port: 8080 })).toThrow(
        new BadConfigError("server host can't be empty")
      );
    });

    test('should reject ports outside the range', () => {
      for (const port of [0, 7999, 9000, 9999]) {
        expect(() => validateServerConfig({ host: 'localhost', port })).toThrow(
          'bad config: server port should be between 8000 and 8999'
        );
      }
    });
  });

  describe('echoModule', () => {
    test('should register the server hook for a valid config', async () => {
      const lifecycle = new RecordingLifecycle();

      const outcome = await createEchoAppBuilder().build({
        config: new StaticConfigProvider(snapshot(appConfig)),
        lifecycle
      });

      expect(outcome).toEqual({ kind: 'built' });
      expect(lifecycle.hooks.map(hook => hook.name)).toEqual(['EchoServer']);
    });

    test('should reject an out of range port', async () => {
      const lifecycle = new RecordingLifecycle();

      const outcome = await createEchoAppBuilder().build({
        config: new StaticConfigProvider(snapshot({ ...appConfig, server: { host: '127.0.0.1', port: 9999 } })),
        lifecycle
      });

      expect(outcome.kind).toBe('rejected');
      if (outcome.kind !== 'rejected') {
        return;
      }
      expect(outcome.error).toBeInstanceOf(BadConfigError);
      expect(outcome.error.message).toBe('bad config: server port should be between 8000 and 8999');
      expect(lifecycle.hooks).toEqual([]);
    });
  });

  describe('EchoHandler', () => {
    test('should wait for the response timeout and echo the config', async () => {
      const current = snapshot({ ...appConfig, echoHandler: { responseTimeout: 1500 } });
      const wait = jest.fn(async () => undefined);
      const handler = new EchoHandler(new StaticConfigProvider(current), wait);

      const response = await handler.respond();

      expect(wait).toHaveBeenCalledWith(1500);
      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toEqual(current);
    });

    test('should not wait when the response timeout is zero', async () => {
      const wait = jest.fn(async () => undefined);
      const handler = new EchoHandler(new StaticConfigProvider(snapshot(appConfig)), wait);

      await handler.respond();

      expect(wait).not.toHaveBeenCalled();
    });

    test('should read the latest snapshot on every request', async () => {
      const provider = new StaticConfigProvider(snapshot(appConfig));
      const handler = new EchoHandler(provider, async () => undefined);

      await handler.respond();
      provider.current = snapshot(appConfig, {
        usesFallbackConfig: true,
        configError: 'bad config: server port should be between 8000 and 8999'
      });
      const response = await handler.respond();

      expect(JSON.parse(response.body)).toMatchObject({
        usesFallbackConfig: true,
        configError: 'bad config: server port should be between 8000 and 8999'
      });
    });
  });
});
