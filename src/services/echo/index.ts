import { EchoAppConfig, validateServerConfig } from './EchoAppConfig';
import { EchoHandler } from './EchoHandler';
import { EchoServer } from './EchoServer';
import { AppModule, ContainerAppBuilder } from '../../core/AppBuilder';
import { ServiceToken } from '../../core/container/IContainer';

export * from './EchoAppConfig';
export { EchoHandler } from './EchoHandler';
export type { EchoResponse } from './EchoHandler';
export { EchoServer } from './EchoServer';

export const ECHO_SERVICE_IDENTIFIERS = {
  APP_CONFIG: new ServiceToken<EchoAppConfig>('EchoAppConfig'),
  HANDLER: new ServiceToken<EchoHandler>('EchoHandler'),
  SERVER: new ServiceToken<EchoServer>('EchoServer')
};

export const echoModule: AppModule<EchoAppConfig> = {
  name: 'echo',

  provide(container, { config }) {
    container.registerFactory(ECHO_SERVICE_IDENTIFIERS.APP_CONFIG, () => config.config().app);

    container.registerFactory(ECHO_SERVICE_IDENTIFIERS.HANDLER, () => new EchoHandler(config));

    container.registerFactory(ECHO_SERVICE_IDENTIFIERS.SERVER, async resolver => {
      const appConfig = await resolver.resolve(ECHO_SERVICE_IDENTIFIERS.APP_CONFIG);
      validateServerConfig(appConfig.server);
      const handler = await resolver.resolve(ECHO_SERVICE_IDENTIFIERS.HANDLER);
      return new EchoServer(appConfig.server.host, appConfig.server.port, handler);
    });
  },

  async invoke(resolver, { lifecycle }) {
    const server = await resolver.resolve(ECHO_SERVICE_IDENTIFIERS.SERVER);
    lifecycle.append({
      name: 'EchoServer',
      onStart: signal => server.start(signal),
      onStop: () => server.stop()
    });
  }
};

export function createEchoAppBuilder(): ContainerAppBuilder<EchoAppConfig> {
  return new ContainerAppBuilder([echoModule]);
}
