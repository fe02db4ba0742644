import {
  Container,
  ServiceResolutionError,
  ServiceToken,
  unwrapResolutionError
} from '../../../src/core/container';
import { BadConfigError, findCause } from '../../../src/utils/errors';

interface Settings {
  port: number;
}

class Server {
  constructor(public readonly settings: Settings) {}
}

const SETTINGS = new ServiceToken<Settings>('Settings');
const SERVER = new ServiceToken<Server>('Server');

describe('Container', () => {
  test('should build each service once', async () => {
    const container = new Container();
    const factory = jest.fn(() => ({ port: 8080 }));
    container.registerFactory(SETTINGS, factory);

    const first = await container.resolve(SETTINGS);
    const second = await container.resolve(SETTINGS);

    expect(first).toBe(second);
    expect(factory).toHaveBeenCalledTimes(1);
  });

  test('should resolve dependencies through the resolver', async () => {
    const container = new Container();
    container.registerInstance(SETTINGS, { port: 8123 });
    container.registerFactory(SERVER, async resolver => new Server(await resolver.resolve(SETTINGS)));

    const server = await container.resolve(SERVER);

    expect(server.settings.port).toBe(8123);
    expect(container.isRegistered(SERVER)).toBe(true);
    expect(container.getRegisteredServices()).toEqual(['Settings', 'Server']);
  });

  test('should refuse duplicate registrations', () => {
    const container = new Container();
    container.registerInstance(SETTINGS, { port: 1 });

    expect(() => container.registerFactory(SETTINGS, () => ({ port: 2 }))).toThrow(
      'Service already registered: Settings'
    );
  });

  test('should reject unregistered services', async () => {
    const container = new Container();

    const error = await container.resolve(SERVER).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServiceResolutionError);
    expect(unwrapResolutionError(error)).toEqual(new Error('Service not registered: Server'));
  });

  test('should wrap factory errors at every level', async () => {
    const container = new Container();
    const badConfig = new BadConfigError('nope');
    container.registerFactory(SETTINGS, () => {
      throw badConfig;
    });
    container.registerFactory(SERVER, async resolver => new Server(await resolver.resolve(SETTINGS)));

    const error = await container.resolve(SERVER).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ServiceResolutionError);
    expect(error).toHaveProperty(
      'message',
      'could not build Server: could not build Server -> Settings: bad config: nope'
    );
    expect(findCause(error, BadConfigError)).toBe(badConfig);
    expect(unwrapResolutionError(error)).toBe(badConfig);
  });

  test('should detect circular dependencies', async () => {
    const container = new Container();
    const a = new ServiceToken<string>('A');
    const b = new ServiceToken<string>('B');
    container.registerFactory(a, async resolver => `a:${await resolver.resolve(b)}`);
    container.registerFactory(b, async resolver => `b:${await resolver.resolve(a)}`);

    const error = await container.resolve(a).catch((e: unknown) => e);

    expect(unwrapResolutionError(error)).toHaveProperty('message', 'Circular dependency detected: A -> B -> A');
  });
});
