import {
  DEFAULT_LOADER_START_TIMEOUT,
  DEFAULT_LOADER_STOP_TIMEOUT,
  loadLoaderConfig
} from '../config';
import { ConfigParseError } from '../utils/errors';

describe('Loader configuration', () => {
  it('should apply defaults when nothing is set', () => {
    expect(loadLoaderConfig({})).toEqual({
      usesFallbackConfig: false,
      ignoreFallbackConfig: false,
      startTimeout: DEFAULT_LOADER_START_TIMEOUT,
      stopTimeout: DEFAULT_LOADER_STOP_TIMEOUT,
      fallbackConfigPath: 'last_known_good_config'
    });
    expect(DEFAULT_LOADER_START_TIMEOUT).toBe(60000);
    expect(DEFAULT_LOADER_STOP_TIMEOUT).toBe(60000);
  });

  it('should read LOADER_* variables', () => {
    const config = loadLoaderConfig({
      LOADER_IGNORE_FALLBACK_CONFIG: 'true',
      LOADER_START_TIMEOUT: '5s',
      LOADER_STOP_TIMEOUT: '1m30s',
      LOADER_FALLBACK_CONFIG_PATH: '/var/lib/echo/config'
    });

    expect(config.ignoreFallbackConfig).toBe(true);
    expect(config.startTimeout).toBe(5000);
    expect(config.stopTimeout).toBe(90000);
    expect(config.fallbackConfigPath).toBe('/var/lib/echo/config');
    expect(config.usesFallbackConfig).toBe(false);
  });

  it('should treat zero timeouts as unset', () => {
    const config = loadLoaderConfig({ LOADER_START_TIMEOUT: '0s', LOADER_STOP_TIMEOUT: '0' });

    expect(config.startTimeout).toBe(DEFAULT_LOADER_START_TIMEOUT);
    expect(config.stopTimeout).toBe(DEFAULT_LOADER_STOP_TIMEOUT);
  });

  it('should keep timeouts longer than a single timer can hold', () => {
    const config = loadLoaderConfig({ LOADER_START_TIMEOUT: '720h', LOADER_STOP_TIMEOUT: '800h' });

    expect(config.startTimeout).toBe(2592000000);
    expect(config.stopTimeout).toBe(2880000000);
  });

  it('should reject malformed values', () => {
    expect(() => loadLoaderConfig({ LOADER_IGNORE_FALLBACK_CONFIG: 'sometimes' })).toThrow(ConfigParseError);
    expect(() => loadLoaderConfig({ LOADER_STOP_TIMEOUT: '10' })).toThrow(
      `assigning LOADER_STOP_TIMEOUT to stopTimeout: converting '10' to type duration: time: missing unit in duration "10"`
    );
  });
});
