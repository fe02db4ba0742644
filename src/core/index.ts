// Application core
export { Application } from './Application';
export type { ApplicationConfig, ApplicationState, Lifecycle, LifecycleHook } from './Application';

// Bootstrap
export { ApplicationBootstrap } from './ApplicationBootstrap';
export type { BootstrapOptions } from './ApplicationBootstrap';
export { ContainerAppBuilder, classifyBuildError } from './AppBuilder';
export type { AppBuilder, AppModule, BuildContext, BuildOutcome } from './AppBuilder';

// Config
export { DEFAULT_FALLBACK_CONFIG_PATH, FileConfigStore, createV8Codec } from './config/ConfigStore';
export type { ConfigCodec, ConfigStore, LoadResult } from './config/ConfigStore';
export { EnvReader, envKey, resolveConfig } from './config/EnvResolver';
export type { ConfigReader, FieldOptions, ResolveResult } from './config/EnvResolver';
export { deepFreeze } from './config/ConfigProvider';
export type { Config, ConfigProvider } from './config/ConfigProvider';

// Container system
export * from './container';
