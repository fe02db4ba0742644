import { LoaderConfig } from '../../config';

/**
 * 加载器配置 + 应用配置的只读快照
 */
export type Config<T> = Readonly<LoaderConfig> & { readonly app: T };

/**
 * 配置访问器.
 *
 * 回滚时加载器会换上一份新的快照, 旧快照不会被修改. 所以使用方每次都要
 * 重新调用 config(), 不能在构造时取一次然后缓存起来, 否则拿到的
 * usesFallbackConfig / configError / app 可能是回滚前的.
 */
export interface ConfigProvider<T> {
  config(): Config<T>;
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}
