/**
 * 时长解析工具
 * 支持格式: 300ms, 1.5h, 1h30m, -2s, 0
 * 单位: ns, us (µs), ms, s, m, h
 */

const UNIT_MILLISECONDS: Record<string, number> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  'μs': 1e-3,
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000
};

const DURATION_PATTERN = /^[-+]?(?:(?:\d+(?:\.\d*)?|\.\d+)(?:ns|us|µs|μs|ms|s|m|h))+$/;
const SEGMENT_PATTERN = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h)/g;
const BARE_NUMBER_PATTERN = /^[-+]?(?:\d+(?:\.\d*)?|\.\d+)$/;

export class TimeParser {
  /**
   * 解析时长字符串, 返回毫秒 (可能带小数)
   */
  static parseDuration(durationStr: string): number {
    const trimmed = durationStr.trim();

    if (trimmed === '0' || trimmed === '+0' || trimmed === '-0') {
      return 0;
    }

    if (BARE_NUMBER_PATTERN.test(trimmed)) {
      throw new Error(`time: missing unit in duration "${durationStr}"`);
    }

    if (!DURATION_PATTERN.test(trimmed)) {
      throw new Error(`time: invalid duration "${durationStr}"`);
    }

    const sign = trimmed.startsWith('-') ? -1 : 1;
    let milliseconds = 0;

    for (const match of trimmed.matchAll(SEGMENT_PATTERN)) {
      milliseconds += parseFloat(match[1]) * UNIT_MILLISECONDS[match[2]];
    }

    if (!Number.isFinite(milliseconds)) {
      throw new Error(`time: invalid duration "${durationStr}"`);
    }

    return sign * milliseconds;
  }

  /**
   * 毫秒转为可读格式, 如 1h30m0s, 1.5s, 250ms
   */
  static formatDuration(milliseconds: number): string {
    if (milliseconds === 0) {
      return '0s';
    }

    const sign = milliseconds < 0 ? '-' : '';
    const abs = Math.abs(milliseconds);

    if (abs < 1000) {
      return `${sign}${Number(abs.toFixed(6))}ms`;
    }

    const hours = Math.floor(abs / UNIT_MILLISECONDS.h);
    const minutes = Math.floor((abs % UNIT_MILLISECONDS.h) / UNIT_MILLISECONDS.m);
    const seconds = Number(((abs % UNIT_MILLISECONDS.m) / 1000).toFixed(3));

    if (hours > 0) {
      return `${sign}${hours}h${minutes}m${seconds}s`;
    }
    if (minutes > 0) {
      return `${sign}${minutes}m${seconds}s`;
    }
    return `${sign}${seconds}s`;
  }
}
