import winston from 'winston';
import path from 'path';

// 日志级别配置
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4
};

// 日志颜色配置
const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'white'
};

winston.addColors(colors);

// 自定义格式
const format = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.colorize({ all: true }),
  winston.format.printf((info) => `${info.timestamp} ${info.level}: ${info.message}`)
);

function createTransports(logDir: string | undefined): winston.transport[] {
  const transports: winston.transport[] = [new winston.transports.Console({ format })];

  // 只有配置了 LOG_DIR 才写文件
  if (logDir) {
    transports.push(
      new winston.transports.File({
        filename: path.join(logDir, 'app.log'),
        format: winston.format.combine(
          winston.format.timestamp(),
          winston.format.json()
        )
      }),
      new winston.transports.File({
        filename: path.join(logDir, 'error.log'),
        level: 'error',
        format: winston.format.combine(
          winston.format.timestamp(),
          winston.format.json()
        )
      })
    );
  }

  return transports;
}

// 创建logger实例
const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  levels,
  transports: createTransports(process.env.LOG_DIR),
  silent: process.env.NODE_ENV === 'test',
  exitOnError: false
});

export default logger;

// 便捷方法
export const log = {
  error: (message: string, meta?: unknown) => logger.error(message, meta),
  warn: (message: string, meta?: unknown) => logger.warn(message, meta),
  info: (message: string, meta?: unknown) => logger.info(message, meta),
  http: (message: string, meta?: unknown) => logger.http(message, meta),
  debug: (message: string, meta?: unknown) => logger.debug(message, meta),
};
