import pino from 'pino';
import pretty from 'pino-pretty';
import { env } from './env';

const stream = env.nodeEnv === 'development'
  ? pretty({
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    })
  : undefined;

const defaultLevel = env.nodeEnv === 'production' ? 'info' : env.nodeEnv === 'test' ? 'silent' : 'debug';

export const logger = pino(
  {
    name: 'termweave',
    level: env.logLevel || defaultLevel,
  },
  stream,
);

// Keeps log lines short when a field carries a whole chunk of source text
export const previewText = (text: string, maxLength = 100): string => {
  if (!text) return '';
  return text.length > maxLength ? text.substring(0, maxLength) + '...' : text;
};
