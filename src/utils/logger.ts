import pino from 'pino';

const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

const logger = pino({
  name: 'note-vault',
  level: isTest ? 'silent' : process.env.LOG_LEVEL || 'info',
});

export default logger;
