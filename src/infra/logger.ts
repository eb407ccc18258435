import pino from 'pino';

// Pino logger instance configured for the app
// name: identifies this logger in output
// level: LOG_LEVEL wins, otherwise production uses info only and dev uses debug
// redact: removes the bot token from anything that gets logged
export const logger = pino({
  name: 'house-gate',
  level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
  redact: {
    paths: ['env.BOT_TOKEN', 'BOT_TOKEN', 'token'],
    remove: true,
  },
});
