import pino from 'pino';

const pretty = process.env['NODE_ENV'] !== 'production';

/**
 * Process-wide logger. Pipeline lines carry `title`, `audio_url` and `file_path`
 * as structured fields rather than in the message.
 */
export const logger = pino({
  name: 'sermonkeeper',
  level: process.env['LOG_LEVEL'] ?? 'info',
  transport: pretty
    ? { target: 'pino-pretty', options: { colorize: true, ignore: 'pid,hostname,name' } }
    : undefined,
  serializers: { err: pino.stdSerializers.err },
  redact: {
    paths: ['api_key', 'apiKey', 'password', 'authorization', 'api.key', 'headers.authorization'],
    censor: '***REDACTED***',
  },
});
