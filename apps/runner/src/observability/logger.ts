import pino, { type DestinationStream, type LevelWithSilent, type Logger, type LoggerOptions } from 'pino';

const DEFAULT_LOG_LEVEL: LevelWithSilent = 'info';
const DEFAULT_SERVICE_NAME = 'jobcorpus-runner';
const LOG_LEVELS: readonly string[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.includes(value);
}

export function readLogLevel(env: NodeJS.ProcessEnv = process.env): LevelWithSilent {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (!raw || !isLogLevel(raw)) {
    return DEFAULT_LOG_LEVEL;
  }

  return raw;
}

export function createRunnerLogger(destination?: DestinationStream, env: NodeJS.ProcessEnv = process.env): Logger {
  const service = env.LOG_SERVICE_NAME?.trim() || DEFAULT_SERVICE_NAME;

  const options: LoggerOptions = {
    level: readLogLevel(env),
    base: { service },
    timestamp: () => `,"ts":"${new Date().toISOString()}"`,
    formatters: {
      level: (label) => ({ level: label }),
    },
    serializers: {
      error: pino.stdSerializers.err,
    },
    messageKey: 'message',
  };

  return destination ? pino(options, destination) : pino(options);
}
