import log from 'electron-log/node';

type LevelName = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

const LEVELS: readonly LevelName[] = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'];

const resolveLevel = (value: string | undefined, fallback: LevelName): LevelName | false => {
  if (!value) return fallback;
  const normalised = value.trim().toLowerCase();
  if (['off', 'false', 'none', 'silent'].includes(normalised)) return false;
  return LEVELS.find((level) => level === normalised) ?? fallback;
};

log.transports.console.level = resolveLevel(process.env.HARVEST_LOG_LEVEL, 'info');
log.transports.console.format = '[{h}:{i}:{s}] [{scope}] {text}';

const logFile = process.env.HARVEST_LOG_FILE;
if (logFile) {
  log.transports.file.level = resolveLevel(process.env.HARVEST_LOG_FILE_LEVEL, 'info');
  log.transports.file.resolvePathFn = () => logFile;
} else {
  log.transports.file.level = false;
}

export const createLogger = (scope: string) => log.scope(scope);

export default log;
