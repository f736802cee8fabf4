export const logLevels = ['none', 'warn', 'debug'] as const;
export type LogLevel = (typeof logLevels)[number];
export type Logger = (level: number, message: string) => void;

export const NO_LOG: Logger = () => {};

export function makeLogger(
  level: LogLevel,
  write: (message: string) => void = (message) => process.stderr.write(message + '\n'),
): Logger {
  const max = logLevels.indexOf(level);
  return (messageLevel, message) => {
    if (messageLevel <= max) {
      write(message);
    }
  };
}
