export type Logger = (message: string) => void;

export const silentLogger: Logger = () => undefined;

export function scopedLogger(logger: Logger, scope: string): Logger {
  return (message) => logger(`[${scope}] ${message}`);
}
