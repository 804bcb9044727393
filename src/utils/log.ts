export interface LogSink {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

/* eslint-disable no-console */
export const consoleSink: LogSink = {
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};
/* eslint-enable no-console */

export const silentSink: LogSink = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
