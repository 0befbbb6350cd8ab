/** The slice of `console` the pipeline writes to. */
export type Logger = Pick<Console, "log" | "warn" | "error">;

export const silentLogger: Logger = {
  log: () => {},
  warn: () => {},
  error: () => {},
};
