export type DispatchLogWriter = Pick<Console, "debug" | "info" | "warn" | "error">;

const ignore = (): void => {};

export const silentLogWriter: DispatchLogWriter = {
  debug: ignore,
  info: ignore,
  warn: ignore,
  error: ignore,
};
