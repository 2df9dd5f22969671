export const DEV_LOG =
  process.env.NODE_ENV === "development" ||
  process.env.DEV_LOG === "1" ||
  process.env.DEV_LOG === "true";

export function debug(...args: unknown[]): void {
  if (DEV_LOG) console.debug("[debug]", ...args);
}

export function info(...args: unknown[]): void {
  console.info(...args);
}

export function warn(...args: unknown[]): void {
  console.warn("[warn]", ...args);
}

export function error(...args: unknown[]): void {
  console.error("[error]", ...args);
}
