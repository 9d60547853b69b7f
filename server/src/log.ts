let debugEnabled = false;

export function setDebug(enabled: boolean): void {
  debugEnabled = enabled;
}

/** console.debug, only when XUNLEI_DEBUG is set */
export function debug(...args: unknown[]): void {
  if (debugEnabled) console.debug(...args);
}
