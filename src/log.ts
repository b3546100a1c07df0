let debugMode = false;

export function setDebugMode(enabled: boolean): void {
  debugMode = enabled;
}

export function isDebugEnabled(): boolean {
  return debugMode;
}

export function logError(...args: unknown[]): void {
  console.error("[stmtguard]", ...args);
}

export function logDebug(...args: unknown[]): void {
  if (debugMode) {
    console.log("[stmtguard:debug]", ...args);
  }
}
