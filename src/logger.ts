export type LogLevel = "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  info: 0,
  warn: 1,
  error: 2,
  silent: 3,
};

const SENSITIVE_KEYS = [
  "secretKey",
  "sharedSecret",
  "symmetricKey",
  "plaintext",
  "ciphertext",
];

export class Logger {
  private static level: LogLevel = "info";

  static setLevel(level: LogLevel) {
    Logger.level = level;
  }

  static getLevel(): LogLevel {
    return Logger.level;
  }

  static log(component: string, message: string, data?: Record<string, unknown>) {
    if (!Logger.enabled("info")) return;
    const safeData = data ? { ...data } : undefined;
    // Remove any sensitive data from logs
    if (safeData) {
      SENSITIVE_KEYS.forEach((key) => delete safeData[key]);
    }
    console.log(`[${component}] ${message}`, safeData || "");
  }

  static error(component: string, message: string, error?: unknown) {
    if (!Logger.enabled("error")) return;
    console.error(`[${component}] ERROR: ${message}`, error || "");
  }

  static warn(component: string, message: string, data?: Record<string, unknown>) {
    if (!Logger.enabled("warn")) return;
    console.warn(`[${component}] WARN: ${message}`, data || "");
  }

  private static enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[Logger.level];
  }
}
