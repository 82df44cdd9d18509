/**
 * Keep log lines on one line.
 */
export function sanitizeLogMessage(s: string): string {
  if (!s) return "";
  return s.replace(/\r?\n/g, "\\n").replace(/\t/g, "\\t").slice(0, 10000);
}

/**
 * Redact credentials and home directories from messages.
 * `secrets` are literal values (e.g. the BaseX password) removed wherever they appear.
 */
export function redactSensitiveInfo(s: string, secrets: readonly string[] = []): string {
  if (!s) return "";

  let result = s;
  for (const secret of secrets) {
    if (secret.length > 0) result = result.split(secret).join("***");
  }

  result = result.replace(/password[=:]\s*\S+/gi, "password=***");
  result = result.replace(/token[=:]\s*\S+/gi, "token=***");
  result = result.replace(/(https?:\/\/)[^/\s:@]+:[^/\s@]+@/gi, "$1***@");
  result = result.replace(/\/home\/[^/\s]+/g, "/home/***");
  result = result.replace(/\/Users\/[^/\s]+/g, "/Users/***");

  return result;
}
