type LogLevel = "info" | "warn" | "error";

type LogFields = Record<string, unknown>;

function buildPayload(level: LogLevel, event: string, fields: LogFields = {}): Record<string, unknown> {
  return {
    timestamp: new Date().toISOString(),
    level,
    event,
    ...fields,
  };
}

function writeLog(level: LogLevel, event: string, fields?: LogFields): void {
  if (process.env.NODE_ENV === "test" && process.env.TEST_LOGGING !== "true") {
    return;
  }
  const output = JSON.stringify(buildPayload(level, event, fields));
  if (level === "error") {
    console.error(output);
  } else {
    console.log(output);
  }
}

export function errorFields(err: unknown): LogFields {
  if (err instanceof Error) {
    return { error: err.message, stack: err.stack };
  }
  return { error: String(err) };
}

export function logInfo(event: string, fields?: LogFields): void {
  writeLog("info", event, fields);
}

export function logWarn(event: string, fields?: LogFields): void {
  writeLog("warn", event, fields);
}

export function logError(event: string, fields?: LogFields): void {
  writeLog("error", event, fields);
}
