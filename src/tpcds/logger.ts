export type LogLevel = "INFO" | "WARNING" | "ERROR";

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Local time as "YYYY-MM-DD HH:MM:SS"
 */
export function formatTimestamp(date: Date): string {
  const day = `${String(date.getFullYear())}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function formatLogLine(
  date: Date,
  level: LogLevel,
  message: string
): string {
  return `[${formatTimestamp(date)}] [${level}] ${message}`;
}

export function logProgress(message: string, level: LogLevel = "INFO"): void {
  console.log(formatLogLine(new Date(), level, message));
}
