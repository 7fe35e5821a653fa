export type LogSink = (line: string) => void;

export function formatLogLine(message: string, source: string, now: Date = new Date()): string {
  const formattedTime = now.toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  return `${formattedTime} [${source}] ${message}`;
}

export function log(message: string, source = "bond-audit", sink: LogSink = console.error) {
  sink(formatLogLine(message, source));
}

export function createLogger(source: string, sink: LogSink = console.error) {
  return (message: string) => log(message, source, sink);
}
