export type PrepLogger = {
  info: (message: string) => void;
  warn: (message: string) => void;
};

const timestamp = (): string =>
  new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

export function log(message: string, source = "t2prep") {
  console.log(`${timestamp()} [${source}] ${message}`);
}

export function createConsoleLogger(source = "t2prep"): PrepLogger {
  return {
    info: (message) => log(message, source),
    warn: (message) => console.warn(`${timestamp()} [${source}] ${message}`),
  };
}

export const silentLogger: PrepLogger = {
  info: () => undefined,
  warn: () => undefined,
};

/** Collects messages in memory; used by tests and by callers that want a transcript. */
export function createMemoryLogger(): PrepLogger & { messages: string[]; warnings: string[] } {
  const messages: string[] = [];
  const warnings: string[] = [];
  return {
    messages,
    warnings,
    info: (message) => {
      messages.push(message);
    },
    warn: (message) => {
      warnings.push(message);
    },
  };
}
