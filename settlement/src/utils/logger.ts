import pino from "pino";

export function createLogger(level: string = "info") {
  return pino({ level }, pino.destination(1)); // stdout
}

export type Logger = ReturnType<typeof createLogger>;
