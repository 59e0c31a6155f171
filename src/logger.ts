import pino from "pino";
import { loadConfig } from "./config/config.ts";

export type Logger = pino.Logger;

let loggerInstance: pino.Logger | null = null;

function createRootLogger(): pino.Logger {
  return pino(
    {
      name: "cellwidth",
      level: loadConfig().logLevel,
      formatters: {
        level: (label) => {
          return { level: label.toUpperCase() };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    // stdout belongs to the host application
    pino.destination(2),
  );
}

/**
 * Root logger, created on first use.
 */
export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    loggerInstance = createRootLogger();
  }
  return loggerInstance;
}

/**
 * Child logger tagged with a component name.
 */
export function createLogger(component: string): pino.Logger {
  return getLogger().child({ component });
}

/**
 * Logger that discards everything.
 */
export function silentLogger(): pino.Logger {
  return pino({ level: "silent", enabled: false });
}
