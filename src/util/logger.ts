import winston from "winston";

const { combine, timestamp, printf, colorize } = winston.format;

const fmt = printf(({ level, message, timestamp, component, participant }) => {
  const comp = component ? `[${component}]` : "";
  const who = participant ? ` ${participant}:` : "";
  return `${timestamp} ${level} ${comp}${who} ${message}`;
});

let logger: winston.Logger | undefined;

function consoleTransport() {
  return new winston.transports.Console({
    format: combine(timestamp({ format: "HH:mm:ss.SSS" }), colorize(), fmt),
  });
}

/**
 * Configure the root logger. Child loggers handed out by getLogger() before
 * this call share the root's level and transports, so module-level loggers
 * pick up the new settings.
 */
export function initLogger(level: string): winston.Logger {
  if (!logger) {
    logger = winston.createLogger({ level, transports: [consoleTransport()] });
    return logger;
  }
  logger.configure({ level, transports: [consoleTransport()] });
  return logger;
}

export function getLogger(component?: string): winston.Logger {
  if (!logger) {
    logger = initLogger(process.env.LOG_LEVEL || "info");
  }
  return logger.child({ component });
}

/**
 * Replace the console transport with a file transport.
 * Used in orchestrate mode so winston doesn't conflict with the ink TUI.
 */
export function replaceConsoleTransport(filePath: string): void {
  if (!logger) {
    logger = initLogger("info");
  }
  logger.clear();
  logger.add(
    new winston.transports.File({
      filename: filePath,
      format: combine(timestamp({ format: "HH:mm:ss.SSS" }), fmt),
    }),
  );
}
