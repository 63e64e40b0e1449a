import * as fs from "fs";
import * as path from "path";
import pino from "pino";
import type { Logger } from "pino";
import type { LogLevel } from "./config";

/**
 * Create the run logger: JSON lines to stdout and, appended, to `logFile`.
 * Each line carries `time` and `level` alongside the message.
 */
export function createLogger(level: LogLevel, logFile: string): Logger {
  fs.mkdirSync(path.dirname(logFile), { recursive: true });
  const file = pino.destination({ dest: logFile, append: true, sync: true });

  return pino(
    {
      level,
      base: null,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream([
      { level, stream: process.stdout },
      { level, stream: file },
    ])
  );
}
