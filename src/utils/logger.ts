//
//
//

import winston, { createLogger, type Logger } from "winston";

export const LOG_LEVELS = Object.keys(winston.config.npm.levels);

/**
 * Creates the logger used by every component of a run. All levels go to
 * stderr so that stdout only carries the result line.
 */
export function createRunLogger(level: string, silent = false): Logger {
    if (!LOG_LEVELS.includes(level)) {
        throw new RangeError(`Unknown log level "${level}". Expected one of: ${LOG_LEVELS.join(", ")}.`);
    }

    return createLogger({
        level,
        silent,
        format: winston.format.cli(),
        transports: [new winston.transports.Console({ stderrLevels: LOG_LEVELS })],
    });
}
