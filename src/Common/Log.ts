/**
 * Returns the current timestamp in ISO format.
 * @returns string - Current ISO timestamp
 * @example
 * const ts = GetTimestamp(); // '2025-06-24T12:34:56.789Z'
 */
export function GetTimestamp(): string {
    return new Date().toISOString();
}

/**
 * Log levels for library logging.
 */
export enum LogLevel {
    Error = 'ERROR',
    Warning = 'WARNING',
    Info = 'INFO',
    Debug = 'DEBUG',
}

/** Threshold names accepted from configuration. */
export type LogThreshold = `debug` | `info` | `warn` | `error`;

interface LevelSink {
    severity: number; // lower is more verbose
    write: (line: string) => void;
}

const SINKS: Record<LogLevel, LevelSink> = {
    [LogLevel.Debug]: { severity: 0, write: line => console.debug(line) },
    [LogLevel.Info]: { severity: 1, write: line => console.info(line) },
    [LogLevel.Warning]: { severity: 2, write: line => console.warn(line) },
    [LogLevel.Error]: { severity: 3, write: line => console.error(line) },
};

const THRESHOLD_SEVERITY: Record<LogThreshold, number> = { debug: 0, info: 1, warn: 2, error: 3 };

let _threshold: LogThreshold = `info`;

/**
 * Sets the minimum level written to the console.
 * @param threshold LogThreshold - Lowest level still printed
 * @example
 * SetLogLevel('warn');
 */
export function SetLogLevel(threshold: LogThreshold): void {
    _threshold = threshold;
}

export function GetLogLevel(): LogThreshold {
    return _threshold;
}

/**
 * Writes one timestamped line when `level` clears the threshold.
 * @param from string - Source location, see `log.Helper_LocationBuilder`
 * @param context string - Optional detail shown in brackets before the message
 * @example
 * log(LogLevel.Info, 'Configuration loaded', 'Services/ConfigService');
 */
export function log(level: LogLevel, message: string, from: string, context?: string): void {
    const sink = SINKS[level];
    if (sink.severity < THRESHOLD_SEVERITY[_threshold]) {
        return;
    }
    const body = context ? `[${context}] ${message}` : message;
    sink.write(`[${GetTimestamp()}] [${from}] ${body}`);
}

export namespace log {
    export function error(message: string, from: string, context?: string): void {
        log(LogLevel.Error, message, from, context);
    }

    export function warning(message: string, from: string, context?: string): void {
        log(LogLevel.Warning, message, from, context);
    }

    export function info(message: string, from: string, context?: string): void {
        log(LogLevel.Info, message, from, context);
    }

    export function debug(message: string, from: string, context?: string): void {
        log(LogLevel.Debug, message, from, context);
    }

    /**
     * Builds the `from` string of a log line.
     * @example
     * const loc = log.Helper_LocationBuilder('Nvlist', 'NvlistCodec', 'Fill'); // 'Nvlist/NvlistCodec/Fill'
     */
    export function Helper_LocationBuilder(moduleName: string, className: string, funcName?: string): string {
        return `${moduleName}/${className}${funcName ? `/${funcName}` : ''}`;
    }
}
