// src/utils/logger.ts
import pino from "pino";
import type { Logger as PinoLogger, LoggerOptions } from "pino";
import { format } from "node:util";
import { getConfig } from "../config.js";

export enum LogLevel {
    DEBUG = "DEBUG",
    INFO = "INFO",
    WARN = "WARN",
    ERROR = "ERROR"
}

// Configuration for the logger; unset fields come from getConfig()
export interface LoggerConfig {
    level?: string | undefined;
    pretty?: boolean | undefined;
}

type PinoLevel = "debug" | "info" | "warn" | "error";

/**
 * Named logger backed by Pino.
 */
export class Log {
    private pino: PinoLogger;
    private readonly className: string;

    private constructor(className: string, config: LoggerConfig | undefined) {
        this.className = className;

        const defaults = getConfig();
        const level = config?.level?.toLowerCase() ?? defaults.logLevel;
        const isPretty = config?.pretty ?? defaults.logPretty;

        const pinoConfig: LoggerOptions = {
            level,
            name: className,

            serializers: {
                err: pino.stdSerializers.err,
                error: pino.stdSerializers.err
            },

            base: {
                service: "tablequery"
            },

            timestamp: pino.stdTimeFunctions.isoTime
        };

        // Only add transport if pretty printing is enabled
        if (isPretty) {
            pinoConfig.transport = {
                target: "pino-pretty",
                options: {
                    colorize: true,
                    translateTime: "SYS:standard",
                    ignore: "pid,hostname",
                    singleLine: false,
                    messageFormat: "[{name}] {msg}"
                }
            };
        }

        this.pino = pino(pinoConfig);
    }

    /**
     * Get the logger for a class or module name.
     */
    static getLog(className: string, config?: LoggerConfig | undefined): Log {
        return new Log(className, config);
    }

    get name(): string {
        return this.className;
    }

    get level(): string {
        return this.pino.level;
    }

    isLoggable(level: LogLevel): boolean {
        return this.pino.isLevelEnabled(this.mapLevel(level));
    }

    isDebug(): boolean {
        return this.pino.isLevelEnabled("debug");
    }

    debug(message: string, context?: Record<string, unknown> | undefined): void {
        this.logWithContext(LogLevel.DEBUG, message, context, undefined);
    }

    /**
     * Log at DEBUG level with a printf-style format string (%s, %d, %j, ...).
     * Arguments are only formatted when debug output is enabled.
     */
    debugFormat(formatStr: string, ...args: unknown[]): void {
        if (this.isDebug()) {
            this.logWithContext(LogLevel.DEBUG, format(formatStr, ...args), undefined, undefined);
        }
    }

    info(message: string, context?: Record<string, unknown> | undefined): void {
        this.logWithContext(LogLevel.INFO, message, context, undefined);
    }

    warn(message: string, context?: Record<string, unknown> | undefined): void {
        this.logWithContext(LogLevel.WARN, message, context, undefined);
    }

    error(message: string, error?: Error | undefined): void {
        this.logWithContext(LogLevel.ERROR, message, undefined, error);
    }

    /**
     * Create child logger with additional bindings.
     */
    child(bindings: Record<string, unknown>): Log {
        const childLogger = new Log(this.className, { level: this.pino.level, pretty: false });
        childLogger.pino = this.pino.child(bindings);
        return childLogger;
    }

    /**
     * Log with structured context.
     */
    logWithContext(
        level: LogLevel,
        message: string,
        context: Record<string, unknown> | undefined,
        error: Error | undefined
    ): void {
        const pinoLevel = this.mapLevel(level);
        if (!this.pino.isLevelEnabled(pinoLevel)) return;

        const logContext: Record<string, unknown> = {
            className: this.className,
            ...(context ?? {})
        };

        if (error !== undefined) {
            logContext.err = error;
        }

        this.pino[pinoLevel](logContext, message);
    }

    private mapLevel(level: LogLevel): PinoLevel {
        switch (level) {
            case LogLevel.DEBUG:
                return "debug";
            case LogLevel.INFO:
                return "info";
            case LogLevel.WARN:
                return "warn";
            case LogLevel.ERROR:
                return "error";
        }
    }
}

/**
 * Factory function to create loggers (convenience wrapper).
 */
export function getLog(className: string, config?: LoggerConfig | undefined): Log {
    return Log.getLog(className, config);
}
