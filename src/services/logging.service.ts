// src/services/logging.service.ts
import 'reflect-metadata';
import { singleton, inject } from 'tsyringe';
import pino, { Logger, LoggerOptions, stdTimeFunctions, StreamEntry, Level } from 'pino';
import pretty from 'pino-pretty';
import { ConfigService } from '../config/config.service';
import { getErrorMessageAndStack } from '../utils/errorUtils';

export type LoggerContext = { service?: string; [key: string]: unknown };

/**
 * Owns the application logger. Console output is pretty-printed outside
 * production and plain JSON in production; an optional file destination
 * receives JSON lines.
 */
@singleton()
export class LoggingService {
    private appLoggerInternal: Logger | undefined;
    private fileStream: ReturnType<typeof pino.destination> | undefined;
    private isShuttingDown = false;

    constructor(@inject(ConfigService) private readonly configService: ConfigService) {}

    public getLogger(context?: LoggerContext): Logger {
        const logger = this.appLoggerInternal ?? this.initialize();
        return context ? logger.child(context) : logger;
    }

    private initialize(): Logger {
        const level = this.configService.logLevel;
        const baseOptions: LoggerOptions = {
            level,
            timestamp: stdTimeFunctions.isoTime,
            formatters: { level: (label) => ({ level: label }) },
            base: undefined,
        };

        if (level === 'silent') {
            this.appLoggerInternal = pino(baseOptions);
            return this.appLoggerInternal;
        }

        const streams = this.createStreams(level);
        this.appLoggerInternal = streams.length > 0
            ? pino(baseOptions, pino.multistream(streams))
            : pino(baseOptions);
        this.appLoggerInternal.debug({ service: 'LoggingService', event: 'logger_initialized', streams: streams.length }, 'App logger initialized.');
        return this.appLoggerInternal;
    }

    private createStreams(level: Level): StreamEntry[] {
        const streams: StreamEntry[] = [];

        if (this.configService.logToConsole) {
            if (!this.configService.isProduction) {
                streams.push({
                    level,
                    stream: pretty({ colorize: true, levelFirst: true, translateTime: 'SYS:standard', ignore: 'pid,hostname,service' }),
                });
            } else {
                streams.push({ level, stream: process.stdout });
            }
        }

        if (this.configService.logToFile) {
            const logFilePath = this.configService.appLogFilePath;
            try {
                this.fileStream = pino.destination({ dest: logFilePath, mkdir: true, sync: false });
                streams.push({ level, stream: this.fileStream });
            } catch (error) {
                const { message } = getErrorMessageAndStack(error);
                console.error(`[LoggingService:CreateStreams] Failed to open log file "${logFilePath}": "${message}". File logging disabled.`);
            }
        }
        return streams;
    }

    /** Flushes pending log lines and closes the file destination, if any. */
    public flushLogsAndClose(): void {
        if (this.isShuttingDown) {
            return;
        }
        this.isShuttingDown = true;
        this.appLoggerInternal?.flush();
        this.fileStream?.end();
        this.fileStream = undefined;
    }
}
