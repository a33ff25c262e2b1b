// src/config/app.config.ts
import path from 'path';
import { LevelWithSilent } from 'pino';
import { AppConfig } from './types';

export class AppConfiguration {
    public readonly nodeEnv: 'development' | 'production' | 'test';
    public readonly logLevel: LevelWithSilent;
    public readonly logToConsole: boolean;
    public readonly logToFile: boolean;
    public readonly logsDirectoryPath: string;
    public readonly appLogFileName: string;

    constructor(appConfig: AppConfig) {
        this.nodeEnv = appConfig.NODE_ENV;
        this.logLevel = appConfig.LOG_LEVEL;
        this.logToConsole = appConfig.LOG_TO_CONSOLE;
        this.logToFile = appConfig.LOG_TO_FILE;
        this.logsDirectoryPath = path.resolve(appConfig.LOGS_DIRECTORY);
        this.appLogFileName = appConfig.APP_LOG_FILE_NAME;
    }

    get appLogFilePath(): string {
        return path.join(this.logsDirectoryPath, this.appLogFileName);
    }
}
