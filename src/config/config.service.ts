// src/config/config.service.ts
import 'reflect-metadata';
import { singleton } from 'tsyringe';
import dotenv from 'dotenv';

import { envSchema } from './schemas';
import { AppConfig } from './types';
import { DriftOptions, EvaluationOptions, ExplanationOptions, ProfilingOptions } from '../types';
import { ConfigError } from '../utils/errors';

import { AppConfiguration } from './app.config';
import { ProfilingConfiguration } from './profiling.config';
import { DriftConfiguration } from './drift.config';
import { RuleConfiguration } from './rules.config';

/**
 * Loads `.env`, validates the environment once and exposes it through the
 * specialized configuration classes. Invalid settings raise `ConfigError`.
 */
@singleton()
export class ConfigService {
    public readonly rawConfig: AppConfig;

    public readonly appConfiguration: AppConfiguration;
    private readonly profilingConfiguration: ProfilingConfiguration;
    private readonly driftConfiguration: DriftConfiguration;
    private readonly ruleConfiguration: RuleConfiguration;

    constructor() {
        dotenv.config();

        const parsedEnv = envSchema.safeParse(process.env);
        if (!parsedEnv.success) {
            throw new ConfigError(
                'Invalid environment variables',
                parsedEnv.error.issues.map(issue => `${issue.path.join('.') || '<env>'}: ${issue.message}`)
            );
        }
        this.rawConfig = parsedEnv.data;

        this.appConfiguration = new AppConfiguration(this.rawConfig);
        this.profilingConfiguration = new ProfilingConfiguration(this.rawConfig);
        this.driftConfiguration = new DriftConfiguration(this.rawConfig);
        this.ruleConfiguration = new RuleConfiguration(this.rawConfig);
    }

    // --- Delegated Getters from AppConfiguration ---
    get nodeEnv() { return this.appConfiguration.nodeEnv; }

    public get isProduction(): boolean {
        return this.appConfiguration.nodeEnv === 'production';
    }

    get logLevel() { return this.appConfiguration.logLevel; }
    get logToConsole() { return this.appConfiguration.logToConsole; }
    get logToFile() { return this.appConfiguration.logToFile; }
    get logsDirectory(): string { return this.appConfiguration.logsDirectoryPath; }
    get appLogFilePath(): string { return this.appConfiguration.appLogFilePath; }

    // --- Delegated Getters from the audit configuration classes ---
    get profilingOptions(): Readonly<ProfilingOptions> { return this.profilingConfiguration.options; }
    get driftOptions(): Readonly<DriftOptions> { return this.driftConfiguration.options; }
    get evaluationOptions(): Readonly<EvaluationOptions> { return this.ruleConfiguration.evaluation; }
    get explanationOptions(): Readonly<ExplanationOptions> { return this.ruleConfiguration.explanation; }
}
