// src/container.ts
import 'reflect-metadata';
import { container } from 'tsyringe';

// --- Core Application Services and Configurations ---
import { ConfigService } from './config/config.service';
import { LoggingService } from './services/logging.service';
import { TaskQueueService } from './services/taskQueue.service';

// --- Audit Services ---
import { ProfilingService } from './services/audit/profiling.service';
import { DriftDetectionService } from './services/audit/driftDetection.service';
import { RuleEvaluationService } from './services/audit/ruleEvaluation.service';
import { ExplanationService } from './services/audit/explanation.service';
import { ExpectationLoaderService } from './services/audit/expectationLoader.service';
import { AuditOrchestratorService } from './services/audit/auditOrchestrator.service';

/**
 * Configure the Tsyringe IoC container by registering all application services.
 */

// --- 1. Register Core Application Services (Singletons) ---
container.registerSingleton(ConfigService);
container.registerSingleton(LoggingService);
container.registerSingleton(TaskQueueService);

// --- 2. Register Audit Services (Singletons) ---
container.registerSingleton(ProfilingService);
container.registerSingleton(DriftDetectionService);
container.registerSingleton(RuleEvaluationService);
container.registerSingleton(ExplanationService);
container.registerSingleton(ExpectationLoaderService);
container.registerSingleton(AuditOrchestratorService);

/**
 * Exports the configured Tsyringe container instance.
 */
export default container;
