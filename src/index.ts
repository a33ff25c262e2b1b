// src/index.ts
import 'reflect-metadata';
import container from './container';

export { container };
export * from './types';

export { ConfigService } from './config/config.service';
export { LoggingService } from './services/logging.service';
export { ProfilingService, ProfileCallOptions } from './services/audit/profiling.service';
export { DriftDetectionService } from './services/audit/driftDetection.service';
export { RuleEvaluationService } from './services/audit/ruleEvaluation.service';
export { ExplanationService } from './services/audit/explanation.service';
export { ExpectationLoaderService } from './services/audit/expectationLoader.service';
export { AuditOrchestratorService, AuditRequest } from './services/audit/auditOrchestrator.service';

export { MemoryTabularSource } from './sources/memory.source';
export { CsvFileSource, CsvFileSourceOptions } from './sources/csvFile.source';

export { profileDataset, ProfileRunControl } from './utils/profiling/profileDataset';
export { diffProfiles } from './utils/drift/diffProfiles';
export { evaluateRule } from './utils/rules/evaluateRule';
export { evaluateGroups, computeOutcome } from './utils/rules/groups.utils';
export { parseExpectationSet } from './utils/rules/expectationSchema';
export { explainResult } from './utils/explanation/explainResult';
export { AuditError, AuditErrorCode, ConfigError, ProfilingCancelledError, isAuditError } from './utils/errors';
