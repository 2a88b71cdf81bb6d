export * from './api/index.js';
export * from './browser/index.js';
export * from './config/index.js';
export { SignupDriver } from './engine/SignupDriver.js';
export type {
  OutcomeMarker,
  OutcomeStatus,
  SignupDriverDeps,
  SignupOutcome,
  SignupTarget,
} from './engine/SignupDriver.js';
export {
  classifyPage,
  looksLikeCaptcha,
  looksLikeProtection,
  looksLikeSuccess,
} from './detection/PageClassifier.js';
export type { Classification, PageSnapshot, PageVerdict } from './detection/PageClassifier.js';
export * from './errors.js';
export { ArtifactStore } from './jobs/ArtifactStore.js';
export type { ScreenshotKind } from './jobs/ArtifactStore.js';
export { JobLog } from './jobs/JobLog.js';
export type { JobLogSink, LogEntry } from './jobs/JobLog.js';
export { JobOrchestrator } from './jobs/JobOrchestrator.js';
export type { JobOrchestratorDeps, SubmitJobInput, SubmitJobResult } from './jobs/JobOrchestrator.js';
export * from './jobs/types.js';
export { Logger, getLogger } from './monitoring/logger.js';
export { SessionRegistry } from './sessions/SessionRegistry.js';
export { generateCredentials, generateEmail, generatePassword } from './utils/credentials.js';
export type { Credentials } from './utils/credentials.js';
export { WorkerPool } from './workers/WorkerPool.js';
export type { WorkerPoolStats } from './workers/WorkerPool.js';
