// Main entry point for principal-sync
export * from './types';
export * from './clients/directory-client';
export * from './clients/graph-directory-client';
export * from './desired-state';
export * from './differ';
export * from './executor';
export * from './orchestrator';
export * from './scheduler';
export * from './principals';
export * from './reporter';
export * from './integration';

export {
    ConfigManager,
    configManager,
    getConfig,
    getAzureConfig,
    getSyncConfig,
    getLoggingConfig,
    getRetryConfig,
    validateConfig,
    type AzureConfig,
    type SyncConfig,
    type LoggingConfig,
    type RetryConfig,
    type ToolConfig
} from './config';

export {
    createLogger,
    getLogger,
    setLogger,
    type Logger
} from './logger';

export {
    ErrorHandler,
    ValidationUtils,
    RetryManager,
    RetryExhaustedError,
    PrincipalSyncError,
    ConfigurationError,
    AuthError,
    TransientError,
    ConflictError,
    NotFoundError,
    RequestError,
    RunAbortedError,
    type RunAbortReason
} from './errors';
