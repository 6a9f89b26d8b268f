// Error handling for principal-sync
import { getRetryConfig } from '../config';
import { componentLogger, Logger } from '../logger';
import { ErrorKind } from '../types';

/**
 * Base error class for all principal-sync errors
 */
export abstract class PrincipalSyncError extends Error {
    public abstract readonly kind: ErrorKind;
    public readonly code: string;
    public readonly timestamp: Date;
    public readonly context?: Record<string, unknown>;
    public readonly retryable: boolean;
    public readonly userMessage: string;

    constructor(
        message: string,
        code: string,
        userMessage?: string,
        retryable: boolean = false,
        context?: Record<string, unknown>
    ) {
        super( message );
        this.name = this.constructor.name;
        this.code = code;
        this.timestamp = new Date();
        this.context = context;
        this.retryable = retryable;
        this.userMessage = userMessage || message;

        if ( Error.captureStackTrace ) {
            Error.captureStackTrace( this, this.constructor );
        }
    }

    /**
     * Get formatted error message for user display
     */
    getDisplayMessage(): string {
        return `[${this.code}] ${this.userMessage}`;
    }

    /**
     * Get detailed error information for logging
     */
    getDetailedInfo(): Record<string, unknown> {
        return {
            name: this.name,
            kind: this.kind,
            code: this.code,
            message: this.message,
            userMessage: this.userMessage,
            timestamp: this.timestamp.toISOString(),
            retryable: this.retryable,
            context: this.context,
            stack: this.stack
        };
    }
}

/**
 * Missing or invalid configuration or desired-state input. Aborts a run before any directory call.
 */
export class ConfigurationError extends PrincipalSyncError {
    public readonly kind = 'ConfigError';

    constructor( message: string, context?: Record<string, unknown> ) {
        super(
            message,
            'CONFIG_ERROR',
            `Configuration error: ${message}. Please check your environment variables, config files or desired-state input.`,
            false,
            context
        );
    }
}

/**
 * Credential or permission problem. Fatal to the run.
 */
export class AuthError extends PrincipalSyncError {
    public readonly kind = 'AuthError';

    constructor( message: string, code: string = 'AZURE_AUTH_FAILED', context?: Record<string, unknown> ) {
        super( message, code, AuthError.getUserMessage( code, message ), false, context );
    }

    private static getUserMessage( code: string, message: string ): string {
        switch ( code ) {
            case 'AZURE_AUTH_FAILED':
                return 'Azure authentication failed. Please check your Azure credentials (tenant ID, client ID, and client secret).';
            case 'AZURE_UNAUTHORIZED':
                return 'Microsoft Graph rejected the access token. Please check that the client secret is still valid.';
            case 'AZURE_PERMISSION_DENIED':
                return 'Permission denied in Azure AD. Please ensure the application has AppRoleAssignment.ReadWrite.All and Application.Read.All.';
            case 'DIRECTORY_SESSION_CLOSED':
                return 'The directory session was used after the run ended.';
            default:
                return `Azure AD authentication error: ${message}`;
        }
    }
}

/**
 * Network failure, timeout, throttling or 5xx. Retried with backoff.
 */
export class TransientError extends PrincipalSyncError {
    public readonly kind = 'TransientError';

    constructor( message: string, code: string = 'AZURE_SERVICE_UNAVAILABLE', context?: Record<string, unknown> ) {
        super( message, code, TransientError.getUserMessage( code, message ), true, context );
    }

    private static getUserMessage( code: string, message: string ): string {
        switch ( code ) {
            case 'AZURE_RATE_LIMITED':
                return 'Azure AD API rate limit exceeded. Please wait a moment and try again.';
            case 'AZURE_SERVICE_UNAVAILABLE':
                return 'Azure AD service is temporarily unavailable. Please try again later.';
            case 'TIMEOUT_ERROR':
                return `Directory call timed out: ${message}`;
            case 'NETWORK_ERROR':
                return `Network error while calling the directory: ${message}`;
            default:
                return `Temporary Azure AD error: ${message}`;
        }
    }
}

/**
 * Grant of an assignment that already exists
 */
export class ConflictError extends PrincipalSyncError {
    public readonly kind = 'ConflictError';

    constructor( message: string, context?: Record<string, unknown> ) {
        super( message, 'ASSIGNMENT_ALREADY_EXISTS', `Assignment already exists: ${message}`, false, context );
    }
}

/**
 * Directory object absent (revoke target, service principal, group or user)
 */
export class NotFoundError extends PrincipalSyncError {
    public readonly kind = 'NotFoundError';

    constructor( message: string, code: string = 'AZURE_NOT_FOUND', context?: Record<string, unknown> ) {
        super( message, code, `Not found in Azure AD: ${message}`, false, context );
    }
}

/**
 * Any other non-retryable answer from the directory
 */
export class RequestError extends PrincipalSyncError {
    public readonly kind = 'RequestError';

    constructor( message: string, code: string = 'AZURE_REQUEST_FAILED', context?: Record<string, unknown> ) {
        super( message, code, `Azure AD request failed: ${message}`, false, context );
    }
}

export type RunAbortReason = 'RUN_IN_PROGRESS' | 'FULL_REVOKE_NOT_CONFIRMED' | 'RUN_CANCELLED';

/**
 * Run stopped by the orchestrator itself before mutation
 */
export class RunAbortedError extends PrincipalSyncError {
    public readonly kind = 'RunAborted';
    public readonly reason: RunAbortReason;

    constructor( reason: RunAbortReason, context?: Record<string, unknown> ) {
        const message = RunAbortedError.getMessage( reason );
        super( message, reason, message, false, context );
        this.reason = reason;
    }

    private static getMessage( reason: RunAbortReason ): string {
        switch ( reason ) {
            case 'RUN_IN_PROGRESS':
                return 'Another sync run is already in progress for this application.';
            case 'FULL_REVOKE_NOT_CONFIRMED':
                return 'Desired state is empty and would revoke every assignment. Re-run with full revoke confirmed if this is intended.';
            case 'RUN_CANCELLED':
                return 'Sync run was cancelled before applying changes.';
        }
    }
}

/**
 * Retry configuration and logic
 */
export interface RetryOptions {
    maxAttempts?: number;
    baseDelayMs?: number;
    maxDelayMs?: number;
    exponentialBackoff?: boolean;
    logger?: Logger;
}

export interface RetryOutcome<T> {
    value: T;
    attempts: number;
}

/**
 * Error raised after the final attempt, with the number of attempts made
 */
export class RetryExhaustedError extends Error {
    constructor( public readonly lastError: PrincipalSyncError, public readonly attempts: number ) {
        super( lastError.message );
        this.name = 'RetryExhaustedError';
    }
}

/**
 * Retry utility class: bounded exponential backoff with jitter
 */
export class RetryManager {
    private options: Required<Omit<RetryOptions, 'logger'>>;
    private logger: Logger;

    constructor( options?: RetryOptions ) {
        const config = getRetryConfig();
        this.options = {
            maxAttempts: options?.maxAttempts ?? config.maxAttempts,
            baseDelayMs: options?.baseDelayMs ?? config.baseDelayMs,
            maxDelayMs: options?.maxDelayMs ?? config.maxDelayMs,
            exponentialBackoff: options?.exponentialBackoff ?? config.exponentialBackoff
        };
        this.logger = options?.logger ?? componentLogger( 'retry' );
    }

    /**
     * Execute a function with retry logic
     */
    async execute<T>( operation: () => Promise<T>, operationName: string = 'operation' ): Promise<T> {
        try {
            const outcome = await this.executeWithAttempts( operation, operationName );
            return outcome.value;
        } catch ( error ) {
            throw error instanceof RetryExhaustedError ? error.lastError : error;
        }
    }

    /**
     * Execute a function with retry logic, reporting the attempt count.
     * Failures are normalized and rethrown as RetryExhaustedError.
     */
    async executeWithAttempts<T>( operation: () => Promise<T>, operationName: string = 'operation' ): Promise<RetryOutcome<T>> {
        let attempt = 0;

        for ( ; ; ) {
            attempt++;

            try {
                return { value: await operation(), attempts: attempt };
            } catch ( error ) {
                const classified = ErrorHandler.normalize( error );
                const isLastAttempt = attempt >= this.options.maxAttempts;

                if ( !classified.retryable || isLastAttempt ) {
                    throw new RetryExhaustedError( classified, attempt );
                }

                const delay = this.calculateDelay( attempt );
                this.logger.warn(
                    { operation: operationName, attempt, maxAttempts: this.options.maxAttempts, delayMs: delay, code: classified.code },
                    `${operationName} failed (attempt ${attempt}/${this.options.maxAttempts}): ${classified.message}. Retrying in ${delay}ms`
                );

                await this.sleep( delay );
            }
        }
    }

    /**
     * Calculate delay for retry attempt
     */
    calculateDelay( attempt: number ): number {
        if ( !this.options.exponentialBackoff ) {
            return Math.min( this.options.baseDelayMs, this.options.maxDelayMs );
        }

        const exponentialDelay = this.options.baseDelayMs * Math.pow( 2, attempt - 1 );
        const jitter = Math.random() * 0.1 * exponentialDelay;

        return Math.min( Math.round( exponentialDelay + jitter ), this.options.maxDelayMs );
    }

    private sleep( ms: number ): Promise<void> {
        return new Promise( resolve => setTimeout( resolve, ms ) );
    }
}

const TRANSIENT_STATUS_CODES = [ 408, 429, 500, 502, 503, 504 ];

const NETWORK_ERROR_PATTERNS = [
    'fetch failed',
    'econnreset',
    'econnrefused',
    'etimedout',
    'enotfound',
    'socket hang up',
    'network error'
];

// MSAL error codes raised when the token endpoint cannot be reached
const TOKEN_NETWORK_ERROR_CODES = [ 'network_error', 'endpoints_resolution_error' ];

function readProperty( source: unknown, key: string ): unknown {
    if ( typeof source === 'object' && source !== null && key in source ) {
        const value: unknown = Reflect.get( source, key );
        return value;
    }
    return undefined;
}

function readString( source: unknown, key: string ): string | undefined {
    const value = readProperty( source, key );
    return typeof value === 'string' ? value : undefined;
}

/**
 * Error handler utility functions
 */
export class ErrorHandler {
    /**
     * Handle and format errors for CLI display, then exit with the fatal code
     */
    static handleError( error: unknown, context?: string ): never {
        const displayError = ErrorHandler.normalize( error );

        componentLogger( 'cli' ).error( { error: displayError.getDetailedInfo(), context }, displayError.message );

        console.error( `\nError: ${displayError.getDisplayMessage()}` );

        if ( displayError.retryable ) {
            console.error( 'This error may be temporary. Please try again.' );
        }

        if ( context ) {
            console.error( `Context: ${context}` );
        }

        process.exit( 1 );
    }

    /**
     * Classify any thrown value as a PrincipalSyncError
     */
    static normalize( error: unknown, context?: Record<string, unknown> ): PrincipalSyncError {
        if ( error instanceof PrincipalSyncError ) {
            return error;
        }
        if ( readProperty( error, 'statusCode' ) !== undefined ) {
            return ErrorHandler.fromGraphError( error, context );
        }

        const message = error instanceof Error ? error.message : String( error );
        const lowered = message.toLowerCase();
        if ( NETWORK_ERROR_PATTERNS.some( pattern => lowered.includes( pattern ) ) ) {
            return new TransientError( message, 'NETWORK_ERROR', context );
        }

        return new RequestError( `An unexpected error occurred: ${message}`, 'UNEXPECTED_ERROR', {
            ...context,
            originalError: error instanceof Error ? error.name : typeof error
        } );
    }

    /**
     * Create error from a Microsoft Graph client error
     */
    static fromGraphError( error: unknown, context?: Record<string, unknown> ): PrincipalSyncError {
        const statusValue = readProperty( error, 'statusCode' );
        const statusCode = typeof statusValue === 'number' ? statusValue : undefined;
        const graphCode = readString( error, 'code' ) ?? 'Unknown';
        const message = readString( error, 'message' ) || 'Unknown Azure error';
        const details = {
            ...context,
            statusCode,
            azureErrorCode: graphCode,
            azureRequestId: readString( error, 'requestId' )
        };

        if ( statusCode === 401 ) {
            return new AuthError( message, 'AZURE_UNAUTHORIZED', details );
        }
        if ( statusCode === 403 ) {
            return new AuthError( message, 'AZURE_PERMISSION_DENIED', details );
        }
        if ( statusCode === 404 ) {
            return new NotFoundError( message, 'AZURE_NOT_FOUND', details );
        }
        if ( statusCode === 409 || ( statusCode === 400 && message.toLowerCase().includes( 'already exists' ) ) ) {
            return new ConflictError( message, details );
        }
        if ( statusCode === 429 ) {
            return new TransientError( message, 'AZURE_RATE_LIMITED', details );
        }
        if ( statusCode === undefined || statusCode === -1 ) {
            return new TransientError( message, 'NETWORK_ERROR', details );
        }
        if ( TRANSIENT_STATUS_CODES.includes( statusCode ) ) {
            return new TransientError( message, 'AZURE_SERVICE_UNAVAILABLE', details );
        }

        return new RequestError( message, `AZURE_${graphCode.toUpperCase()}`, details );
    }

    /**
     * Create error from an MSAL token acquisition failure.
     * Unreachable or overloaded token endpoints are transient; everything else is a credential problem.
     */
    static fromTokenError( error: unknown, context?: Record<string, unknown> ): PrincipalSyncError {
        const reason = readString( error, 'message' ) || 'Unknown error';
        const message = `Failed to acquire access token: ${reason}`;
        const errorCode = readString( error, 'errorCode' );
        const statusValue = readProperty( error, 'status' );
        const status = typeof statusValue === 'number' ? statusValue : undefined;
        const details = { ...context, msalErrorCode: errorCode, status };

        if ( status === 429 ) {
            return new TransientError( message, 'AZURE_RATE_LIMITED', details );
        }
        if ( status !== undefined && status >= 500 ) {
            return new TransientError( message, 'AZURE_SERVICE_UNAVAILABLE', details );
        }

        const lowered = reason.toLowerCase();
        if (
            ( errorCode !== undefined && TOKEN_NETWORK_ERROR_CODES.includes( errorCode ) ) ||
            NETWORK_ERROR_PATTERNS.some( pattern => lowered.includes( pattern ) )
        ) {
            return new TransientError( message, 'NETWORK_ERROR', details );
        }

        return new AuthError( message, 'AZURE_AUTH_FAILED', details );
    }
}

/**
 * Validation utilities
 */
export class ValidationUtils {
    private static readonly GUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

    static isGuid( value: string ): boolean {
        return ValidationUtils.GUID_PATTERN.test( value );
    }

    /**
     * Validate directory object id format
     */
    static validateGuid( value: string, label: string ): void {
        if ( !ValidationUtils.isGuid( value ) ) {
            throw new ConfigurationError( `Invalid ${label}: ${value}. Expected a GUID` );
        }
    }

    /**
     * Validate and normalize principal type (case-insensitive)
     */
    static parsePrincipalType( value: string ): 'User' | 'Group' {
        const lowered = value.trim().toLowerCase();
        if ( lowered === 'user' ) return 'User';
        if ( lowered === 'group' ) return 'Group';
        throw new ConfigurationError( `Invalid principal type: ${value}. Must be one of: User, Group` );
    }
}
