// Configuration Management for principal-sync
import { config as dotenvxConfig } from '@dotenvx/dotenvx';
import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: LogLevel[] = [ 'debug', 'info', 'warn', 'error', 'silent' ];

export interface AzureConfig {
    tenantId: string;
    clientId: string;
    clientSecret: string;
    /** Application whose service principal is reconciled; defaults to clientId */
    targetAppId: string;
    authorityHost: string;
}

export interface SyncConfig {
    desiredStatePath?: string;
    concurrency: number;
    requestTimeoutMs: number;
    intervalSeconds: number;
}

export interface LoggingConfig {
    level: LogLevel;
    file?: string;
    enableConsole: boolean;
}

export interface RetryConfig {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    exponentialBackoff: boolean;
}

export interface ToolConfig {
    azure: AzureConfig;
    sync: SyncConfig;
    logging: LoggingConfig;
    retry: RetryConfig;
}

export interface PartialToolConfig {
    azure?: Partial<AzureConfig>;
    sync?: Partial<SyncConfig>;
    logging?: Partial<LoggingConfig>;
    retry?: Partial<RetryConfig>;
}

export interface ConfigValidationResult {
    isValid: boolean;
    errors: string[];
    warnings: string[];
}

export const USER_CONFIG_DIR = '.principal-sync';

/** Longest auto-sync interval a Node.js timer can wait */
export const MAX_INTERVAL_SECONDS = 2147483;

/**
 * Configuration manager that supports multiple sources:
 * 1. Environment variables
 * 2. Configuration files (.env, config.json)
 * 3. Default values
 */
export class ConfigManager {
    private config: ToolConfig;
    private configSources: string[] = [];

    constructor( options: { skipEnvLoad?: boolean; skipConfigFiles?: boolean } = {} ) {
        this.config = this.loadConfiguration( options.skipEnvLoad, options.skipConfigFiles );
    }

    /**
     * Load configuration from multiple sources in priority order:
     * 1. Environment variables (highest priority)
     * 2. Local config file (./config.json)
     * 3. User config file (~/.principal-sync/config.json)
     * 4. Default values (lowest priority)
     */
    private loadConfiguration( skipEnvLoad = false, skipConfigFiles = false ): ToolConfig {
        if ( !skipEnvLoad ) {
            this.loadEnvironmentFiles();
        }

        let config = this.getDefaultConfig();
        this.configSources.push( 'defaults' );

        if ( !skipConfigFiles ) {
            const candidates = [
                { label: 'user config', path: join( homedir(), USER_CONFIG_DIR, 'config.json' ) },
                { label: 'local config', path: join( process.cwd(), 'config.json' ) }
            ];

            for ( const candidate of candidates ) {
                if ( !existsSync( candidate.path ) ) continue;

                try {
                    const fileConfig: PartialToolConfig = JSON.parse( readFileSync( candidate.path, 'utf-8' ) );
                    config = this.mergeConfigs( config, fileConfig );
                    this.configSources.push( `${candidate.label} (${candidate.path})` );
                } catch ( error ) {
                    console.warn( `Warning: Failed to load ${candidate.label} from ${candidate.path}: ${error instanceof Error ? error.message : 'Unknown error'}` );
                }
            }
        }

        config = this.applyEnvironmentVariables( config );
        this.configSources.push( 'environment variables' );

        if ( !config.azure.targetAppId ) {
            config.azure.targetAppId = config.azure.clientId;
        }

        return config;
    }

    /**
     * Load environment files, later files overriding earlier ones:
     * 1. User home directory (~/.principal-sync/.env)
     * 2. Current working directory (.env, .env.local)
     *
     * Supports encrypted .env files via dotenvx
     */
    private loadEnvironmentFiles(): void {
        const envPaths = [
            join( homedir(), USER_CONFIG_DIR, '.env' ),
            join( process.cwd(), '.env' ),
            join( process.cwd(), '.env.local' )
        ];

        for ( const envPath of envPaths ) {
            if ( !existsSync( envPath ) ) continue;

            try {
                // dotenvx decrypts when .env.keys is present
                dotenvxConfig( { path: envPath, override: true, quiet: true } );
                this.configSources.push( `env file (${envPath})` );

                if ( readFileSync( envPath, 'utf-8' ).includes( 'DOTENV_PUBLIC_KEY' ) ) {
                    this.configSources.push( `encrypted env file (${envPath})` );
                }
            } catch ( error ) {
                console.warn( `Warning: Failed to load environment file ${envPath}: ${error instanceof Error ? error.message : 'Unknown error'}` );
            }
        }
    }

    private getDefaultConfig(): ToolConfig {
        return {
            azure: {
                tenantId: '',
                clientId: '',
                clientSecret: '',
                targetAppId: '',
                authorityHost: 'https://login.microsoftonline.com'
            },
            sync: {
                concurrency: 4,
                requestTimeoutMs: 30000,
                intervalSeconds: 3600
            },
            logging: {
                level: 'info',
                enableConsole: true
            },
            retry: {
                maxAttempts: 3,
                baseDelayMs: 500,
                maxDelayMs: 8000,
                exponentialBackoff: true
            }
        };
    }

    private applyEnvironmentVariables( config: ToolConfig ): ToolConfig {
        const env = process.env;

        if ( env.AZURE_TENANT_ID ) config.azure.tenantId = env.AZURE_TENANT_ID;
        if ( env.AZURE_CLIENT_ID ) config.azure.clientId = env.AZURE_CLIENT_ID;
        if ( env.AZURE_CLIENT_SECRET ) config.azure.clientSecret = env.AZURE_CLIENT_SECRET;
        if ( env.AZURE_TARGET_APP_ID ) config.azure.targetAppId = env.AZURE_TARGET_APP_ID;
        if ( env.AZURE_AUTHORITY_HOST ) config.azure.authorityHost = env.AZURE_AUTHORITY_HOST;

        if ( env.SYNC_DESIRED_STATE_FILE ) config.sync.desiredStatePath = env.SYNC_DESIRED_STATE_FILE;
        config.sync.concurrency = this.readPositiveInt( env.SYNC_CONCURRENCY, config.sync.concurrency );
        config.sync.requestTimeoutMs = this.readPositiveInt( env.SYNC_REQUEST_TIMEOUT_MS, config.sync.requestTimeoutMs );
        config.sync.intervalSeconds = this.readPositiveInt( env.SYNC_INTERVAL_SECONDS, config.sync.intervalSeconds );

        const level = LOG_LEVELS.find( candidate => candidate === env.LOG_LEVEL );
        if ( level ) config.logging.level = level;
        if ( env.LOG_FILE ) config.logging.file = env.LOG_FILE;
        if ( env.LOG_CONSOLE ) config.logging.enableConsole = env.LOG_CONSOLE.toLowerCase() === 'true';

        config.retry.maxAttempts = this.readPositiveInt( env.RETRY_MAX_ATTEMPTS, config.retry.maxAttempts );
        config.retry.baseDelayMs = this.readPositiveInt( env.RETRY_BASE_DELAY_MS, config.retry.baseDelayMs );
        config.retry.maxDelayMs = this.readPositiveInt( env.RETRY_MAX_DELAY_MS, config.retry.maxDelayMs );
        if ( env.RETRY_EXPONENTIAL_BACKOFF ) {
            config.retry.exponentialBackoff = env.RETRY_EXPONENTIAL_BACKOFF.toLowerCase() === 'true';
        }

        return config;
    }

    private readPositiveInt( raw: string | undefined, fallback: number ): number {
        if ( !raw ) return fallback;
        const value = parseInt( raw, 10 );
        return !isNaN( value ) && value > 0 ? value : fallback;
    }

    /**
     * Merge two configuration objects, with the second taking priority
     */
    private mergeConfigs( base: ToolConfig, override: PartialToolConfig ): ToolConfig {
        return {
            azure: { ...base.azure, ...override.azure },
            sync: { ...base.sync, ...override.sync },
            logging: { ...base.logging, ...override.logging },
            retry: { ...base.retry, ...override.retry }
        };
    }

    getConfig(): ToolConfig {
        return this.mergeConfigs( this.config, {} );
    }

    getAzureConfig(): AzureConfig {
        return { ...this.config.azure };
    }

    getSyncConfig(): SyncConfig {
        return { ...this.config.sync };
    }

    getLoggingConfig(): LoggingConfig {
        return { ...this.config.logging };
    }

    getRetryConfig(): RetryConfig {
        return { ...this.config.retry };
    }

    validateConfig(): ConfigValidationResult {
        const errors: string[] = [];
        const warnings: string[] = [];
        const guid = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

        if ( !this.config.azure.tenantId ) {
            errors.push( 'Azure Tenant ID is required (AZURE_TENANT_ID)' );
        }
        if ( !this.config.azure.clientId ) {
            errors.push( 'Azure Client ID is required (AZURE_CLIENT_ID)' );
        }
        if ( !this.config.azure.clientSecret ) {
            errors.push( 'Azure Client Secret is required (AZURE_CLIENT_SECRET)' );
        }
        if ( this.config.azure.targetAppId && !guid.test( this.config.azure.targetAppId ) ) {
            errors.push( `Target application ID must be a GUID: ${this.config.azure.targetAppId}` );
        }

        if ( this.config.retry.maxAttempts < 1 ) {
            errors.push( 'Retry max attempts must be at least 1' );
        }
        if ( this.config.retry.maxDelayMs < this.config.retry.baseDelayMs ) {
            errors.push( 'Retry max delay must be greater than or equal to base delay' );
        }
        if ( this.config.sync.intervalSeconds > MAX_INTERVAL_SECONDS ) {
            errors.push( `Sync interval must not exceed ${MAX_INTERVAL_SECONDS} seconds (SYNC_INTERVAL_SECONDS), got ${this.config.sync.intervalSeconds}` );
        }
        if ( this.config.sync.concurrency > 20 ) {
            warnings.push( `Concurrency of ${this.config.sync.concurrency} is likely to be throttled by Microsoft Graph` );
        }
        if ( this.config.logging.level !== 'silent' && !this.config.logging.enableConsole && !this.config.logging.file ) {
            warnings.push( 'Console logging is disabled and no log file is set; logs will be discarded' );
        }

        return {
            isValid: errors.length === 0,
            errors,
            warnings
        };
    }

    getConfigSources(): string[] {
        return [ ...this.configSources ];
    }

    createConfigTemplate(): string {
        const template = {
            azure: {
                tenantId: 'your-azure-tenant-id',
                clientId: 'your-azure-client-id',
                clientSecret: 'your-azure-client-secret',
                targetAppId: 'application-id-to-reconcile'
            },
            sync: {
                desiredStatePath: './desired-assignments.json',
                concurrency: 4,
                requestTimeoutMs: 30000,
                intervalSeconds: 3600
            },
            logging: {
                level: 'info',
                enableConsole: true,
                file: 'principal-sync.log'
            },
            retry: {
                maxAttempts: 3,
                baseDelayMs: 500,
                maxDelayMs: 8000,
                exponentialBackoff: true
            }
        };

        return JSON.stringify( template, null, 2 );
    }

    createEnvTemplate(): string {
        return `# Azure AD Configuration
AZURE_TENANT_ID=your-azure-tenant-id
AZURE_CLIENT_ID=your-azure-client-id
AZURE_CLIENT_SECRET=your-azure-client-secret
AZURE_TARGET_APP_ID=application-id-to-reconcile

# Sync Configuration (Optional)
SYNC_DESIRED_STATE_FILE=./desired-assignments.json
SYNC_CONCURRENCY=4
SYNC_REQUEST_TIMEOUT_MS=30000
SYNC_INTERVAL_SECONDS=3600

# Logging Configuration (Optional)
LOG_LEVEL=info
LOG_FILE=principal-sync.log
LOG_CONSOLE=true

# Retry Configuration (Optional)
RETRY_MAX_ATTEMPTS=3
RETRY_BASE_DELAY_MS=500
RETRY_MAX_DELAY_MS=8000
RETRY_EXPONENTIAL_BACKOFF=true
`;
    }

    /**
     * Get masked configuration for safe logging/display
     */
    getMaskedConfig(): ToolConfig {
        const masked = this.getConfig();

        if ( masked.azure.clientSecret ) {
            masked.azure.clientSecret = '***masked***';
        }

        return masked;
    }
}

// Export singleton instance
export const configManager = new ConfigManager();

// Export convenience functions
export const getConfig = () => configManager.getConfig();
export const getAzureConfig = () => configManager.getAzureConfig();
export const getSyncConfig = () => configManager.getSyncConfig();
export const getLoggingConfig = () => configManager.getLoggingConfig();
export const getRetryConfig = () => configManager.getRetryConfig();
export const validateConfig = () => configManager.validateConfig();
