// Integration Layer - Wires configuration, logging, the directory client and the sync engine together
import { GraphDirectoryClientFactory } from './clients/graph-directory-client';
import { DirectoryClientFactory } from './clients/directory-client';
import { ConfigManager, configManager } from './config';
import { DesiredStateSource, FileDesiredStateSource, GroupDesiredStateSource } from './desired-state';
import { ConfigurationError, RetryManager } from './errors';
import { ReconciliationExecutor } from './executor';
import { componentLogger, createLogger, Logger, setLogger } from './logger';
import { SyncOrchestrator } from './orchestrator';
import { AutoSyncOptions, AutoSyncScheduler } from './scheduler';

export interface DesiredStateSelection {
    /** JSON or CSV file; falls back to SYNC_DESIRED_STATE_FILE */
    file?: string;
    /** Every user member of this group should hold `appRoleId` */
    groupId?: string;
    appRoleId?: string;
}

export interface IntegrationOptions {
    config?: ConfigManager;
    logger?: Logger;
    /** Replaces the Microsoft Graph factory, e.g. with an in-process directory */
    clientFactory?: DirectoryClientFactory;
    gracefulShutdownTimeout?: number;
}

/**
 * Builds the sync components from the loaded configuration
 */
export class SystemIntegration {
    private config: ConfigManager;
    private logger: Logger;
    private clientFactory?: DirectoryClientFactory;
    private validated = false;
    private gracefulShutdownTimeout: number;
    private shutdownHandlers: Array<() => Promise<void>> = [];
    private signalHandlersInstalled = false;

    constructor( options: IntegrationOptions = {} ) {
        this.config = options.config ?? configManager;
        this.logger = options.logger ?? createLogger( this.config.getLoggingConfig() );
        this.clientFactory = options.clientFactory;
        this.gracefulShutdownTimeout = options.gracefulShutdownTimeout ?? 30000;

        if ( !options.logger ) {
            setLogger( this.logger );
        }
    }

    get targetAppId(): string {
        return this.config.getAzureConfig().targetAppId;
    }

    /**
     * Fail fast on invalid configuration; warnings are logged
     */
    validate(): void {
        if ( this.validated ) {
            return;
        }

        const validation = this.config.validateConfig();
        for ( const warning of validation.warnings ) {
            this.logger.warn( { warning }, 'Configuration warning' );
        }

        if ( !validation.isValid ) {
            throw new ConfigurationError(
                `Configuration validation failed: ${validation.errors.join( ', ' )}`,
                { errors: validation.errors }
            );
        }

        this.validated = true;
    }

    getClientFactory(): DirectoryClientFactory {
        if ( !this.clientFactory ) {
            this.validate();
            this.clientFactory = new GraphDirectoryClientFactory( this.config.getAzureConfig(), {
                requestTimeoutMs: this.config.getSyncConfig().requestTimeoutMs,
                logger: this.logger
            } );
        }
        return this.clientFactory;
    }

    createDesiredStateSource( selection: DesiredStateSelection = {} ): DesiredStateSource {
        if ( selection.groupId || selection.appRoleId ) {
            if ( !selection.groupId || !selection.appRoleId ) {
                throw new ConfigurationError( 'A group desired state needs both a group id and an app role id' );
            }
            return new GroupDesiredStateSource( selection.groupId, selection.appRoleId );
        }

        const file = selection.file ?? this.config.getSyncConfig().desiredStatePath;
        if ( !file ) {
            throw new ConfigurationError( 'No desired state given: pass a file, a group and role, or set SYNC_DESIRED_STATE_FILE' );
        }
        return new FileDesiredStateSource( file );
    }

    createOrchestrator( selection: DesiredStateSelection = {} ): SyncOrchestrator {
        const desiredState = this.createDesiredStateSource( selection );
        const clientFactory = this.getClientFactory();
        const retryManager = new RetryManager( { ...this.config.getRetryConfig(), logger: this.logger } );

        return new SyncOrchestrator( {
            appId: this.targetAppId,
            clientFactory,
            desiredState,
            retryManager,
            executor: new ReconciliationExecutor( {
                concurrency: this.config.getSyncConfig().concurrency,
                retryManager,
                logger: this.logger
            } ),
            logger: this.logger
        } );
    }

    createScheduler( orchestrator: SyncOrchestrator, options: Partial<AutoSyncOptions> = {} ): AutoSyncScheduler {
        const scheduler = new AutoSyncScheduler( orchestrator, {
            intervalMs: options.intervalMs ?? this.config.getSyncConfig().intervalSeconds * 1000,
            runOptions: options.runOptions,
            onRun: options.onRun,
            logger: this.logger
        } );

        this.onShutdown( () => scheduler.stop() );
        return scheduler;
    }

    onShutdown( handler: () => Promise<void> ): void {
        this.shutdownHandlers.push( handler );
    }

    /**
     * Run shutdown handlers in registration order
     */
    async shutdown(): Promise<void> {
        const handlers = this.shutdownHandlers;
        this.shutdownHandlers = [];

        for ( const handler of handlers ) {
            await handler();
        }
    }

    /**
     * Stop cleanly on SIGINT and SIGTERM
     */
    installSignalHandlers(): void {
        if ( this.signalHandlersInstalled ) {
            return;
        }
        this.signalHandlersInstalled = true;

        const logger = componentLogger( 'shutdown', this.logger );
        const onSignal = ( signal: string ): void => {
            logger.info( { signal }, 'Received signal, shutting down' );

            const forceExit = setTimeout( () => {
                logger.error( 'Graceful shutdown timed out, forcing exit' );
                process.exit( 1 );
            }, this.gracefulShutdownTimeout );

            this.shutdown()
                .then( () => {
                    clearTimeout( forceExit );
                    process.exit( 0 );
                } )
                .catch( ( error: unknown ) => {
                    logger.error( { error: error instanceof Error ? error.message : String( error ) }, 'Error during shutdown' );
                    clearTimeout( forceExit );
                    process.exit( 1 );
                } );
        };

        process.once( 'SIGINT', () => onSignal( 'SIGINT' ) );
        process.once( 'SIGTERM', () => onSignal( 'SIGTERM' ) );
    }
}

let systemIntegration: SystemIntegration | undefined;

/**
 * Process-wide integration built from the default configuration
 */
export function getSystemIntegration(): SystemIntegration {
    if ( !systemIntegration ) {
        systemIntegration = new SystemIntegration();
    }
    return systemIntegration;
}
