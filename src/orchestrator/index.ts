// Sync Orchestrator - drives one reconciliation run through its states
import { v4 as uuidv4 } from 'uuid';
import { DirectoryClient, DirectoryClientFactory } from '../clients/directory-client';
import { DesiredStateSource } from '../desired-state';
import { StateDiffer } from '../differ';
import { ErrorHandler, PrincipalSyncError, RetryManager, RunAbortedError } from '../errors';
import { ReconciliationExecutor } from '../executor';
import { componentLogger, Logger } from '../logger';
import { Assignment, Delta, ReconciliationReport, SyncMode, SyncState } from '../types';
import { AppRunLock, defaultRunLock } from './run-lock';

export { AppRunLock, defaultRunLock } from './run-lock';

export interface SyncOrchestratorOptions {
    appId: string;
    clientFactory: DirectoryClientFactory;
    desiredState: DesiredStateSource;
    executor?: ReconciliationExecutor;
    differ?: StateDiffer;
    /** Retries for the fetch phase */
    retryManager?: RetryManager;
    runLock?: AppRunLock;
    logger?: Logger;
}

export interface SyncRunOptions {
    mode: SyncMode;
    /** Manual mode only. Resolve true to apply the previewed delta. */
    confirm?: ( delta: Delta ) => boolean | Promise<boolean>;
    /** Allow a delta that revokes every assignment */
    confirmFullRevoke?: boolean;
    signal?: AbortSignal;
}

export interface StateTransition {
    from: SyncState;
    to: SyncState;
    at: Date;
}

export interface SyncRunResult {
    runId: string;
    appId: string;
    mode: SyncMode;
    state: 'Done' | 'Failed';
    /** True only when the Applying state ran */
    applied: boolean;
    transitions: StateTransition[];
    currentCount?: number;
    desiredCount?: number;
    delta?: Delta;
    report?: ReconciliationReport;
    error?: PrincipalSyncError;
    startTime: Date;
    endTime: Date;
}

/**
 * Tracks the state machine of one run
 */
class RunTracker {
    state: SyncState = 'Idle';
    readonly transitions: StateTransition[] = [];

    constructor( private logger: Logger ) {}

    moveTo( next: SyncState ): void {
        const transition = { from: this.state, to: next, at: new Date() };
        this.transitions.push( transition );
        this.logger.info( { from: transition.from, to: next }, `Run state ${transition.from} -> ${next}` );
        this.state = next;
    }
}

/**
 * Reconciles one application's assignments: Idle -> Fetching -> Diffing -> Applying -> Done | Failed.
 * Nothing is kept between runs.
 */
export class SyncOrchestrator {
    readonly appId: string;
    private clientFactory: DirectoryClientFactory;
    private desiredState: DesiredStateSource;
    private executor: ReconciliationExecutor;
    private differ: StateDiffer;
    private retryManager: RetryManager;
    private runLock: AppRunLock;
    private logger: Logger;

    constructor( options: SyncOrchestratorOptions ) {
        this.appId = options.appId;
        this.clientFactory = options.clientFactory;
        this.desiredState = options.desiredState;
        this.logger = componentLogger( 'orchestrator', options.logger );
        this.executor = options.executor ?? new ReconciliationExecutor( { logger: options.logger } );
        this.differ = options.differ ?? new StateDiffer();
        this.retryManager = options.retryManager ?? new RetryManager( { logger: this.logger } );
        this.runLock = options.runLock ?? defaultRunLock;
    }

    async run( options: SyncRunOptions ): Promise<SyncRunResult> {
        const runId = uuidv4();
        const startTime = new Date();
        const logger = this.logger.child( { runId, appId: this.appId, mode: options.mode } );
        const tracker = new RunTracker( logger );

        const finish = ( fields: Partial<SyncRunResult> & Pick<SyncRunResult, 'applied'> ): SyncRunResult => ( {
            runId,
            appId: this.appId,
            mode: options.mode,
            state: tracker.state === 'Done' ? 'Done' : 'Failed',
            transitions: tracker.transitions,
            startTime,
            endTime: new Date(),
            ...fields
        } );

        if ( !this.runLock.tryAcquire( this.appId, runId ) ) {
            const error = new RunAbortedError( 'RUN_IN_PROGRESS', { appId: this.appId, heldBy: this.runLock.holder( this.appId ) } );
            logger.warn( { code: error.code }, error.message );
            tracker.moveTo( 'Failed' );
            return finish( { applied: false, error } );
        }

        let client: DirectoryClient | undefined;
        let currentCount: number | undefined;
        let desiredCount: number | undefined;
        let delta: Delta | undefined;

        try {
            logger.info( { desiredState: this.desiredState.description }, 'Sync run started' );

            let desired: Assignment[] | undefined;
            if ( !this.desiredState.remote ) {
                desired = await this.desiredState.load();
            }

            this.checkCancelled( options.signal );

            tracker.moveTo( 'Fetching' );
            const session = await this.retryManager.execute( () => this.clientFactory.open(), 'open directory session' );
            client = session;

            const current = await this.retryManager.execute( () => session.listAssignments( this.appId ), 'list assignments' );
            if ( desired === undefined ) {
                desired = await this.retryManager.execute( () => this.desiredState.load( session ), 'load desired state' );
            }
            currentCount = current.length;
            desiredCount = desired.length;

            tracker.moveTo( 'Diffing' );
            delta = this.differ.diff( current, desired );
            logger.info( {
                current: current.length,
                desired: desired.length,
                toGrant: delta.toGrant.length,
                toRevoke: delta.toRevoke.length,
                unchanged: delta.unchanged,
                fullRevoke: delta.fullRevoke
            }, 'Delta computed' );

            if ( delta.fullRevoke && !options.confirmFullRevoke ) {
                throw new RunAbortedError( 'FULL_REVOKE_NOT_CONFIRMED', { toRevoke: delta.toRevoke.length } );
            }

            if ( delta.toGrant.length === 0 && delta.toRevoke.length === 0 ) {
                logger.info( 'Directory already matches desired state' );
                tracker.moveTo( 'Done' );
                return finish( { applied: false, currentCount, desiredCount, delta } );
            }

            if ( options.mode === 'manual' ) {
                const approved = options.confirm ? await options.confirm( delta ) : false;
                if ( !approved ) {
                    logger.info( 'Delta not confirmed; nothing applied' );
                    tracker.moveTo( 'Done' );
                    return finish( { applied: false, currentCount, desiredCount, delta } );
                }
            }

            this.checkCancelled( options.signal );

            tracker.moveTo( 'Applying' );
            const report = await this.executor.apply( this.appId, delta, session );

            tracker.moveTo( 'Done' );
            logger.info( { failed: report.failed.length }, 'Sync run finished' );
            return finish( { applied: true, currentCount, desiredCount, delta, report } );
        } catch ( caught ) {
            const error = ErrorHandler.normalize( caught, { runId } );
            logger.error( { kind: error.kind, code: error.code, state: tracker.state }, `Sync run failed: ${error.message}` );
            tracker.moveTo( 'Failed' );
            return finish( { applied: false, currentCount, desiredCount, delta, error } );
        } finally {
            if ( client ) {
                await this.closeSession( client, logger );
            }
            this.runLock.release( this.appId, runId );
        }
    }

    private checkCancelled( signal?: AbortSignal ): void {
        if ( signal?.aborted ) {
            throw new RunAbortedError( 'RUN_CANCELLED', { appId: this.appId } );
        }
    }

    private async closeSession( client: DirectoryClient, logger: Logger ): Promise<void> {
        try {
            await client.close();
        } catch ( error ) {
            logger.warn( { error: error instanceof Error ? error.message : String( error ) }, 'Failed to close directory session' );
        }
    }
}
