// Auto-sync scheduler - repeats automatic runs on an interval
import { componentLogger, Logger } from '../logger';
import { SyncOrchestrator, SyncRunOptions, SyncRunResult } from '../orchestrator';

/** Longest delay a Node.js timer honours; larger values fire after 1ms */
export const MAX_INTERVAL_MS = 2_147_483_647;

export interface AutoSyncOptions {
    intervalMs: number;
    /** Passed to every run; mode is always auto */
    runOptions?: Omit<SyncRunOptions, 'mode' | 'confirm'>;
    onRun?: ( result: SyncRunResult ) => void | Promise<void>;
    logger?: Logger;
}

/**
 * Runs immediately, then again intervalMs after each run completes. Runs never overlap.
 * A start() during a pending stop() resumes the schedule after the in-flight run.
 */
export class AutoSyncScheduler {
    private orchestrator: Pick<SyncOrchestrator, 'run'>;
    private options: AutoSyncOptions;
    private logger: Logger;
    private timer: ReturnType<typeof setTimeout> | undefined;
    private inFlight: Promise<void> | undefined;
    private active = false;
    private completedRuns = 0;

    constructor( orchestrator: Pick<SyncOrchestrator, 'run'>, options: AutoSyncOptions ) {
        if ( !Number.isFinite( options.intervalMs ) || options.intervalMs <= 0 ) {
            throw new RangeError( `Auto-sync interval must be positive, got ${options.intervalMs}` );
        }
        if ( options.intervalMs > MAX_INTERVAL_MS ) {
            throw new RangeError( `Auto-sync interval must not exceed ${MAX_INTERVAL_MS}ms, got ${options.intervalMs}` );
        }

        this.orchestrator = orchestrator;
        this.options = options;
        this.logger = componentLogger( 'scheduler', options.logger );
    }

    get isRunning(): boolean {
        return this.active;
    }

    get runCount(): number {
        return this.completedRuns;
    }

    start(): void {
        if ( this.active ) {
            return;
        }

        this.active = true;
        this.logger.info( { intervalMs: this.options.intervalMs }, 'Auto-sync started' );

        // Restarted while a stop is still draining: that run schedules the next one
        if ( this.inFlight ) {
            return;
        }
        this.tick();
    }

    /**
     * Cancel the next run and wait for the current one, if any
     */
    async stop(): Promise<void> {
        this.active = false;
        clearTimeout( this.timer );
        this.timer = undefined;

        await this.waitForIdle();
        this.logger.info( { runs: this.completedRuns }, 'Auto-sync stopped' );
    }

    /**
     * Resolves once no run is in progress
     */
    async waitForIdle(): Promise<void> {
        if ( this.inFlight ) {
            await this.inFlight;
        }
    }

    private tick(): void {
        this.timer = undefined;
        this.inFlight = this.runOnce().finally( () => {
            this.inFlight = undefined;
            if ( this.active ) {
                this.timer = setTimeout( () => this.tick(), this.options.intervalMs );
            }
        } );
    }

    private async runOnce(): Promise<void> {
        let result: SyncRunResult;
        try {
            result = await this.orchestrator.run( { ...this.options.runOptions, mode: 'auto' } );
        } catch ( error ) {
            this.logger.error( { error: error instanceof Error ? error.message : String( error ) }, 'Auto-sync run threw' );
            return;
        }

        this.completedRuns++;
        this.logger.info( { runId: result.runId, state: result.state, applied: result.applied }, 'Auto-sync run completed' );

        if ( !this.options.onRun ) {
            return;
        }

        try {
            await this.options.onRun( result );
        } catch ( error ) {
            this.logger.error( { runId: result.runId, error: error instanceof Error ? error.message : String( error ) }, 'Auto-sync callback failed' );
        }
    }
}
