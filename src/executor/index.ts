// Reconciliation Executor - applies a delta to the directory with retry and bounded concurrency
import pLimit from 'p-limit';
import { DirectoryClient } from '../clients/directory-client';
import { getSyncConfig } from '../config';
import { ConflictError, ErrorHandler, NotFoundError, RetryExhaustedError, RetryManager } from '../errors';
import { componentLogger, Logger } from '../logger';
import {
    Assignment,
    Delta,
    FailedOperation,
    OperationAction,
    ReconciliationReport,
    SkippedOperation
} from '../types';

export interface ExecutorOptions {
    /** Operations in flight at once (default SYNC_CONCURRENCY) */
    concurrency?: number;
    retryManager?: RetryManager;
    logger?: Logger;
}

interface PlannedOperation {
    action: OperationAction;
    assignment: Assignment;
}

type OperationOutcome =
    | { status: 'applied' }
    | { status: 'skipped'; skipped: SkippedOperation }
    | { status: 'failed'; failed: FailedOperation };

/**
 * Applies grants and revokes independently. One failing operation never stops the others.
 */
export class ReconciliationExecutor {
    private concurrency: number;
    private retryManager: RetryManager;
    private logger: Logger;

    constructor( options: ExecutorOptions = {} ) {
        this.concurrency = options.concurrency ?? getSyncConfig().concurrency;
        this.logger = componentLogger( 'executor', options.logger );
        this.retryManager = options.retryManager ?? new RetryManager( { logger: this.logger } );

        if ( !Number.isInteger( this.concurrency ) || this.concurrency < 1 ) {
            throw new RangeError( `Executor concurrency must be a positive integer, got ${this.concurrency}` );
        }
    }

    /**
     * Apply every operation of the delta and report the result of each
     */
    async apply( appId: string, delta: Delta, client: DirectoryClient ): Promise<ReconciliationReport> {
        const startTime = new Date();
        const operations: PlannedOperation[] = [
            ...delta.toGrant.map( ( assignment ): PlannedOperation => ( { action: 'grant', assignment } ) ),
            ...delta.toRevoke.map( ( assignment ): PlannedOperation => ( { action: 'revoke', assignment } ) )
        ];

        this.logger.info(
            { appId, grants: delta.toGrant.length, revokes: delta.toRevoke.length, concurrency: this.concurrency },
            'Applying delta'
        );

        const limit = pLimit( this.concurrency );
        const outcomes = await Promise.all(
            operations.map( operation => limit( () => this.execute( appId, operation, client ) ) )
        );

        const report: ReconciliationReport = {
            granted: [],
            revoked: [],
            skipped: [],
            failed: [],
            startTime,
            endTime: startTime
        };

        outcomes.forEach( ( outcome, index ) => {
            const operation = operations[ index ];
            switch ( outcome.status ) {
                case 'applied':
                    ( operation.action === 'grant' ? report.granted : report.revoked ).push( operation.assignment );
                    break;
                case 'skipped':
                    report.skipped.push( outcome.skipped );
                    break;
                case 'failed':
                    report.failed.push( outcome.failed );
                    break;
            }
        } );

        report.endTime = new Date();

        this.logger.info( {
            appId,
            granted: report.granted.length,
            revoked: report.revoked.length,
            skipped: report.skipped.length,
            failed: report.failed.length,
            durationMs: report.endTime.getTime() - startTime.getTime()
        }, 'Delta applied' );

        return report;
    }

    private async execute( appId: string, operation: PlannedOperation, client: DirectoryClient ): Promise<OperationOutcome> {
        const { action, assignment } = operation;
        const target = { principalId: assignment.principal.id, appRoleId: assignment.appRoleId };

        try {
            const { attempts } = await this.retryManager.executeWithAttempts(
                () => action === 'grant' ? client.grant( appId, assignment ) : client.revoke( appId, assignment ),
                `${action} ${assignment.appRoleId} for ${assignment.principal.id}`
            );

            this.logger.info( { action, ...target, attempts }, action === 'grant' ? 'Assignment granted' : 'Assignment revoked' );
            return { status: 'applied' };
        } catch ( error ) {
            const exhausted = error instanceof RetryExhaustedError
                ? error
                : new RetryExhaustedError( ErrorHandler.normalize( error ), 1 );
            const cause = exhausted.lastError;

            if ( action === 'grant' && cause instanceof ConflictError ) {
                this.logger.info( { action, ...target }, 'Assignment already present' );
                return { status: 'skipped', skipped: { action, assignment, reason: 'ALREADY_PRESENT' } };
            }
            if ( action === 'revoke' && cause instanceof NotFoundError ) {
                this.logger.info( { action, ...target }, 'Assignment already absent' );
                return { status: 'skipped', skipped: { action, assignment, reason: 'ALREADY_ABSENT' } };
            }

            this.logger.warn(
                { action, ...target, errorKind: cause.kind, code: cause.code, attempts: exhausted.attempts },
                `${action} failed: ${cause.message}`
            );

            return {
                status: 'failed',
                failed: {
                    action,
                    assignment,
                    errorKind: cause.kind,
                    code: cause.code,
                    message: cause.message,
                    attempts: exhausted.attempts
                }
            };
        }
    }
}
