// Example: Reconciling an application's role assignments from code
import { GraphDirectoryClientFactory } from '../src/clients/graph-directory-client';
import { AzureConfig } from '../src/config';
import { StaticDesiredStateSource } from '../src/desired-state';
import { ReconciliationExecutor } from '../src/executor';
import { SyncOrchestrator } from '../src/orchestrator';
import { getExitCode, SyncReporter } from '../src/reporter';
import { AutoSyncScheduler } from '../src/scheduler';

// Example configuration
const azure: AzureConfig = {
    tenantId: 'your-tenant-id',
    clientId: 'your-client-id',
    clientSecret: 'your-client-secret',
    targetAppId: '00000000-0000-0000-0000-000000000000',
    authorityHost: 'https://login.microsoftonline.com'
};

const READER_ROLE = '11111111-2222-3333-4444-555555555555';

function buildOrchestrator(): SyncOrchestrator {
    return new SyncOrchestrator( {
        appId: azure.targetAppId,
        clientFactory: new GraphDirectoryClientFactory( azure, { requestTimeoutMs: 30000 } ),
        desiredState: new StaticDesiredStateSource( [
            { principalId: 'aaaaaaaa-0000-0000-0000-000000000001', appRoleId: READER_ROLE, principalType: 'User' },
            { principalId: 'cccccccc-0000-0000-0000-000000000001', appRoleId: READER_ROLE, principalType: 'Group' }
        ] ),
        executor: new ReconciliationExecutor( { concurrency: 4 } )
    } );
}

async function manualSyncExample() {
    const orchestrator = buildOrchestrator();
    const reporter = new SyncReporter();

    // Example 1: Preview the delta and approve it in code
    const result = await orchestrator.run( {
        mode: 'manual',
        confirm: ( delta ) => {
            console.log( reporter.formatDelta( delta ) );
            // Only apply small changes without a human in the loop
            return delta.toGrant.length + delta.toRevoke.length <= 10;
        }
    } );

    console.log( reporter.formatRunSummary( result ) );
    console.log( `Exit code: ${getExitCode( result )}` );
}

async function autoSyncExample() {
    // Example 2: Keep the application converged every 15 minutes
    const scheduler = new AutoSyncScheduler( buildOrchestrator(), {
        intervalMs: 15 * 60 * 1000,
        onRun: ( result ) => {
            const summary = new SyncReporter().toJSON( result ).summary;
            console.log( `Run ${result.runId}: ${result.state}, granted ${summary.granted}, revoked ${summary.revoked}, failed ${summary.failed}` );
        }
    } );

    scheduler.start();

    // Stop after the first run for the purpose of this example
    await scheduler.waitForIdle();
    await scheduler.stop();
}

async function main() {
    try {
        await manualSyncExample();
        await autoSyncExample();
    } catch ( error ) {
        console.error( 'Example failed:', error );
        process.exitCode = 1;
    }
}

if ( require.main === module ) {
    main().catch( ( error: unknown ) => {
        console.error( error );
        process.exitCode = 1;
    } );
}

export { manualSyncExample, autoSyncExample };
