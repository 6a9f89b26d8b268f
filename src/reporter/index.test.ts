// Tests for Sync Reporter
import { getExitCode, SyncReporter } from './index';
import { SyncRunResult } from '../orchestrator';
import { AuthError } from '../errors';
import { AppRole, Assignment, ReconciliationReport } from '../types';

const APP_ID = '11111111-1111-1111-1111-111111111111';
const READER = 'bbbbbbbb-0000-0000-0000-000000000001';
const WRITER = 'bbbbbbbb-0000-0000-0000-000000000002';
const ADA = 'aaaaaaaa-0000-0000-0000-000000000001';
const FINANCE = 'cccccccc-0000-0000-0000-000000000001';

const roles: AppRole[] = [
    { id: READER, value: 'Payroll.Read', displayName: 'Reader', isEnabled: true, allowedMemberTypes: [ 'User' ] },
    { id: WRITER, displayName: 'Writer', isEnabled: false, allowedMemberTypes: [] }
];

const adaReader: Assignment = { principal: { id: ADA, type: 'User', displayName: 'Ada' }, appRoleId: READER };
const financeWriter: Assignment = { principal: { id: FINANCE, type: 'Group' }, appRoleId: WRITER };

function report( overrides: Partial<ReconciliationReport> = {} ): ReconciliationReport {
    return {
        granted: [],
        revoked: [],
        skipped: [],
        failed: [],
        startTime: new Date( '2024-05-01T10:00:00.000Z' ),
        endTime: new Date( '2024-05-01T10:00:01.000Z' ),
        ...overrides
    };
}

function result( overrides: Partial<SyncRunResult> = {} ): SyncRunResult {
    return {
        runId: 'run-1',
        appId: APP_ID,
        mode: 'auto',
        state: 'Done',
        applied: true,
        transitions: [ { from: 'Idle', to: 'Fetching', at: new Date( '2024-05-01T10:00:00.000Z' ) } ],
        startTime: new Date( '2024-05-01T10:00:00.000Z' ),
        endTime: new Date( '2024-05-01T10:00:01.500Z' ),
        ...overrides
    };
}

describe( 'getExitCode', () => {
    it( 'should return 0 for a clean run', () => {
        expect( getExitCode( result( { report: report( { granted: [ adaReader ] } ) } ) ) ).toBe( 0 );
        expect( getExitCode( result( { applied: false } ) ) ).toBe( 0 );
    } );

    it( 'should return 1 for a failed run', () => {
        expect( getExitCode( result( { state: 'Failed', applied: false, error: new AuthError( 'denied' ) } ) ) ).toBe( 1 );
    } );

    it( 'should return 2 when some operations failed', () => {
        const failed = report( {
            failed: [ { action: 'grant', assignment: adaReader, errorKind: 'RequestError', code: 'AZURE_BADREQUEST', message: 'nope', attempts: 1 } ]
        } );

        expect( getExitCode( result( { report: failed } ) ) ).toBe( 2 );
    } );
} );

describe( 'SyncReporter', () => {
    const reporter = new SyncReporter( roles );

    it( 'should format a delta preview with role names', () => {
        const text = reporter.formatDelta( { toGrant: [ adaReader ], toRevoke: [ financeWriter ], unchanged: 3, fullRevoke: false } );

        expect( text.split( '\n' ) ).toEqual( [
            'Planned changes:',
            '================',
            `  + grant  Payroll.Read (${READER}) -> Ada (${ADA})`,
            `  - revoke Writer (${WRITER}) -> ${FINANCE}`,
            '',
            'To grant: 1, to revoke: 1, unchanged: 3'
        ] );
    } );

    it( 'should warn about a full revoke', () => {
        const text = reporter.formatDelta( { toGrant: [], toRevoke: [ financeWriter ], unchanged: 0, fullRevoke: true } );

        expect( text.split( '\n' ).pop() ).toBe( '⚠️  Desired state is empty: every assignment of this application would be revoked.' );
    } );

    it( 'should summarize counts and failure details', () => {
        const text = reporter.formatRunSummary( result( {
            report: report( {
                granted: [ adaReader ],
                failed: [ {
                    action: 'revoke',
                    assignment: financeWriter,
                    errorKind: 'TransientError',
                    code: 'AZURE_RATE_LIMITED',
                    message: 'Too many requests',
                    attempts: 3
                } ]
            } )
        } ) );

        expect( text.split( '\n' ) ).toEqual( [
            'Sync Run Summary',
            '================',
            'Run ID: run-1',
            `Application: ${APP_ID}`,
            'Mode: auto',
            'State: ✅ Done',
            'Applied: Yes',
            'Duration: 1500ms',
            '',
            'Granted: 1',
            'Revoked: 0',
            'Skipped: 0',
            'Failed: 1',
            '',
            'Failures:',
            `  ❌ revoke Writer (${WRITER}) -> ${FINANCE} [TransientError/AZURE_RATE_LIMITED] after 3 attempt(s): Too many requests`
        ] );
    } );

    it( 'should include the run error for failed runs', () => {
        const text = reporter.formatRunSummary( result( { state: 'Failed', applied: false, error: new AuthError( 'denied', 'AZURE_PERMISSION_DENIED' ) } ) );

        expect( text ).toContain( 'State: ❌ Failed' );
        expect( text.split( '\n' ).pop() ).toBe(
            'Error: [AZURE_PERMISSION_DENIED] Permission denied in Azure AD. Please ensure the application has AppRoleAssignment.ReadWrite.All and Application.Read.All.'
        );
    } );

    it( 'should list assignments', () => {
        expect( reporter.formatAssignments( [ adaReader, financeWriter ] ).split( '\n' ) ).toEqual( [
            'App Role Assignments:',
            '=====================',
            `User   Ada (${ADA}) -> Payroll.Read (${READER})`,
            `Group  ${FINANCE} -> Writer (${WRITER})`,
            '',
            'Total: 2 assignments'
        ] );
        expect( reporter.formatAssignments( [] ) ).toBe( 'App Role Assignments:\n=====================\nNo assignments found.' );
    } );

    it( 'should list roles', () => {
        const lines = reporter.formatRoles( roles ).split( '\n' );

        expect( lines ).toContain( 'Value: Payroll.Read' );
        expect( lines ).toContain( 'Enabled: No' );
        expect( lines ).toContain( 'Member types: N/A' );
        expect( lines.pop() ).toBe( 'Total: 2 roles' );
    } );

    it( 'should list effective users with their sources', () => {
        const lines = reporter.formatUsers( [ {
            id: ADA,
            displayName: 'Ada',
            userPrincipalName: 'ada@example.com',
            appRoleIds: [ READER ],
            sources: [ 'Direct', 'Finance' ]
        } ] ).split( '\n' );

        expect( lines ).toContain( 'UPN: ada@example.com' );
        expect( lines ).toContain( `Roles: Payroll.Read (${READER})` );
        expect( lines ).toContain( 'Via: Direct, Finance' );
    } );

    it( 'should produce a JSON-safe record', () => {
        const record = reporter.toJSON( result( {
            state: 'Failed',
            applied: false,
            error: new AuthError( 'denied', 'AZURE_PERMISSION_DENIED' )
        } ) );

        expect( record ).toEqual( {
            runId: 'run-1',
            appId: APP_ID,
            mode: 'auto',
            state: 'Failed',
            applied: false,
            exitCode: 1,
            startTime: '2024-05-01T10:00:00.000Z',
            endTime: '2024-05-01T10:00:01.500Z',
            transitions: [ { from: 'Idle', to: 'Fetching', at: '2024-05-01T10:00:00.000Z' } ],
            summary: { granted: 0, revoked: 0, skipped: 0, failed: 0 },
            error: { kind: 'AuthError', code: 'AZURE_PERMISSION_DENIED', message: 'denied' }
        } );
        expect( JSON.parse( JSON.stringify( record ) ) ).toEqual( record );
    } );
} );
