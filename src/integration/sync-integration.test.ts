// Integration tests for the wired sync system - config, desired state, orchestrator, scheduler and reporter together
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import pino from 'pino';
import { ConfigManager } from '../config';
import { GroupDesiredStateSource } from '../desired-state';
import { ConfigurationError, RequestError } from '../errors';
import { SystemIntegration } from '../integration';
import { getExitCode, SyncReporter } from '../reporter';
import { InMemoryDirectory } from '../test/in-memory-directory';
import { Assignment } from '../types';

jest.mock( 'uuid', () => ( {
    v4: () => 'test-integration-uuid'
} ) );

const APP_ID = '11111111-1111-1111-1111-111111111111';
const READER = 'bbbbbbbb-0000-0000-0000-000000000001';
const USER_A = 'aaaaaaaa-0000-0000-0000-000000000001';
const USER_B = 'aaaaaaaa-0000-0000-0000-000000000002';
const GROUP_G = 'cccccccc-0000-0000-0000-000000000001';

const ENV_KEYS = [
    'AZURE_TENANT_ID',
    'AZURE_CLIENT_ID',
    'AZURE_CLIENT_SECRET',
    'AZURE_TARGET_APP_ID',
    'SYNC_DESIRED_STATE_FILE',
    'RETRY_BASE_DELAY_MS',
    'RETRY_MAX_DELAY_MS'
];

const logger = pino( { level: 'silent' } );

function holders( directory: InMemoryDirectory ): string[] {
    return directory.snapshot().map( a => `${a.principal.id}:${a.appRoleId}` ).sort();
}

describe( 'Sync Integration Tests', () => {
    const savedEnv: Record<string, string | undefined> = {};
    let tempDir: string;
    let desiredFile: string;
    let directory: InMemoryDirectory;

    function integration(): SystemIntegration {
        return new SystemIntegration( {
            config: new ConfigManager( { skipEnvLoad: true, skipConfigFiles: true } ),
            clientFactory: directory,
            logger
        } );
    }

    function writeDesired( entries: Array<{ principalId: string; appRoleId: string }> ): void {
        fs.writeFileSync( desiredFile, JSON.stringify( { assignments: entries } ) );
    }

    beforeEach( () => {
        for ( const key of ENV_KEYS ) {
            savedEnv[ key ] = process.env[ key ];
            delete process.env[ key ];
        }
        process.env.AZURE_TENANT_ID = 'test-tenant';
        process.env.AZURE_CLIENT_ID = APP_ID;
        process.env.AZURE_CLIENT_SECRET = 'test-secret';
        process.env.RETRY_BASE_DELAY_MS = '1';
        process.env.RETRY_MAX_DELAY_MS = '2';

        tempDir = fs.mkdtempSync( path.join( os.tmpdir(), 'principal-sync-int-' ) );
        desiredFile = path.join( tempDir, 'desired.json' );

        const existing: Assignment = { principal: { id: USER_A, type: 'User', displayName: 'Ada' }, appRoleId: READER };
        directory = new InMemoryDirectory( APP_ID ).seed( [ existing ] );
        directory.appRoles = [ { id: READER, value: 'Payroll.Read', isEnabled: true, allowedMemberTypes: [ 'User' ] } ];
    } );

    afterEach( () => {
        for ( const key of ENV_KEYS ) {
            if ( savedEnv[ key ] === undefined ) {
                delete process.env[ key ];
            } else {
                process.env[ key ] = savedEnv[ key ];
            }
        }
        fs.rmSync( tempDir, { recursive: true, force: true } );
    } );

    describe( 'file-driven runs', () => {
        it( 'should converge the directory to the desired-state file', async () => {
            writeDesired( [ { principalId: USER_B, appRoleId: READER } ] );
            const system = integration();

            expect( system.targetAppId ).toBe( APP_ID );

            const result = await system.createOrchestrator( { file: desiredFile } ).run( { mode: 'auto' } );

            expect( result.state ).toBe( 'Done' );
            expect( result.applied ).toBe( true );
            expect( result.report?.granted.map( a => a.principal.id ) ).toEqual( [ USER_B ] );
            expect( result.report?.revoked.map( a => a.principal.id ) ).toEqual( [ USER_A ] );
            expect( holders( directory ) ).toEqual( [ `${USER_B}:${READER}` ] );
            expect( getExitCode( result ) ).toBe( 0 );
            expect( directory.opened ).toBe( 1 );
            expect( directory.closed ).toBe( 1 );
        } );

        it( 'should make no changes on a second run', async () => {
            writeDesired( [ { principalId: USER_B, appRoleId: READER } ] );
            const system = integration();

            await system.createOrchestrator( { file: desiredFile } ).run( { mode: 'auto' } );
            const second = await system.createOrchestrator( { file: desiredFile } ).run( { mode: 'auto' } );

            expect( second.state ).toBe( 'Done' );
            expect( second.applied ).toBe( false );
            expect( second.delta?.unchanged ).toBe( 1 );
            expect( directory.callsTo( 'grant' ) ).toBe( 1 );
            expect( directory.callsTo( 'revoke' ) ).toBe( 1 );
        } );

        it( 'should take the file from SYNC_DESIRED_STATE_FILE', async () => {
            writeDesired( [ { principalId: USER_A, appRoleId: READER } ] );
            process.env.SYNC_DESIRED_STATE_FILE = desiredFile;

            const result = await integration().createOrchestrator().run( { mode: 'auto' } );

            expect( result.state ).toBe( 'Done' );
            expect( result.applied ).toBe( false );
            expect( holders( directory ) ).toEqual( [ `${USER_A}:${READER}` ] );
        } );

        it( 'should report a partial failure with exit code 2', async () => {
            writeDesired( [ { principalId: USER_B, appRoleId: READER } ] );
            directory.failOn( 'revoke', new RequestError( 'rejected' ), { principalId: USER_A } );

            const result = await integration().createOrchestrator( { file: desiredFile } ).run( { mode: 'auto' } );

            expect( result.state ).toBe( 'Done' );
            expect( result.report?.failed ).toHaveLength( 1 );
            expect( result.report?.failed[ 0 ] ).toMatchObject( { action: 'revoke', errorKind: 'RequestError', code: 'AZURE_REQUEST_FAILED', attempts: 1 } );
            expect( getExitCode( result ) ).toBe( 2 );
            expect( holders( directory ) ).toEqual( [ `${USER_A}:${READER}`, `${USER_B}:${READER}` ].sort() );
        } );

        it( 'should leave the directory untouched when the manual preview is declined', async () => {
            writeDesired( [ { principalId: USER_B, appRoleId: READER } ] );
            const reporter = new SyncReporter( directory.appRoles );
            let preview = '';

            const result = await integration().createOrchestrator( { file: desiredFile } ).run( {
                mode: 'manual',
                confirm: async ( delta ) => {
                    preview = reporter.formatDelta( delta );
                    return false;
                }
            } );

            expect( result.applied ).toBe( false );
            expect( preview.split( '\n' ) ).toContain( `  + grant  Payroll.Read (${READER}) -> ${USER_B}` );
            expect( holders( directory ) ).toEqual( [ `${USER_A}:${READER}` ] );
        } );
    } );

    describe( 'group-driven runs', () => {
        it( 'should grant the role to every user member of the group', async () => {
            directory.addGroup( GROUP_G, 'Finance', [
                { id: USER_A, displayName: 'Ada' },
                { id: USER_B, displayName: 'Bob' }
            ] );

            const result = await integration()
                .createOrchestrator( { groupId: GROUP_G, appRoleId: READER } )
                .run( { mode: 'auto' } );

            expect( result.state ).toBe( 'Done' );
            expect( result.report?.granted.map( a => a.principal.id ) ).toEqual( [ USER_B ] );
            expect( holders( directory ) ).toEqual( [ `${USER_A}:${READER}`, `${USER_B}:${READER}` ].sort() );
        } );
    } );

    describe( 'desired-state selection', () => {
        it( 'should build a group source when both ids are given', () => {
            const source = integration().createDesiredStateSource( { groupId: GROUP_G, appRoleId: READER } );

            expect( source ).toBeInstanceOf( GroupDesiredStateSource );
            expect( source.remote ).toBe( true );
        } );

        it( 'should require a role with a group', () => {
            expect( () => integration().createDesiredStateSource( { groupId: GROUP_G } ) )
                .toThrow( 'A group desired state needs both a group id and an app role id' );
        } );

        it( 'should require some desired state', () => {
            expect( () => integration().createDesiredStateSource() )
                .toThrow( 'No desired state given: pass a file, a group and role, or set SYNC_DESIRED_STATE_FILE' );
        } );
    } );

    describe( 'configuration validation', () => {
        it( 'should refuse to build the Graph client without credentials', () => {
            delete process.env.AZURE_TENANT_ID;
            delete process.env.AZURE_CLIENT_SECRET;

            const system = new SystemIntegration( {
                config: new ConfigManager( { skipEnvLoad: true, skipConfigFiles: true } ),
                logger
            } );

            expect( () => system.getClientFactory() ).toThrow( ConfigurationError );
            expect( () => system.getClientFactory() ).toThrow(
                'Configuration validation failed: Azure Tenant ID is required (AZURE_TENANT_ID), Azure Client Secret is required (AZURE_CLIENT_SECRET)'
            );
        } );
    } );

    describe( 'auto-sync lifecycle', () => {
        it( 'should run once on start and stop on shutdown', async () => {
            writeDesired( [ { principalId: USER_B, appRoleId: READER } ] );
            const system = integration();
            const onRun = jest.fn();

            const scheduler = system.createScheduler( system.createOrchestrator( { file: desiredFile } ), {
                intervalMs: 60000,
                onRun
            } );

            scheduler.start();
            await scheduler.waitForIdle();
            await system.shutdown();

            expect( scheduler.isRunning ).toBe( false );
            expect( scheduler.runCount ).toBe( 1 );
            expect( onRun ).toHaveBeenCalledTimes( 1 );
            expect( onRun.mock.calls[ 0 ][ 0 ].state ).toBe( 'Done' );
            expect( holders( directory ) ).toEqual( [ `${USER_B}:${READER}` ] );
        } );
    } );
} );
