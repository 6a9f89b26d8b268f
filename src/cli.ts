#!/usr/bin/env node

import { Command, Option } from 'commander';
import { DirectoryClient } from './clients/directory-client';
import { configManager } from './config';
import { ErrorHandler } from './errors';
import { DesiredStateSelection, getSystemIntegration } from './integration';
import { SyncRunOptions, SyncRunResult } from './orchestrator';
import { resolveEffectiveUsers } from './principals';
import { EXIT_FATAL, getExitCode, SyncReporter } from './reporter';
import { MAX_INTERVAL_MS } from './scheduler';
import { Delta, SyncMode } from './types';

type OutputFormat = 'table' | 'json';

interface SyncCommandOptions {
    mode: SyncMode;
    desired?: string;
    desiredGroup?: string;
    role?: string;
    confirmFullRevoke?: boolean;
    yes?: boolean;
    interval?: string | true;
    format: OutputFormat;
}

interface ListCommandOptions {
    format: OutputFormat;
}

interface ConfigCommandOptions {
    validate?: boolean;
    show?: boolean;
    sources?: boolean;
    template?: boolean;
    envTemplate?: boolean;
}

const formatOption = () => new Option( '--format <format>', 'Output format' ).choices( [ 'table', 'json' ] ).default( 'table' );

// Ask on the terminal before applying a manual-mode delta.
// End of input or Ctrl+C at the prompt counts as "no".
export async function askForConfirmation(
    question: string,
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stderr
): Promise<boolean> {
    const readline = await import( 'readline' );
    const rl = readline.createInterface( { input, output } );

    const answer = await new Promise<string | undefined>( ( resolve ) => {
        rl.once( 'close', () => resolve( undefined ) );
        rl.once( 'SIGINT', () => rl.close() );
        rl.question( question, resolve );
    } );

    rl.close();
    return answer !== undefined && [ 'y', 'yes' ].includes( answer.trim().toLowerCase() );
}

// Open one directory session, run the work, always close it
async function withDirectorySession<T>( work: ( client: DirectoryClient, appId: string ) => Promise<T> ): Promise<T> {
    const integration = getSystemIntegration();
    const client = await integration.getClientFactory().open();

    try {
        return await work( client, integration.targetAppId );
    } finally {
        await client.close();
    }
}

function printRunResult( result: SyncRunResult, format: OutputFormat ): void {
    const reporter = new SyncReporter();

    if ( format === 'json' ) {
        console.log( JSON.stringify( reporter.toJSON( result ), null, 2 ) );
    } else {
        console.log( reporter.formatRunSummary( result ) );
    }
}

export function parseInterval( value: string | true | undefined, fallbackSeconds = configManager.getSyncConfig().intervalSeconds ): number | undefined {
    if ( value === undefined ) return undefined;

    const seconds = value === true ? fallbackSeconds : Number( value );
    if ( !Number.isInteger( seconds ) || seconds <= 0 ) {
        throw new RangeError( `--interval must be a positive whole number of seconds, got ${value}` );
    }
    if ( seconds * 1000 > MAX_INTERVAL_MS ) {
        throw new RangeError( `--interval must not exceed ${Math.floor( MAX_INTERVAL_MS / 1000 )} seconds, got ${seconds}` );
    }
    return seconds;
}

async function runSync( options: SyncCommandOptions ): Promise<void> {
    const integration = getSystemIntegration();
    const selection: DesiredStateSelection = {
        file: options.desired,
        groupId: options.desiredGroup,
        appRoleId: options.role
    };
    const orchestrator = integration.createOrchestrator( selection );
    const intervalSeconds = parseInterval( options.interval );

    if ( intervalSeconds !== undefined ) {
        if ( options.mode !== 'auto' ) {
            console.error( '--interval requires --mode auto' );
            process.exitCode = EXIT_FATAL;
            return;
        }

        const scheduler = integration.createScheduler( orchestrator, {
            intervalMs: intervalSeconds * 1000,
            runOptions: { confirmFullRevoke: options.confirmFullRevoke },
            onRun: ( result ) => printRunResult( result, options.format )
        } );

        integration.installSignalHandlers();
        console.error( `Auto-sync every ${intervalSeconds}s for application ${integration.targetAppId}. Press Ctrl+C to stop.` );
        scheduler.start();
        return;
    }

    // Preview goes to stderr so JSON on stdout stays parseable
    const confirm = async ( delta: Delta ): Promise<boolean> => {
        console.error( new SyncReporter().formatDelta( delta ) );
        if ( options.yes ) {
            return true;
        }
        return askForConfirmation( '\nApply these changes? (y/N): ' );
    };

    const controller = new AbortController();
    const cancel = () => controller.abort();
    process.once( 'SIGINT', cancel );

    const runOptions: SyncRunOptions = {
        mode: options.mode,
        confirm,
        confirmFullRevoke: options.confirmFullRevoke,
        signal: controller.signal
    };

    let result: SyncRunResult;
    try {
        result = await orchestrator.run( runOptions );
    } finally {
        process.removeListener( 'SIGINT', cancel );
    }

    printRunResult( result, options.format );
    process.exitCode = getExitCode( result );
}

export function createProgram(): Command {
    const program = new Command();

    program
        .name( 'principal-sync' )
        .description( 'Reconcile Entra ID app role assignments of an application against a desired state' )
        .version( '1.0.0' );

    // sync command - Reconcile assignments
    program
        .command( 'sync' )
        .description( 'Compute and apply the grant/revoke delta for the target application' )
        .addOption( new Option( '-m, --mode <mode>', 'manual previews and asks before applying, auto applies directly' ).choices( [ 'manual', 'auto' ] ).default( 'manual' ) )
        .option( '-d, --desired <file>', 'Desired-state file (JSON or CSV)' )
        .option( '--desired-group <groupId>', 'Use the user members of this group as desired state' )
        .option( '--role <appRoleId>', 'App role granted to the members of --desired-group' )
        .option( '--confirm-full-revoke', 'Allow revoking every assignment when the desired state is empty' )
        .option( '-y, --yes', 'Apply a manual-mode delta without asking' )
        .option( '--interval [seconds]', 'Repeat auto-mode runs on an interval until interrupted' )
        .addOption( formatOption() )
        .action( async ( options: SyncCommandOptions ) => {
            try {
                await runSync( options );
            } catch ( error ) {
                ErrorHandler.handleError( error, 'Running sync' );
            }
        } );

    // list-assignments command - Show current assignments
    program
        .command( 'list-assignments' )
        .description( 'List users and groups assigned to the target application' )
        .addOption( formatOption() )
        .action( async ( options: ListCommandOptions ) => {
            try {
                await withDirectorySession( async ( client, appId ) => {
                    const assignments = await client.listAssignments( appId );

                    if ( options.format === 'json' ) {
                        console.log( JSON.stringify( assignments, null, 2 ) );
                        return;
                    }

                    const roles = await client.listAppRoles( appId );
                    console.log( new SyncReporter( roles ).formatAssignments( assignments ) );
                } );
            } catch ( error ) {
                ErrorHandler.handleError( error, 'Listing assignments' );
            }
        } );

    // list-roles command - Show app roles
    program
        .command( 'list-roles' )
        .description( 'List the app roles defined on the target application' )
        .addOption( formatOption() )
        .action( async ( options: ListCommandOptions ) => {
            try {
                await withDirectorySession( async ( client, appId ) => {
                    const roles = await client.listAppRoles( appId );

                    console.log( options.format === 'json'
                        ? JSON.stringify( roles, null, 2 )
                        : new SyncReporter( roles ).formatRoles( roles ) );
                } );
            } catch ( error ) {
                ErrorHandler.handleError( error, 'Listing app roles' );
            }
        } );

    // list-users command - Show effective users
    program
        .command( 'list-users' )
        .description( 'List users holding a role directly or through group membership' )
        .addOption( formatOption() )
        .action( async ( options: ListCommandOptions ) => {
            try {
                await withDirectorySession( async ( client, appId ) => {
                    const assignments = await client.listAssignments( appId );
                    const users = await resolveEffectiveUsers( client, assignments );

                    if ( options.format === 'json' ) {
                        console.log( JSON.stringify( users, null, 2 ) );
                        return;
                    }

                    const roles = await client.listAppRoles( appId );
                    console.log( new SyncReporter( roles ).formatUsers( users ) );
                } );
            } catch ( error ) {
                ErrorHandler.handleError( error, 'Listing effective users' );
            }
        } );

    // config command - Configuration management
    program
        .command( 'config' )
        .description( 'Configuration management' )
        .option( '--validate', 'Validate current configuration' )
        .option( '--show', 'Show current configuration (masked)' )
        .option( '--sources', 'Show configuration sources' )
        .option( '--template', 'Generate configuration template' )
        .option( '--env-template', 'Generate environment variables template' )
        .action( ( options: ConfigCommandOptions ) => {
            if ( options.template ) {
                console.log( 'Configuration template (config.json):' );
                console.log( '=====================================' );
                console.log( configManager.createConfigTemplate() );
                return;
            }

            if ( options.envTemplate ) {
                console.log( 'Environment variables template (.env):' );
                console.log( '=====================================' );
                console.log( configManager.createEnvTemplate() );
                return;
            }

            if ( options.sources ) {
                console.log( 'Configuration sources (in priority order):' );
                console.log( '=========================================' );
                configManager.getConfigSources().forEach( ( source, index ) => {
                    console.log( `${index + 1}. ${source}` );
                } );
                return;
            }

            if ( options.show ) {
                console.log( 'Current configuration (sensitive values masked):' );
                console.log( '===============================================' );
                console.log( JSON.stringify( configManager.getMaskedConfig(), null, 2 ) );
                return;
            }

            const validation = configManager.validateConfig();
            console.log( 'Configuration Validation:' );
            console.log( '========================' );
            console.log( `Status: ${validation.isValid ? '✅ Valid' : '❌ Invalid'}` );

            if ( validation.errors.length > 0 ) {
                console.log( '\nErrors:' );
                validation.errors.forEach( error => {
                    console.log( `  ❌ ${error}` );
                } );
            }

            if ( validation.warnings.length > 0 ) {
                console.log( '\nWarnings:' );
                validation.warnings.forEach( warning => {
                    console.log( `  ⚠️  ${warning}` );
                } );
            }

            if ( !validation.isValid ) {
                process.exitCode = EXIT_FATAL;
            }
        } );

    return program;
}

if ( require.main === module ) {
    createProgram()
        .parseAsync()
        .catch( ( error: unknown ) => ErrorHandler.handleError( error, 'Parsing command line' ) );
}
