// Sync Reporter - run summaries, previews and listings for the CLI
import { SyncRunResult } from '../orchestrator';
import { AppRole, Assignment, Delta, EffectiveUser, FailedOperation } from '../types';

export const EXIT_SUCCESS = 0;
export const EXIT_FATAL = 1;
export const EXIT_PARTIAL_FAILURE = 2;

export type ExitCode = typeof EXIT_SUCCESS | typeof EXIT_FATAL | typeof EXIT_PARTIAL_FAILURE;

/**
 * JSON-safe form of a run result
 */
export interface SyncRunRecord {
    runId: string;
    appId: string;
    mode: string;
    state: string;
    applied: boolean;
    exitCode: ExitCode;
    startTime: string;
    endTime: string;
    transitions: Array<{ from: string; to: string; at: string }>;
    currentCount?: number;
    desiredCount?: number;
    delta?: Delta;
    summary: { granted: number; revoked: number; skipped: number; failed: number };
    report?: {
        granted: Assignment[];
        revoked: Assignment[];
        skipped: Array<{ action: string; assignment: Assignment; reason: string }>;
        failed: FailedOperation[];
    };
    error?: { kind: string; code: string; message: string };
}

/**
 * Map a run to the process exit code: 0 success, 1 fatal, 2 partial failure
 */
export function getExitCode( result: SyncRunResult ): ExitCode {
    if ( result.state === 'Failed' ) {
        return EXIT_FATAL;
    }
    if ( result.report && result.report.failed.length > 0 ) {
        return EXIT_PARTIAL_FAILURE;
    }
    return EXIT_SUCCESS;
}

export class SyncReporter {
    private roleNames: Map<string, string> = new Map();

    constructor( roles: AppRole[] = [] ) {
        for ( const role of roles ) {
            const name = role.value || role.displayName;
            if ( name ) {
                this.roleNames.set( role.id.toLowerCase(), name );
            }
        }
    }

    /**
     * Preview of the changes a run would make
     */
    formatDelta( delta: Delta ): string {
        const lines = [ 'Planned changes:', '================' ];

        if ( delta.toGrant.length === 0 && delta.toRevoke.length === 0 ) {
            lines.push( 'No changes needed. Directory matches the desired state.' );
        }
        for ( const assignment of delta.toGrant ) {
            lines.push( `  + grant  ${this.roleLabel( assignment.appRoleId )} -> ${this.principalLabel( assignment )}` );
        }
        for ( const assignment of delta.toRevoke ) {
            lines.push( `  - revoke ${this.roleLabel( assignment.appRoleId )} -> ${this.principalLabel( assignment )}` );
        }

        lines.push( '' );
        lines.push( `To grant: ${delta.toGrant.length}, to revoke: ${delta.toRevoke.length}, unchanged: ${delta.unchanged}` );

        if ( delta.fullRevoke ) {
            lines.push( '⚠️  Desired state is empty: every assignment of this application would be revoked.' );
        }

        return lines.join( '\n' );
    }

    /**
     * Summary printed after every run
     */
    formatRunSummary( result: SyncRunResult ): string {
        const summary = this.countOutcomes( result );
        const lines = [
            'Sync Run Summary',
            '================',
            `Run ID: ${result.runId}`,
            `Application: ${result.appId}`,
            `Mode: ${result.mode}`,
            `State: ${result.state === 'Done' ? '✅' : '❌'} ${result.state}`,
            `Applied: ${result.applied ? 'Yes' : 'No'}`,
            `Duration: ${result.endTime.getTime() - result.startTime.getTime()}ms`,
            '',
            `Granted: ${summary.granted}`,
            `Revoked: ${summary.revoked}`,
            `Skipped: ${summary.skipped}`,
            `Failed: ${summary.failed}`
        ];

        if ( result.report && result.report.failed.length > 0 ) {
            lines.push( '', 'Failures:' );
            for ( const failure of result.report.failed ) {
                lines.push(
                    `  ❌ ${failure.action} ${this.roleLabel( failure.assignment.appRoleId )} -> ${this.principalLabel( failure.assignment )}` +
                    ` [${failure.errorKind}/${failure.code}] after ${failure.attempts} attempt(s): ${failure.message}`
                );
            }
        }

        if ( result.error ) {
            lines.push( '', `Error: ${result.error.getDisplayMessage()}` );
        }

        return lines.join( '\n' );
    }

    formatAssignments( assignments: Assignment[] ): string {
        const lines = [ 'App Role Assignments:', '=====================' ];

        if ( assignments.length === 0 ) {
            lines.push( 'No assignments found.' );
            return lines.join( '\n' );
        }

        for ( const assignment of assignments ) {
            lines.push(
                `${( assignment.principal.type ?? 'Unknown' ).padEnd( 6 )} ${this.principalLabel( assignment )} -> ${this.roleLabel( assignment.appRoleId )}`
            );
        }

        lines.push( '', `Total: ${assignments.length} assignments` );
        return lines.join( '\n' );
    }

    formatRoles( roles: AppRole[] ): string {
        const lines = [ 'App Roles:', '==========' ];

        if ( roles.length === 0 ) {
            lines.push( 'No app roles defined.' );
            return lines.join( '\n' );
        }

        for ( const role of roles ) {
            lines.push( `\nName: ${role.displayName || 'N/A'}` );
            lines.push( `Value: ${role.value || 'N/A'}` );
            lines.push( `ID: ${role.id}` );
            lines.push( `Description: ${role.description || 'N/A'}` );
            lines.push( `Enabled: ${role.isEnabled ? 'Yes' : 'No'}` );
            lines.push( `Member types: ${role.allowedMemberTypes.join( ', ' ) || 'N/A'}` );
            lines.push( '---' );
        }

        lines.push( `\nTotal: ${roles.length} roles` );
        return lines.join( '\n' );
    }

    formatUsers( users: EffectiveUser[] ): string {
        const lines = [ 'Effective Users:', '================' ];

        if ( users.length === 0 ) {
            lines.push( 'No users hold a role on this application.' );
            return lines.join( '\n' );
        }

        for ( const user of users ) {
            lines.push( `\nName: ${user.displayName || 'N/A'}` );
            lines.push( `UPN: ${user.userPrincipalName || 'N/A'}` );
            lines.push( `ID: ${user.id}` );
            lines.push( `Roles: ${user.appRoleIds.map( id => this.roleLabel( id ) ).join( ', ' )}` );
            lines.push( `Via: ${user.sources.join( ', ' )}` );
            lines.push( '---' );
        }

        lines.push( `\nTotal: ${users.length} users` );
        return lines.join( '\n' );
    }

    toJSON( result: SyncRunResult ): SyncRunRecord {
        return {
            runId: result.runId,
            appId: result.appId,
            mode: result.mode,
            state: result.state,
            applied: result.applied,
            exitCode: getExitCode( result ),
            startTime: result.startTime.toISOString(),
            endTime: result.endTime.toISOString(),
            transitions: result.transitions.map( transition => ( {
                from: transition.from,
                to: transition.to,
                at: transition.at.toISOString()
            } ) ),
            currentCount: result.currentCount,
            desiredCount: result.desiredCount,
            delta: result.delta,
            summary: this.countOutcomes( result ),
            report: result.report && {
                granted: result.report.granted,
                revoked: result.report.revoked,
                skipped: result.report.skipped,
                failed: result.report.failed
            },
            error: result.error && {
                kind: result.error.kind,
                code: result.error.code,
                message: result.error.message
            }
        };
    }

    private countOutcomes( result: SyncRunResult ): SyncRunRecord[ 'summary' ] {
        return {
            granted: result.report?.granted.length ?? 0,
            revoked: result.report?.revoked.length ?? 0,
            skipped: result.report?.skipped.length ?? 0,
            failed: result.report?.failed.length ?? 0
        };
    }

    private roleLabel( appRoleId: string ): string {
        const name = this.roleNames.get( appRoleId.toLowerCase() );
        return name ? `${name} (${appRoleId})` : appRoleId;
    }

    private principalLabel( assignment: Assignment ): string {
        const { id, displayName } = assignment.principal;
        return displayName ? `${displayName} (${id})` : id;
    }
}
