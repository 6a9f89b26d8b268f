// Type definitions for principal-sync

export type PrincipalType = 'User' | 'Group';

export interface Principal {
    id: string;
    /** Absent when a desired-state source only names the identifier */
    type?: PrincipalType;
    displayName?: string;
}

/**
 * Grant of an app role on the application's service principal.
 * Identity is (principal.id, appRoleId); assignmentId is the directory record used for revocation.
 */
export interface Assignment {
    principal: Principal;
    appRoleId: string;
    assignmentId?: string;
}

export interface Delta {
    toGrant: Assignment[];
    toRevoke: Assignment[];
    unchanged: number;
    /** Desired state is empty while assignments exist */
    fullRevoke: boolean;
}

export interface AppRole {
    id: string;
    value?: string;
    displayName?: string;
    description?: string;
    isEnabled: boolean;
    allowedMemberTypes: string[];
}

export interface ServicePrincipalInfo {
    id: string;
    appId: string;
    displayName?: string;
}

export interface DirectoryUser {
    id: string;
    displayName?: string;
    userPrincipalName?: string;
}

export interface EffectiveUser extends DirectoryUser {
    appRoleIds: string[];
    sources: string[];
}

export type OperationAction = 'grant' | 'revoke';

export type ErrorKind =
    | 'AuthError'
    | 'TransientError'
    | 'ConflictError'
    | 'NotFoundError'
    | 'ConfigError'
    | 'RequestError'
    | 'RunAborted';

export interface FailedOperation {
    action: OperationAction;
    assignment: Assignment;
    errorKind: ErrorKind;
    code: string;
    message: string;
    attempts: number;
}

export interface SkippedOperation {
    action: OperationAction;
    assignment: Assignment;
    reason: 'ALREADY_PRESENT' | 'ALREADY_ABSENT';
}

export interface ReconciliationReport {
    granted: Assignment[];
    revoked: Assignment[];
    skipped: SkippedOperation[];
    failed: FailedOperation[];
    startTime: Date;
    endTime: Date;
}

export type SyncMode = 'manual' | 'auto';

export type SyncState = 'Idle' | 'Fetching' | 'Diffing' | 'Applying' | 'Done' | 'Failed';

/**
 * Build the structural identity key of an assignment.
 * Directory ids are GUIDs, so comparison is case-insensitive.
 */
export function assignmentKey( assignment: Assignment ): string {
    return `${assignment.principal.id.toLowerCase()}|${assignment.appRoleId.toLowerCase()}`;
}

/**
 * Order by principal id, then role id
 */
export function compareAssignments( a: Assignment, b: Assignment ): number {
    const byPrincipal = a.principal.id.toLowerCase().localeCompare( b.principal.id.toLowerCase() );
    if ( byPrincipal !== 0 ) {
        return byPrincipal;
    }
    return a.appRoleId.toLowerCase().localeCompare( b.appRoleId.toLowerCase() );
}
