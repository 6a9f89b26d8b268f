// Directory client contract used by the sync engine
import { AppRole, Assignment, DirectoryUser, ServicePrincipalInfo } from '../types';

/**
 * Authenticated, session-scoped access to the directory provider.
 *
 * grant/revoke throw classified errors: AuthError, ConflictError (grant of an
 * existing assignment), NotFoundError (revoke of an absent one), TransientError
 * or RequestError.
 */
export interface DirectoryClient {
    resolveServicePrincipal( appId: string ): Promise<ServicePrincipalInfo>;
    listAssignments( appId: string ): Promise<Assignment[]>;
    listAppRoles( appId: string ): Promise<AppRole[]>;
    /** User members of a group; nested groups and devices are left out */
    listGroupMembers( groupId: string ): Promise<DirectoryUser[]>;
    getUser( userId: string ): Promise<DirectoryUser | undefined>;
    grant( appId: string, assignment: Assignment ): Promise<void>;
    revoke( appId: string, assignment: Assignment ): Promise<void>;
    /** Discard credentials; later calls fail */
    close(): Promise<void>;
}

/**
 * Acquires credentials once and hands out a client for a single run
 */
export interface DirectoryClientFactory {
    open(): Promise<DirectoryClient>;
}
