// Azure AD Client - Microsoft Graph SDK integration
import { Client } from '@microsoft/microsoft-graph-client';
import { ConfidentialClientApplication } from '@azure/msal-node';
import { AzureConfig } from '../config';
import { AuthError, ErrorHandler, NotFoundError, TransientError, ValidationUtils } from '../errors';
import { componentLogger, Logger } from '../logger';
import { AppRole, Assignment, assignmentKey, DirectoryUser, ServicePrincipalInfo } from '../types';
import { DirectoryClient, DirectoryClientFactory } from './directory-client';

export const GRAPH_SCOPE = 'https://graph.microsoft.com/.default';

const PAGE_SIZE = 999;

export interface GraphClientOptions {
    requestTimeoutMs: number;
    logger?: Logger;
}

interface GraphCollection<T> {
    value?: T[];
    '@odata.nextLink'?: string;
}

interface GraphAppRole {
    id?: string;
    value?: string | null;
    displayName?: string | null;
    description?: string | null;
    isEnabled?: boolean;
    allowedMemberTypes?: string[];
}

interface GraphServicePrincipal {
    id?: string;
    appId?: string;
    displayName?: string;
    appRoles?: GraphAppRole[];
}

interface GraphAppRoleAssignment {
    id?: string;
    principalId?: string;
    principalDisplayName?: string;
    principalType?: string;
    appRoleId?: string;
    deletedDateTime?: string | null;
}

interface GraphDirectoryObject {
    id?: string;
    displayName?: string;
    userPrincipalName?: string;
    '@odata.type'?: string;
}

interface ResolvedServicePrincipal extends ServicePrincipalInfo {
    appRoles: AppRole[];
}

/**
 * Acquires a client-credentials token through MSAL and opens a Graph session per run
 */
export class GraphDirectoryClientFactory implements DirectoryClientFactory {
    private msalClient: ConfidentialClientApplication;
    private config: AzureConfig;
    private options: GraphClientOptions;

    constructor( config: AzureConfig, options: GraphClientOptions ) {
        this.config = config;
        this.options = options;

        this.msalClient = new ConfidentialClientApplication( {
            auth: {
                clientId: config.clientId,
                clientSecret: config.clientSecret,
                authority: `${config.authorityHost.replace( /\/+$/, '' )}/${config.tenantId}`
            }
        } );
    }

    async open(): Promise<GraphDirectoryClient> {
        let accessToken: string | undefined;

        try {
            const response = await this.msalClient.acquireTokenByClientCredential( { scopes: [ GRAPH_SCOPE ] } );
            accessToken = response?.accessToken;
        } catch ( error ) {
            throw ErrorHandler.fromTokenError( error, { tenantId: this.config.tenantId, clientId: this.config.clientId } );
        }

        if ( !accessToken ) {
            throw new AuthError( 'Token endpoint returned no access token', 'AZURE_AUTH_FAILED', {
                tenantId: this.config.tenantId,
                clientId: this.config.clientId
            } );
        }

        return new GraphDirectoryClient( accessToken, this.options );
    }
}

/**
 * Microsoft Graph implementation of the directory client, bound to one access token
 */
export class GraphDirectoryClient implements DirectoryClient {
    private graphClient: Client;
    private accessToken: string | undefined;
    private options: GraphClientOptions;
    private logger: Logger;
    private servicePrincipals: Map<string, ResolvedServicePrincipal> = new Map();

    constructor( accessToken: string, options: GraphClientOptions ) {
        this.accessToken = accessToken;
        this.options = options;
        this.logger = componentLogger( 'graph-client', options.logger );

        this.graphClient = Client.initWithMiddleware( {
            authProvider: {
                getAccessToken: async () => this.requireToken()
            }
        } );
    }

    async resolveServicePrincipal( appId: string ): Promise<ServicePrincipalInfo> {
        const servicePrincipal = await this.getServicePrincipal( appId );
        return {
            id: servicePrincipal.id,
            appId: servicePrincipal.appId,
            displayName: servicePrincipal.displayName
        };
    }

    /**
     * List users and groups assigned to the application's service principal
     */
    async listAssignments( appId: string ): Promise<Assignment[]> {
        const servicePrincipal = await this.getServicePrincipal( appId );

        const records = await this.getAllPages<GraphAppRoleAssignment>(
            'listAssignments',
            () => this.graphClient
                .api( `/servicePrincipals/${servicePrincipal.id}/appRoleAssignedTo` )
                .select( 'id,principalId,principalDisplayName,principalType,appRoleId,deletedDateTime' )
                .top( PAGE_SIZE )
                .get(),
            { appId }
        );

        const assignments: Assignment[] = [];
        for ( const record of records ) {
            if ( !record.principalId || !record.appRoleId || record.deletedDateTime ) continue;

            if ( record.principalType !== 'User' && record.principalType !== 'Group' ) {
                this.logger.debug( { principalId: record.principalId, principalType: record.principalType }, 'Skipping assignment held by unsupported principal type' );
                continue;
            }

            assignments.push( {
                principal: {
                    id: record.principalId,
                    type: record.principalType,
                    displayName: record.principalDisplayName
                },
                appRoleId: record.appRoleId,
                assignmentId: record.id
            } );
        }

        this.logger.info( { appId, servicePrincipalId: servicePrincipal.id, count: assignments.length }, 'Fetched app role assignments' );
        return assignments;
    }

    async listAppRoles( appId: string ): Promise<AppRole[]> {
        const servicePrincipal = await this.getServicePrincipal( appId );
        return servicePrincipal.appRoles.map( role => ( { ...role, allowedMemberTypes: [ ...role.allowedMemberTypes ] } ) );
    }

    async listGroupMembers( groupId: string ): Promise<DirectoryUser[]> {
        ValidationUtils.validateGuid( groupId, 'group id' );

        const members = await this.getAllPages<GraphDirectoryObject>(
            'listGroupMembers',
            () => this.graphClient
                .api( `/groups/${groupId}/members` )
                .select( 'id,displayName,userPrincipalName' )
                .top( PAGE_SIZE )
                .get(),
            { groupId }
        );

        const users: DirectoryUser[] = [];
        for ( const member of members ) {
            const odataType = member[ '@odata.type' ];
            if ( !member.id || ( odataType && odataType !== '#microsoft.graph.user' ) ) continue;

            users.push( {
                id: member.id,
                displayName: member.displayName,
                userPrincipalName: member.userPrincipalName
            } );
        }

        this.logger.debug( { groupId, count: users.length }, 'Fetched group members' );
        return users;
    }

    async getUser( userId: string ): Promise<DirectoryUser | undefined> {
        try {
            const user: GraphDirectoryObject = await this.call(
                'getUser',
                () => this.graphClient
                    .api( `/users/${userId}` )
                    .select( 'id,displayName,userPrincipalName' )
                    .get(),
                { userId }
            );

            return user.id
                ? { id: user.id, displayName: user.displayName, userPrincipalName: user.userPrincipalName }
                : undefined;
        } catch ( error ) {
            if ( error instanceof NotFoundError ) {
                return undefined;
            }
            throw error;
        }
    }

    async grant( appId: string, assignment: Assignment ): Promise<void> {
        const servicePrincipal = await this.getServicePrincipal( appId );

        await this.call(
            'grant',
            () => this.graphClient
                .api( `/servicePrincipals/${servicePrincipal.id}/appRoleAssignedTo` )
                .post( {
                    principalId: assignment.principal.id,
                    resourceId: servicePrincipal.id,
                    appRoleId: assignment.appRoleId
                } ),
            { appId, principalId: assignment.principal.id, appRoleId: assignment.appRoleId }
        );
    }

    async revoke( appId: string, assignment: Assignment ): Promise<void> {
        const servicePrincipal = await this.getServicePrincipal( appId );
        const assignmentId = assignment.assignmentId ?? await this.findAssignmentId( appId, assignment );

        await this.call(
            'revoke',
            () => this.graphClient
                .api( `/servicePrincipals/${servicePrincipal.id}/appRoleAssignedTo/${assignmentId}` )
                .delete(),
            { appId, principalId: assignment.principal.id, appRoleId: assignment.appRoleId, assignmentId }
        );
    }

    async close(): Promise<void> {
        this.accessToken = undefined;
        this.servicePrincipals.clear();
    }

    private async findAssignmentId( appId: string, assignment: Assignment ): Promise<string> {
        const key = assignmentKey( assignment );
        const match = ( await this.listAssignments( appId ) ).find( candidate => assignmentKey( candidate ) === key );

        if ( !match?.assignmentId ) {
            throw new NotFoundError( `No assignment of role ${assignment.appRoleId} to principal ${assignment.principal.id}`, 'ASSIGNMENT_NOT_FOUND' );
        }
        return match.assignmentId;
    }

    private async getServicePrincipal( appId: string ): Promise<ResolvedServicePrincipal> {
        ValidationUtils.validateGuid( appId, 'application id' );

        const cached = this.servicePrincipals.get( appId.toLowerCase() );
        if ( cached ) {
            return cached;
        }

        const response: GraphCollection<GraphServicePrincipal> = await this.call(
            'resolveServicePrincipal',
            () => this.graphClient
                .api( '/servicePrincipals' )
                .filter( `appId eq '${appId}'` )
                .select( 'id,appId,displayName,appRoles' )
                .get(),
            { appId }
        );

        const servicePrincipal = response.value?.[ 0 ];
        if ( !servicePrincipal?.id ) {
            throw new NotFoundError( `No service principal for application ${appId}`, 'SERVICE_PRINCIPAL_NOT_FOUND', { appId } );
        }

        const resolved: ResolvedServicePrincipal = {
            id: servicePrincipal.id,
            appId: servicePrincipal.appId ?? appId,
            displayName: servicePrincipal.displayName,
            appRoles: ( servicePrincipal.appRoles ?? [] ).flatMap( role => role.id ? [ {
                id: role.id,
                value: role.value ?? undefined,
                displayName: role.displayName ?? undefined,
                description: role.description ?? undefined,
                isEnabled: role.isEnabled ?? true,
                allowedMemberTypes: role.allowedMemberTypes ?? []
            } ] : [] )
        };

        this.logger.info( { appId, servicePrincipalId: resolved.id, displayName: resolved.displayName }, 'Service principal found' );
        this.servicePrincipals.set( appId.toLowerCase(), resolved );
        return resolved;
    }

    private async getAllPages<T>(
        operation: string,
        firstPage: () => Promise<GraphCollection<T>>,
        context: Record<string, unknown>
    ): Promise<T[]> {
        const items: T[] = [];
        let page = await this.call( operation, firstPage, context );
        items.push( ...( page.value ?? [] ) );

        let nextLink = page[ '@odata.nextLink' ];
        while ( nextLink ) {
            const link = nextLink;
            page = await this.call( operation, (): Promise<GraphCollection<T>> => this.graphClient.api( link ).get(), context );
            items.push( ...( page.value ?? [] ) );
            nextLink = page[ '@odata.nextLink' ];
        }

        return items;
    }

    /**
     * Run one Graph request under the per-call timeout and classify its failure
     */
    private async call<T>( operation: string, request: () => Promise<T>, context: Record<string, unknown> ): Promise<T> {
        this.requireToken();

        let timer: ReturnType<typeof setTimeout> | undefined;
        const timeout = new Promise<never>( ( _resolve, reject ) => {
            timer = setTimeout(
                () => reject( new TransientError( `${operation} exceeded ${this.options.requestTimeoutMs}ms`, 'TIMEOUT_ERROR', { operation, ...context } ) ),
                this.options.requestTimeoutMs
            );
        } );

        try {
            return await Promise.race( [ request(), timeout ] );
        } catch ( error ) {
            throw ErrorHandler.normalize( error, { operation, ...context } );
        } finally {
            clearTimeout( timer );
        }
    }

    private requireToken(): string {
        if ( !this.accessToken ) {
            throw new AuthError( 'Directory session is closed', 'DIRECTORY_SESSION_CLOSED' );
        }
        return this.accessToken;
    }
}
