// Effective principal resolution - who actually holds a role, directly or through a group
import { DirectoryClient } from '../clients/directory-client';
import { componentLogger, Logger } from '../logger';
import { Assignment, DirectoryUser, EffectiveUser } from '../types';

export const DIRECT_SOURCE = 'Direct';

function addUnique( values: string[], value: string ): void {
    if ( !values.some( existing => existing.toLowerCase() === value.toLowerCase() ) ) {
        values.push( value );
    }
}

/**
 * Expand group assignments to their user members and merge them with direct user assignments.
 * Users reached through several paths appear once with every role and source.
 */
export async function resolveEffectiveUsers(
    client: DirectoryClient,
    assignments: Assignment[],
    parentLogger?: Logger
): Promise<EffectiveUser[]> {
    const logger = componentLogger( 'principals', parentLogger );
    const users = new Map<string, EffectiveUser>();
    const membersByGroup = new Map<string, DirectoryUser[]>();

    const include = ( user: DirectoryUser, appRoleId: string, source: string ): void => {
        const key = user.id.toLowerCase();
        const entry: EffectiveUser = users.get( key ) ?? { id: user.id, appRoleIds: [], sources: [] };

        entry.displayName = entry.displayName ?? user.displayName;
        entry.userPrincipalName = entry.userPrincipalName ?? user.userPrincipalName;
        addUnique( entry.appRoleIds, appRoleId );
        addUnique( entry.sources, source );
        users.set( key, entry );
    };

    for ( const assignment of assignments ) {
        const { principal } = assignment;

        if ( principal.type !== 'Group' ) {
            include( { id: principal.id, displayName: principal.displayName }, assignment.appRoleId, DIRECT_SOURCE );
            continue;
        }

        const groupKey = principal.id.toLowerCase();
        let members = membersByGroup.get( groupKey );
        if ( !members ) {
            members = await client.listGroupMembers( principal.id );
            membersByGroup.set( groupKey, members );
        }

        const source = principal.displayName ?? principal.id;
        for ( const member of members ) {
            include( member, assignment.appRoleId, source );
        }
    }

    for ( const user of users.values() ) {
        if ( user.userPrincipalName ) continue;

        const details = await client.getUser( user.id );
        if ( details ) {
            user.userPrincipalName = details.userPrincipalName;
            user.displayName = user.displayName ?? details.displayName;
        } else {
            logger.warn( { userId: user.id }, 'User not found while resolving principal name' );
        }
    }

    logger.info( { assignments: assignments.length, groups: membersByGroup.size, users: users.size }, 'Resolved effective users' );

    return [ ...users.values() ].sort( ( a, b ) => a.id.toLowerCase().localeCompare( b.id.toLowerCase() ) );
}
