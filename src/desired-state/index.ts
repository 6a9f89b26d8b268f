// Desired-state sources - where the target set of assignments comes from
import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import * as path from 'path';
import { DirectoryClient } from '../clients/directory-client';
import { ConfigurationError, ValidationUtils } from '../errors';
import { Assignment } from '../types';

/**
 * One declared assignment as written in a file or passed in code
 */
export interface DesiredAssignmentEntry {
    principalId: string;
    appRoleId: string;
    principalType?: string;
    displayName?: string;
}

export interface DesiredStateSource {
    readonly description: string;
    /** Loading needs an open directory session */
    readonly remote: boolean;
    load( client?: DirectoryClient ): Promise<Assignment[]>;
}

/**
 * Validate one entry and turn it into an Assignment
 */
export function toAssignment( entry: DesiredAssignmentEntry, label: string ): Assignment {
    const principalId = entry.principalId.trim();
    const appRoleId = entry.appRoleId.trim();

    if ( !ValidationUtils.isGuid( principalId ) ) {
        throw new ConfigurationError( `${label}: principalId must be a GUID, got "${entry.principalId}"` );
    }
    if ( !ValidationUtils.isGuid( appRoleId ) ) {
        throw new ConfigurationError( `${label}: appRoleId must be a GUID, got "${entry.appRoleId}"` );
    }

    let type: Assignment[ 'principal' ][ 'type' ];
    if ( entry.principalType !== undefined && entry.principalType.trim() !== '' ) {
        try {
            type = ValidationUtils.parsePrincipalType( entry.principalType );
        } catch {
            throw new ConfigurationError( `${label}: principalType must be User or Group, got "${entry.principalType}"` );
        }
    }

    return {
        principal: { id: principalId, type, displayName: entry.displayName },
        appRoleId
    };
}

/**
 * In-memory list of assignments, validated on load
 */
export class StaticDesiredStateSource implements DesiredStateSource {
    readonly remote = false;
    readonly description: string;

    constructor( private entries: DesiredAssignmentEntry[], description = 'static list' ) {
        this.description = description;
    }

    async load(): Promise<Assignment[]> {
        return this.entries.map( ( entry, index ) => toAssignment( entry, `Entry ${index + 1}` ) );
    }
}

/**
 * Desired state declared in a JSON or CSV file.
 *
 * JSON: an array of entries, or `{ "assignments": [ ... ] }`.
 * CSV: `principalId,appRoleId[,principalType]` with an optional header row; `#` starts a comment line.
 */
export class FileDesiredStateSource implements DesiredStateSource {
    readonly remote = false;
    readonly description: string;
    private filePath: string;

    constructor( filePath: string ) {
        this.filePath = path.resolve( filePath );
        this.description = `file ${this.filePath}`;
    }

    async load(): Promise<Assignment[]> {
        if ( !existsSync( this.filePath ) ) {
            throw new ConfigurationError( `Desired-state file not found: ${this.filePath}` );
        }

        let content: string;
        try {
            content = await fs.readFile( this.filePath, 'utf8' );
        } catch ( error ) {
            throw new ConfigurationError(
                `Failed to read desired-state file ${this.filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`
            );
        }

        return this.isJson( content )
            ? this.parseJson( content )
            : this.parseCsv( content );
    }

    private isJson( content: string ): boolean {
        const extension = path.extname( this.filePath ).toLowerCase();
        if ( extension === '.json' ) return true;
        if ( extension === '.csv' ) return false;

        const first = content.trimStart().charAt( 0 );
        return first === '[' || first === '{';
    }

    private parseJson( content: string ): Assignment[] {
        let document: unknown;
        try {
            document = JSON.parse( content );
        } catch ( error ) {
            throw new ConfigurationError(
                `Invalid JSON in desired-state file ${this.filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`
            );
        }

        const entries = Array.isArray( document ) ? document : readField( document, 'assignments' );
        if ( !Array.isArray( entries ) ) {
            throw new ConfigurationError( `Desired-state file ${this.filePath} must contain an array or an "assignments" array` );
        }

        return entries.map( ( raw: unknown, index ) => {
            const label = `Entry ${index + 1} of ${this.filePath}`;
            const principalId = readField( raw, 'principalId' );
            const appRoleId = readField( raw, 'appRoleId' );
            const principalType = readField( raw, 'principalType' );
            const displayName = readField( raw, 'displayName' );

            if ( typeof principalId !== 'string' || typeof appRoleId !== 'string' ) {
                throw new ConfigurationError( `${label}: principalId and appRoleId are required strings` );
            }
            if ( principalType !== undefined && typeof principalType !== 'string' ) {
                throw new ConfigurationError( `${label}: principalType must be a string` );
            }

            return toAssignment( {
                principalId,
                appRoleId,
                principalType,
                displayName: typeof displayName === 'string' ? displayName : undefined
            }, label );
        } );
    }

    private parseCsv( content: string ): Assignment[] {
        const assignments: Assignment[] = [];
        let columns: { principalId: number; appRoleId: number; principalType: number } | undefined;

        for ( const [ index, rawLine ] of content.split( /\r?\n/ ).entries() ) {
            const line = rawLine.trim();
            if ( line === '' || line.startsWith( '#' ) ) continue;

            const cells = line.split( ',' ).map( cell => cell.trim() );
            const label = `Line ${index + 1} of ${this.filePath}`;

            if ( !columns ) {
                const header = cells.map( cell => cell.toLowerCase() );
                if ( header.includes( 'principalid' ) ) {
                    columns = {
                        principalId: header.indexOf( 'principalid' ),
                        appRoleId: header.indexOf( 'approleid' ),
                        principalType: header.indexOf( 'principaltype' )
                    };
                    if ( columns.appRoleId < 0 ) {
                        throw new ConfigurationError( `${label}: header must name an appRoleId column` );
                    }
                    continue;
                }
                columns = { principalId: 0, appRoleId: 1, principalType: 2 };
            }

            const principalId = cells[ columns.principalId ];
            const appRoleId = cells[ columns.appRoleId ];
            if ( !principalId || !appRoleId ) {
                throw new ConfigurationError( `${label}: expected principalId,appRoleId[,principalType]` );
            }

            assignments.push( toAssignment( {
                principalId,
                appRoleId,
                principalType: columns.principalType >= 0 ? cells[ columns.principalType ] : undefined
            }, label ) );
        }

        return assignments;
    }
}

/**
 * Every user member of a directory group should hold one role
 */
export class GroupDesiredStateSource implements DesiredStateSource {
    readonly remote = true;
    readonly description: string;

    constructor( private groupId: string, private appRoleId: string ) {
        ValidationUtils.validateGuid( groupId, 'group id' );
        ValidationUtils.validateGuid( appRoleId, 'app role id' );
        this.description = `members of group ${groupId} with role ${appRoleId}`;
    }

    async load( client?: DirectoryClient ): Promise<Assignment[]> {
        if ( !client ) {
            throw new ConfigurationError( 'Group desired-state source needs an open directory session' );
        }

        const members = await client.listGroupMembers( this.groupId );
        return members.map( member => ( {
            principal: { id: member.id, type: 'User', displayName: member.displayName },
            appRoleId: this.appRoleId
        } ) );
    }
}

function readField( source: unknown, key: string ): unknown {
    if ( typeof source === 'object' && source !== null && !Array.isArray( source ) && key in source ) {
        const value: unknown = Reflect.get( source, key );
        return value;
    }
    return undefined;
}
