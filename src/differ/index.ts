// State Differ - computes the grant/revoke delta between current and desired assignments
import { Assignment, assignmentKey, compareAssignments, Delta } from '../types';

/**
 * Pure comparison of two assignment snapshots.
 * Identity is (principal id, role id); a principal whose role changes yields an independent grant and revoke.
 */
export class StateDiffer {
    /**
     * Compute the minimal delta so that (current - toRevoke) + toGrant equals desired
     */
    diff( current: Assignment[], desired: Assignment[] ): Delta {
        const currentByKey = this.index( current );
        const desiredByKey = this.index( desired );

        const toGrant: Assignment[] = [];
        const toRevoke: Assignment[] = [];
        let unchanged = 0;

        for ( const [ key, assignment ] of desiredByKey ) {
            if ( currentByKey.has( key ) ) {
                unchanged++;
            } else {
                toGrant.push( assignment );
            }
        }

        for ( const [ key, assignment ] of currentByKey ) {
            if ( !desiredByKey.has( key ) ) {
                toRevoke.push( assignment );
            }
        }

        return {
            toGrant: toGrant.sort( compareAssignments ),
            toRevoke: toRevoke.sort( compareAssignments ),
            unchanged,
            fullRevoke: desiredByKey.size === 0 && currentByKey.size > 0
        };
    }

    /**
     * State the directory will hold once the delta is fully applied
     */
    projectState( current: Assignment[], delta: Delta ): Assignment[] {
        const revoked = new Set( delta.toRevoke.map( assignmentKey ) );
        const projected = this.index( current );

        for ( const key of revoked ) {
            projected.delete( key );
        }
        for ( const assignment of delta.toGrant ) {
            const key = assignmentKey( assignment );
            if ( !projected.has( key ) ) {
                projected.set( key, assignment );
            }
        }

        return [ ...projected.values() ].sort( compareAssignments );
    }

    /**
     * Collapse duplicates, keeping the first entry that carries a directory record id
     */
    private index( assignments: Assignment[] ): Map<string, Assignment> {
        const byKey = new Map<string, Assignment>();

        for ( const assignment of assignments ) {
            const key = assignmentKey( assignment );
            const existing = byKey.get( key );

            if ( !existing || ( !existing.assignmentId && assignment.assignmentId ) ) {
                byKey.set( key, assignment );
            }
        }

        return byKey;
    }
}
