// Tests for State Differ
import { StateDiffer } from './index';
import { Assignment } from '../types';

const USER_A = 'aaaaaaaa-0000-0000-0000-000000000001';
const USER_B = 'aaaaaaaa-0000-0000-0000-000000000002';
const GROUP_C = 'cccccccc-0000-0000-0000-000000000003';
const READER = 'bbbbbbbb-0000-0000-0000-000000000001';
const WRITER = 'bbbbbbbb-0000-0000-0000-000000000002';

function assignment( principalId: string, appRoleId: string, assignmentId?: string ): Assignment {
    return { principal: { id: principalId, type: 'User' }, appRoleId, assignmentId };
}

describe( 'StateDiffer', () => {
    let differ: StateDiffer;

    beforeEach( () => {
        differ = new StateDiffer();
    } );

    it( 'should produce an empty delta when states match', () => {
        const current = [ assignment( USER_A, READER, 'asg-1' ) ];
        const desired = [ assignment( USER_A, READER ) ];

        expect( differ.diff( current, desired ) ).toEqual( {
            toGrant: [],
            toRevoke: [],
            unchanged: 1,
            fullRevoke: false
        } );
    } );

    it( 'should grant missing and revoke extra assignments', () => {
        const current = [ assignment( USER_A, READER, 'asg-1' ), assignment( USER_B, READER, 'asg-2' ) ];
        const desired = [ assignment( USER_A, READER ), assignment( GROUP_C, WRITER ) ];

        const delta = differ.diff( current, desired );

        expect( delta.toGrant ).toEqual( [ assignment( GROUP_C, WRITER ) ] );
        expect( delta.toRevoke ).toEqual( [ assignment( USER_B, READER, 'asg-2' ) ] );
        expect( delta.unchanged ).toBe( 1 );
    } );

    it( 'should treat a role change as an independent grant and revoke', () => {
        const delta = differ.diff( [ assignment( USER_A, READER, 'asg-1' ) ], [ assignment( USER_A, WRITER ) ] );

        expect( delta.toGrant ).toEqual( [ assignment( USER_A, WRITER ) ] );
        expect( delta.toRevoke ).toEqual( [ assignment( USER_A, READER, 'asg-1' ) ] );
        expect( delta.unchanged ).toBe( 0 );
    } );

    it( 'should compare ids case-insensitively', () => {
        const delta = differ.diff( [ assignment( USER_A.toUpperCase(), READER, 'asg-1' ) ], [ assignment( USER_A, READER.toUpperCase() ) ] );

        expect( delta.toGrant ).toHaveLength( 0 );
        expect( delta.toRevoke ).toHaveLength( 0 );
        expect( delta.unchanged ).toBe( 1 );
    } );

    it( 'should collapse duplicate entries', () => {
        const desired = [ assignment( USER_B, READER ), assignment( USER_B, READER ), assignment( USER_B.toUpperCase(), READER ) ];
        const current = [ assignment( USER_A, READER ), assignment( USER_A, READER, 'asg-1' ) ];

        const delta = differ.diff( current, desired );

        expect( delta.toGrant ).toEqual( [ assignment( USER_B, READER ) ] );
        expect( delta.toRevoke ).toEqual( [ assignment( USER_A, READER, 'asg-1' ) ] );
    } );

    it( 'should sort output by principal id then role id', () => {
        const desired = [
            assignment( USER_B, WRITER ),
            assignment( USER_A, WRITER ),
            assignment( USER_B, READER )
        ];

        const delta = differ.diff( [], desired );

        expect( delta.toGrant.map( a => [ a.principal.id, a.appRoleId ] ) ).toEqual( [
            [ USER_A, WRITER ],
            [ USER_B, READER ],
            [ USER_B, WRITER ]
        ] );
    } );

    it( 'should flag a full revoke when desired state is empty', () => {
        const delta = differ.diff( [ assignment( USER_A, READER, 'asg-1' ) ], [] );

        expect( delta.fullRevoke ).toBe( true );
        expect( delta.toRevoke ).toHaveLength( 1 );
    } );

    it( 'should not flag a full revoke when both states are empty', () => {
        expect( differ.diff( [], [] ).fullRevoke ).toBe( false );
    } );

    it( 'should project the state reached after applying the delta', () => {
        const current = [ assignment( USER_A, READER, 'asg-1' ), assignment( USER_B, READER, 'asg-2' ) ];
        const desired = [ assignment( USER_B, READER ), assignment( GROUP_C, WRITER ), assignment( USER_A, WRITER ) ];

        const delta = differ.diff( current, desired );
        const projected = differ.projectState( current, delta );

        expect( differ.diff( projected, desired ) ).toMatchObject( { toGrant: [], toRevoke: [], unchanged: 3 } );
    } );
} );
