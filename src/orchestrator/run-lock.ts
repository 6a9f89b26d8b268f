// Run lock - at most one sync run per application at a time

/**
 * Non-blocking lock keyed by application id. A second run is rejected, not queued.
 */
export class AppRunLock {
    private held: Map<string, string> = new Map();

    /**
     * Take the lock for an application. Returns false when another run holds it.
     */
    tryAcquire( appId: string, runId: string ): boolean {
        const key = appId.toLowerCase();
        if ( this.held.has( key ) ) {
            return false;
        }
        this.held.set( key, runId );
        return true;
    }

    /**
     * Release the lock if this run holds it
     */
    release( appId: string, runId: string ): void {
        const key = appId.toLowerCase();
        if ( this.held.get( key ) === runId ) {
            this.held.delete( key );
        }
    }

    holder( appId: string ): string | undefined {
        return this.held.get( appId.toLowerCase() );
    }
}

/** Lock shared by every orchestrator in this process */
export const defaultRunLock = new AppRunLock();
