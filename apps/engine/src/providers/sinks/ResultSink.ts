/**
 * Result Sink Interface
 *
 * Defines the contract for destinations that record successful results.
 * Implementations write local report files or append to remote grids.
 */

import { StampedResult } from '../../pipeline/types';

export interface ResultSink {
    /**
     * Sink name for logging
     */
    readonly name: string;

    /**
     * Local sinks are always written before remote ones
     */
    readonly kind: 'local' | 'remote';

    /**
     * Record one successful result; rejects on failure
     */
    store(result: StampedResult): Promise<void>;

    /**
     * Check if the sink is properly configured
     */
    isConfigured(): boolean;

    /**
     * Test connection to the destination
     */
    testConnection(): Promise<boolean>;
}
