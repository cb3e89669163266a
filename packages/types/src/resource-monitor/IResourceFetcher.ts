import type { IResourceReading } from './IResourceReading.js';

/**
 * Source of raw resource readings for a single account.
 *
 * Implementations own retry, backoff and request timeouts. The sampler treats
 * any rejection as one missed sample and never inspects its kind.
 */
export interface IResourceFetcher {
    /**
     * Fetch the current resource counters for an account.
     *
     * @param address - Base58 account address
     * @param signal - Aborts in-flight requests and pending backoff waits
     * @throws FetchError when the node cannot be reached or rejects the request
     */
    fetch(address: string, signal?: AbortSignal): Promise<IResourceReading>;
}
