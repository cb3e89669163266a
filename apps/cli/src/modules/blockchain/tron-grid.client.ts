import axios, { type AxiosInstance } from 'axios';
import type { ILogger, IResourceFetcher, IResourceReading } from '@resource-monitor/types';
import { FetchError } from '../../lib/errors.js';
import { retry, type RetryOptions } from '../../lib/retry.js';

/**
 * Response from the `/wallet/getaccountresource` endpoint.
 *
 * The node omits counters that are zero, so every per-account field is
 * optional. An invalid request is answered with HTTP 200 and an `Error` field.
 */
export interface TronGridAccountResourceResponse {
    EnergyLimit?: number;
    EnergyUsed?: number;
    NetLimit?: number;
    NetUsed?: number;
    freeNetLimit?: number;
    freeNetUsed?: number;
    TotalEnergyLimit?: number;
    TotalEnergyWeight?: number;
    TotalNetLimit?: number;
    TotalNetWeight?: number;
    Error?: string;
}

export interface TronGridClientOptions {
    /** Full node base URL, e.g. https://api.trongrid.io */
    nodeUrl: string;
    retry: Pick<RetryOptions, 'retries' | 'delayMs' | 'factor'>;
}

function toCounter(value: number | undefined): number {
    return typeof value === 'number' && Number.isFinite(value) ? value : 0;
}

/**
 * Reads account resource counters from a TRON full node's HTTP API.
 *
 * Each `fetch` is one logical reading: transient failures are retried with
 * exponential backoff before the call rejects with a `FetchError`. The HTTP
 * client carries the timeout and the optional TronGrid API key.
 */
export class TronGridClient implements IResourceFetcher {
    private readonly nodeUrl: string;
    private readonly logger: ILogger;

    constructor(
        private readonly http: AxiosInstance,
        logger: ILogger,
        private readonly options: TronGridClientOptions
    ) {
        this.nodeUrl = options.nodeUrl.replace(/\/+$/u, '');
        this.logger = logger.child({ module: 'tron-grid', node: this.nodeUrl });
    }

    getNodeUrl(): string {
        return this.nodeUrl;
    }

    async fetch(address: string, signal?: AbortSignal): Promise<IResourceReading> {
        const response = await retry(
            () => this.post<TronGridAccountResourceResponse>('/wallet/getaccountresource', { address, visible: true }, signal),
            {
                ...this.options.retry,
                signal,
                onRetry: (attempt, error) =>
                    this.logger.debug({ attempt, address, error: describeError(error) }, 'Retrying getaccountresource')
            }
        );

        return {
            energyLimit: toCounter(response.EnergyLimit),
            energyUsed: toCounter(response.EnergyUsed),
            netLimit: toCounter(response.NetLimit),
            netUsed: toCounter(response.NetUsed),
            freeNetLimit: toCounter(response.freeNetLimit),
            freeNetUsed: toCounter(response.freeNetUsed)
        };
    }

    private async post<T extends { Error?: string }>(
        path: string,
        payload: Record<string, unknown>,
        signal?: AbortSignal
    ): Promise<T> {
        let data: T;
        try {
            const response = await this.http.post<T>(`${this.nodeUrl}${path}`, payload, { signal });
            data = response.data;
        } catch (error: unknown) {
            if (axios.isAxiosError(error)) {
                if (error.response?.status === 429) {
                    throw new FetchError('TronGrid API rate limit exceeded (HTTP 429)', { path, status: 429 });
                }
                throw new FetchError(`Request to ${path} failed: ${error.message}`, {
                    path,
                    status: error.response?.status,
                    code: error.code
                });
            }
            throw new FetchError(`Request to ${path} failed: ${describeError(error)}`, { path });
        }

        if (typeof data !== 'object' || data === null) {
            throw new FetchError(`Unexpected response from ${path}`, { path, data });
        }
        if (data.Error) {
            throw new FetchError(`Node rejected ${path}: ${data.Error}`, { path });
        }

        return data;
    }
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
