/**
 * SMHI Point Forecast — Ingest Fetcher
 *
 * Fetches the raw point forecast document from SMHI open data.
 * No transformation here: the decoded JSON goes straight to the mapper.
 */

import axios, { type AxiosInstance } from 'axios';
import { buildForecastUrl, getApiBaseUrl } from '../config';
import { MalformedResponseError, UnexpectedStatusError } from '../errors';
import { createConsoleLogger, type ForecastLogger } from '../logger';

// =============================================================================
// Fetch Capability
// =============================================================================

/**
 * The two fetch operations the ForecastQuery facade depends on.
 * Swap in StaticForecastFetcher (or any other implementation) through the
 * constructor to run without the network.
 */
export interface ForecastFetcher {
    /**
     * One self-contained GET on the platform fetch.
     * Fails on any non-2xx status or undecodable body.
     */
    fetchJson(longitude: string, latitude: string): Promise<unknown>;

    /**
     * GET through an axios session. Pass a long-lived instance to pool
     * connections across calls; without one a private instance is used.
     * Fails unless the status is exactly 200.
     */
    fetchJsonAsync(longitude: string, latitude: string, session?: AxiosInstance): Promise<unknown>;
}

export interface SmhiForecastFetcherOptions {
    /** Defaults to getApiBaseUrl() at construction time */
    baseUrl?: string;
    logger?: ForecastLogger;
}

// =============================================================================
// Network Implementation
// =============================================================================

export class SmhiForecastFetcher implements ForecastFetcher {
    private readonly baseUrl: string;
    private readonly logger: ForecastLogger;

    constructor(options: SmhiForecastFetcherOptions = {}) {
        this.baseUrl = options.baseUrl ?? getApiBaseUrl();
        this.logger = options.logger ?? createConsoleLogger();
    }

    async fetchJson(longitude: string, latitude: string): Promise<unknown> {
        const url = buildForecastUrl(longitude, latitude, this.baseUrl);
        const startedAt = Date.now();
        this.logger.debug('fetch start', { url });

        const response = await fetch(url);
        if (!response.ok) {
            this.logger.debug('fetch failed', { url, status: response.status });
            throw new UnexpectedStatusError(response.status, response.statusText, url);
        }

        const text = await response.text();
        this.logger.debug('fetch ok', { url, status: response.status, ms: Date.now() - startedAt });
        return parseJsonBody(text, url);
    }

    async fetchJsonAsync(longitude: string, latitude: string, session?: AxiosInstance): Promise<unknown> {
        const url = buildForecastUrl(longitude, latitude, this.baseUrl);
        const client = session ?? axios.create();
        const startedAt = Date.now();
        this.logger.debug('fetch start', { url, pooled: session !== undefined });

        const response = await client.request<string>({
            method: 'GET',
            url,
            responseType: 'text',
            responseEncoding: 'utf8',
            // Keep the raw body so decode failures surface as MalformedResponseError
            transformResponse: [(data: unknown) => data],
            validateStatus: () => true
        });

        if (response.status !== 200) {
            this.logger.debug('fetch failed', { url, status: response.status });
            throw new UnexpectedStatusError(response.status, response.statusText, url);
        }

        this.logger.debug('fetch ok', { url, status: response.status, ms: Date.now() - startedAt });
        return parseJsonBody(response.data, url);
    }
}

// =============================================================================
// Utilities
// =============================================================================

function parseJsonBody(body: string, url: string): unknown {
    try {
        return JSON.parse(body) as unknown;
    } catch (error) {
        throw new MalformedResponseError(url, error);
    }
}
