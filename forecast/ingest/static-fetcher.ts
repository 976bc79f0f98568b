import type { AxiosInstance } from 'axios';
import type { ForecastFetcher } from './fetcher';

export interface RecordedFetch {
    mode: 'fetchJson' | 'fetchJsonAsync';
    longitude: string;
    latitude: string;
    session?: AxiosInstance;
}

/**
 * In-process ForecastFetcher that serves a fixed document from both paths.
 * Each call returns a fresh deep copy, so callers can't alter later results.
 */
export class StaticForecastFetcher implements ForecastFetcher {
    readonly calls: RecordedFetch[] = [];

    constructor(private readonly document: unknown) {}

    async fetchJson(longitude: string, latitude: string): Promise<unknown> {
        this.calls.push({ mode: 'fetchJson', longitude, latitude });
        return structuredClone(this.document);
    }

    async fetchJsonAsync(longitude: string, latitude: string, session?: AxiosInstance): Promise<unknown> {
        this.calls.push({ mode: 'fetchJsonAsync', longitude, latitude, session });
        return structuredClone(this.document);
    }
}
