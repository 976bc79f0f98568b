import type { AxiosInstance } from 'axios';
import { SmhiForecastFetcher, type ForecastFetcher } from './ingest/fetcher';
import { mapForecasts } from './mapper';
import type { Coordinates, ForecastRecord } from './types';

/**
 * Forecast for one point. Every call goes back to the fetcher; nothing is cached.
 */
export class ForecastQuery {
    constructor(
        public readonly longitude: string,
        public readonly latitude: string,
        public readonly fetcher: ForecastFetcher = new SmhiForecastFetcher()
    ) {}

    /** Records nearest-first, via the fetcher's self-contained path. */
    public async fetchForecasts(): Promise<ForecastRecord[]> {
        const document = await this.fetcher.fetchJson(this.longitude, this.latitude);
        return mapForecasts(document);
    }

    /** Records nearest-first, via an optional shared axios session. */
    public async fetchForecastsAsync(session?: AxiosInstance): Promise<ForecastRecord[]> {
        const document = await this.fetcher.fetchJsonAsync(this.longitude, this.latitude, session);
        return mapForecasts(document);
    }

    /** The nearest time point, or undefined when the series is empty. */
    public async currentForecast(session?: AxiosInstance): Promise<ForecastRecord | undefined> {
        const [first] = await this.fetchForecastsAsync(session);
        return first;
    }
}

export function createForecastQuery(coordinates: Coordinates, fetcher?: ForecastFetcher): ForecastQuery {
    return new ForecastQuery(coordinates.longitude, coordinates.latitude, fetcher ?? new SmhiForecastFetcher());
}
