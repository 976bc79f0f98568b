export { ForecastQuery, createForecastQuery } from './query';
export { SmhiForecastFetcher } from './ingest/fetcher';
export type { ForecastFetcher, SmhiForecastFetcherOptions } from './ingest/fetcher';
export { StaticForecastFetcher } from './ingest/static-fetcher';
export type { RecordedFetch } from './ingest/static-fetcher';
export { mapForecasts, octasToPercent, toInteger, PARAMETER_MAP, UNDETERMINED_CLOUDINESS } from './mapper';
export { parseForecastResponse } from './schema';
export { describeSymbol, isThunderSymbol } from './symbols';
export { buildForecastUrl, getApiBaseUrl, isDebugEnabled, isTestEnvironment, DEFAULT_API_BASE_URL } from './config';
export { createConsoleLogger, silentLogger } from './logger';
export type { ForecastLogger, LogContext } from './logger';
export {
    ForecastError,
    ForecastResponseError,
    MalformedResponseError,
    UnexpectedStatusError
} from './errors';
export type { ResponseIssue } from './errors';
export type { Coordinates, ForecastRecord, SmhiForecastResponse, SmhiParameter, SmhiTimeSeriesEntry } from './types';
