/**
 * Centralized configuration for the SMHI forecast client.
 *
 * All environment-dependent values should be accessed through this module.
 */

export const DEFAULT_API_BASE_URL = 'https://opendata-download-metfcst.smhi.se';

const FORECAST_PATH = '/api/category/pmp3g/version/2/geotype/point';

/**
 * Get the API base URL.
 *
 * Priority:
 * 1. SMHI_API_BASE_URL environment variable (proxies, staging mirrors)
 * 2. The public SMHI open-data host
 */
export function getApiBaseUrl(): string {
    const raw = readEnv('SMHI_API_BASE_URL');
    const url = raw ? raw.trim().replace(/\/+$/, '') : '';
    return url || DEFAULT_API_BASE_URL;
}

/**
 * Debug logging is opt-in via SMHI_DEBUG=1|true|yes.
 */
export function isDebugEnabled(): boolean {
    const flag = (readEnv('SMHI_DEBUG') ?? '').trim().toLowerCase();
    return flag === '1' || flag === 'true' || flag === 'yes';
}

/**
 * Build the point forecast URL. Coordinates are inserted as given; the caller
 * owns their formatting.
 */
export function buildForecastUrl(longitude: string, latitude: string, baseUrl: string = getApiBaseUrl()): string {
    return `${baseUrl}${FORECAST_PATH}/lon/${longitude}/lat/${latitude}/data.json`;
}

/**
 * Check if running in test environment.
 */
export function isTestEnvironment(): boolean {
    return readEnv('NODE_ENV') === 'test';
}

function readEnv(name: string): string | undefined {
    return typeof process !== 'undefined' ? process.env?.[name] : undefined;
}
