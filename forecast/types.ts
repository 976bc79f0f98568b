/**
 * SMHI Point Forecast — Core Type Definitions
 *
 * Wire types mirror the `pmp3g` v2 point forecast document. Only the fields the
 * mapper reads are typed; everything else SMHI sends is left alone.
 */

// =============================================================================
// Wire Types
// =============================================================================

export interface SmhiParameter {
    /** Parameter short name (e.g., "t", "msl", "Wsymb2") */
    name: string;

    /** Parameter values; only the first one is read, and only for known names */
    values?: unknown[];
}

/**
 * One forecast time point with its named parameters.
 */
export interface SmhiTimeSeriesEntry {
    parameters: SmhiParameter[];
}

export interface SmhiForecastResponse {
    /** Ordered nearest-first */
    timeSeries: SmhiTimeSeriesEntry[];
}

// =============================================================================
// Forecast Records
// =============================================================================

/**
 * A single mapped forecast time point.
 * Immutable: records are frozen when built and never mutated afterwards.
 */
export interface ForecastRecord {
    /** Air temperature (°C) */
    readonly temperature: number;

    /** Relative humidity (%) */
    readonly humidity: number;

    /** Mean sea level pressure (hPa) */
    readonly pressure: number;

    /** Probability of thunder (%) */
    readonly thunderProbability: number;

    /** Total cloud cover converted from octas (%) */
    readonly cloudiness: number;

    /** Weather symbol category, 1–27 */
    readonly symbolCode: number;
}

/**
 * Longitude/latitude pair, passed through to the URL verbatim.
 */
export interface Coordinates {
    readonly longitude: string;
    readonly latitude: string;
}
