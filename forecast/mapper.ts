/**
 * SMHI Point Forecast — Mapper
 *
 * Projects the named parameters of each time-series entry onto a ForecastRecord.
 * One record per entry, same order as the document (nearest time first).
 */

import { ForecastResponseError } from './errors';
import { parseForecastResponse } from './schema';
import type { ForecastRecord, SmhiParameter } from './types';

// =============================================================================
// Parameter Table
// =============================================================================

type RecordField = keyof ForecastRecord;

/**
 * Parameter name → record field, with the transform applied to values[0].
 * Names not listed here are ignored.
 */
export const PARAMETER_MAP: Readonly<Record<string, { field: RecordField; transform: (value: number) => number }>> = {
    t: { field: 'temperature', transform: toInteger },
    r: { field: 'humidity', transform: toInteger },
    msl: { field: 'pressure', transform: toInteger },
    tstm: { field: 'thunderProbability', transform: toInteger },
    tcc_mean: { field: 'cloudiness', transform: (value) => octasToPercent(toInteger(value)) },
    Wsymb2: { field: 'symbolCode', transform: toInteger }
};

/** Cloud cover reported outside 0..8 octas is treated as overcast. */
export const UNDETERMINED_CLOUDINESS = 100;

// =============================================================================
// Mapping
// =============================================================================

/**
 * Map a decoded forecast document to records.
 *
 * @throws ForecastResponseError when `timeSeries` or an entry's `parameters`
 *   is missing, or a known parameter's first value is absent or not a number.
 */
export function mapForecasts(document: unknown): ForecastRecord[] {
    const response = parseForecastResponse(document);

    return response.timeSeries.map((entry, entryIndex) => {
        const fields: Record<RecordField, number> = {
            temperature: 0,
            humidity: 0,
            pressure: 0,
            thunderProbability: 0,
            cloudiness: 0,
            symbolCode: 0
        };

        entry.parameters.forEach((param, paramIndex) => {
            if (!Object.prototype.hasOwnProperty.call(PARAMETER_MAP, param.name)) return;
            const rule = PARAMETER_MAP[param.name];
            fields[rule.field] = rule.transform(firstValue(param, entryIndex, paramIndex));
        });

        return createForecastRecord(fields);
    });
}

export function createForecastRecord(fields: ForecastRecord): ForecastRecord {
    return Object.freeze({
        temperature: fields.temperature,
        humidity: fields.humidity,
        pressure: fields.pressure,
        thunderProbability: fields.thunderProbability,
        cloudiness: fields.cloudiness,
        symbolCode: fields.symbolCode
    });
}

// =============================================================================
// Conversions
// =============================================================================

/**
 * Integer cast: drops the fractional part (toward zero).
 */
export function toInteger(value: number): number {
    // Math.trunc(-0.4) is -0
    return Math.trunc(value) || 0;
}

/**
 * Convert cloud cover in octas (0 clear … 8 overcast) to percent.
 * Out-of-range values fall back to UNDETERMINED_CLOUDINESS.
 */
export function octasToPercent(octa: number): number {
    if (octa >= 0 && octa <= 8) {
        return roundHalfEven((100 * octa) / 8);
    }
    return UNDETERMINED_CLOUDINESS;
}

/**
 * Round to nearest integer, ties to even (1 octa = 12.5% → 12, 3 octas → 38).
 */
export function roundHalfEven(n: number): number {
    const floor = Math.floor(n);
    const diff = n - floor;
    if (diff > 0.5) return floor + 1;
    if (diff < 0.5) return floor;
    return floor % 2 === 0 ? floor : floor + 1;
}

function firstValue(param: SmhiParameter, entryIndex: number, paramIndex: number): number {
    const path = ['timeSeries', entryIndex, 'parameters', paramIndex, 'values'];
    if (!param.values || param.values.length === 0) {
        throw new ForecastResponseError([{ path, message: `Parameter "${param.name}" has no values` }]);
    }
    const value = param.values[0];
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new ForecastResponseError([
            { path: [...path, 0], message: `Parameter "${param.name}" has a non-numeric first value` }
        ]);
    }
    return value;
}
