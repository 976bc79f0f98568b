/**
 * Response schema for the point forecast document.
 *
 * Only the path the mapper walks is checked: timeSeries[].parameters[].name.
 * `values` is left unchecked here; the mapper validates values[0] for the
 * parameters it reads. Unknown keys at any level are stripped rather than
 * rejected so new API fields never break parsing.
 */

import { z } from 'zod';
import { ForecastResponseError } from './errors';
import type { SmhiForecastResponse } from './types';

export const ParameterSchema = z.object({
    name: z.string(),
    values: z.array(z.unknown()).optional()
});

export const TimeSeriesEntrySchema = z.object({
    parameters: z.array(ParameterSchema)
});

export const ForecastResponseSchema = z.object({
    timeSeries: z.array(TimeSeriesEntrySchema)
});

/**
 * Validate a decoded JSON document.
 * Throws ForecastResponseError listing every missing or mistyped field.
 */
export function parseForecastResponse(document: unknown): SmhiForecastResponse {
    const result = ForecastResponseSchema.safeParse(document);
    if (!result.success) {
        throw new ForecastResponseError(
            result.error.issues.map((issue) => ({
                path: issue.path.map((segment) => (typeof segment === 'number' ? segment : String(segment))),
                message: issue.message
            }))
        );
    }
    return result.data;
}
