/**
 * Error types raised by the forecast client.
 * Nothing here is recovered locally; every error reaches the caller.
 */

export interface ResponseIssue {
    /** Location inside the document, e.g. ["timeSeries", 0, "parameters"] */
    path: Array<string | number>;
    message: string;
}

export class ForecastError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * The API answered with a status other than the one the fetch path requires.
 */
export class UnexpectedStatusError extends ForecastError {
    constructor(
        public readonly status: number,
        public readonly statusText: string,
        public readonly url: string
    ) {
        super(`Fetch failed: ${status} ${statusText} (${url})`);
    }
}

/**
 * The response body was not valid JSON.
 */
export class MalformedResponseError extends ForecastError {
    constructor(public readonly url: string, cause: unknown) {
        super(`Malformed JSON from ${url}`, { cause });
    }
}

/**
 * The JSON document is missing `timeSeries`, an entry's `parameters`,
 * or a parameter's `name`/`values`.
 */
export class ForecastResponseError extends ForecastError {
    constructor(public readonly issues: ResponseIssue[]) {
        super(`Invalid forecast document: ${issues.map(formatIssue).join('; ')}`);
    }
}

function formatIssue(issue: ResponseIssue): string {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
}
