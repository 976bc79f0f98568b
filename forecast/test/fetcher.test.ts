import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import axios, { type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { SmhiForecastFetcher } from '../ingest/fetcher';
import { MalformedResponseError, UnexpectedStatusError } from '../errors';
import { silentLogger } from '../logger';
import { mapForecasts } from '../mapper';

const BASE_URL = 'https://opendata-download-metfcst.smhi.se';
const LON = '18.0686';
const LAT = '59.3293';
const EXPECTED_URL =
    'https://opendata-download-metfcst.smhi.se/api/category/pmp3g/version/2/geotype/point/lon/18.0686/lat/59.3293/data.json';

const SAMPLE_BODY = JSON.stringify({
    approvedTime: '2026-03-02T10:05:12Z',
    timeSeries: [
        {
            validTime: '2026-03-02T11:00:00Z',
            parameters: [
                { name: 't', values: [6.1] },
                { name: 'r', values: [70] },
                { name: 'tcc_mean', values: [2] },
                { name: 'Wsymb2', values: [3] }
            ]
        },
        {
            validTime: '2026-03-02T12:00:00Z',
            parameters: [
                { name: 't', values: [7.4] },
                { name: 'msl', values: [1009] },
                { name: 'tstm', values: [20] },
                { name: 'Wsymb2', values: [11] }
            ]
        }
    ]
});

/** axios instance whose adapter answers in-process */
function createSession(body: string, status = 200, statusText = 'OK') {
    const adapter = vi.fn(
        async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => ({
            data: body,
            status,
            statusText,
            headers: {},
            config
        })
    );
    return { session: axios.create({ adapter }), adapter };
}

function createFetcher() {
    return new SmhiForecastFetcher({ baseUrl: BASE_URL, logger: silentLogger });
}

describe('SmhiForecastFetcher', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
        vi.unstubAllEnvs();
        vi.restoreAllMocks();
    });

    describe('fetchJson', () => {
        let mockFetch: Mock<(url: string) => Promise<Response>>;

        beforeEach(() => {
            mockFetch = vi.fn(async (_url: string) => new Response(SAMPLE_BODY, { status: 200 }));
            vi.stubGlobal('fetch', mockFetch);
        });

        it('requests the point forecast URL and returns the decoded document', async () => {
            const document = await createFetcher().fetchJson(LON, LAT);

            expect(mockFetch).toHaveBeenCalledTimes(1);
            expect(mockFetch).toHaveBeenCalledWith(EXPECTED_URL);
            expect(document).toEqual(JSON.parse(SAMPLE_BODY));
        });

        it('decodes UTF-8 bodies', async () => {
            const body = JSON.stringify({ timeSeries: [], station: 'Östersund–Frösön' });
            mockFetch.mockResolvedValue(new Response(new TextEncoder().encode(body), { status: 200 }));

            const document = await createFetcher().fetchJson(LON, LAT);

            expect(document).toEqual({ timeSeries: [], station: 'Östersund–Frösön' });
        });

        it('fails on a non-success status', async () => {
            mockFetch.mockResolvedValue(new Response('gone', { status: 404, statusText: 'Not Found' }));

            const attempt = createFetcher().fetchJson(LON, LAT);

            await expect(attempt).rejects.toBeInstanceOf(UnexpectedStatusError);
            await expect(attempt).rejects.toMatchObject({ status: 404, statusText: 'Not Found', url: EXPECTED_URL });
        });

        it('fails on a malformed body', async () => {
            mockFetch.mockResolvedValue(new Response('{"timeSeries": [', { status: 200 }));

            await expect(createFetcher().fetchJson(LON, LAT)).rejects.toBeInstanceOf(MalformedResponseError);
        });

        it('propagates network errors unchanged', async () => {
            const failure = new TypeError('fetch failed');
            mockFetch.mockRejectedValue(failure);

            await expect(createFetcher().fetchJson(LON, LAT)).rejects.toBe(failure);
        });
    });

    describe('fetchJsonAsync', () => {
        it('uses the supplied session', async () => {
            const { session, adapter } = createSession(SAMPLE_BODY);

            const document = await createFetcher().fetchJsonAsync(LON, LAT, session);

            expect(adapter).toHaveBeenCalledTimes(1);
            expect(adapter.mock.calls[0][0].url).toBe(EXPECTED_URL);
            expect(document).toEqual(JSON.parse(SAMPLE_BODY));
        });

        it('reuses one session across calls', async () => {
            const { session, adapter } = createSession(SAMPLE_BODY);
            const fetcher = createFetcher();

            await fetcher.fetchJsonAsync(LON, LAT, session);
            await fetcher.fetchJsonAsync('11.9746', '57.7089', session);

            expect(adapter).toHaveBeenCalledTimes(2);
            expect(adapter.mock.calls[1][0].url).toBe(
                'https://opendata-download-metfcst.smhi.se/api/category/pmp3g/version/2/geotype/point/lon/11.9746/lat/57.7089/data.json'
            );
        });

        it('creates a private session when none is supplied', async () => {
            const { session, adapter } = createSession(SAMPLE_BODY);
            const create = vi.spyOn(axios, 'create').mockReturnValue(session);

            const document = await createFetcher().fetchJsonAsync(LON, LAT);

            expect(create).toHaveBeenCalledTimes(1);
            expect(adapter).toHaveBeenCalledTimes(1);
            expect(document).toEqual(JSON.parse(SAMPLE_BODY));
        });

        it('requires status 200 exactly', async () => {
            const { session } = createSession('', 204, 'No Content');

            await expect(createFetcher().fetchJsonAsync(LON, LAT, session)).rejects.toMatchObject({
                name: 'UnexpectedStatusError',
                status: 204,
                url: EXPECTED_URL
            });
        });

        it('fails on a server error status', async () => {
            const { session } = createSession('{"error":"busy"}', 503, 'Service Unavailable');

            await expect(createFetcher().fetchJsonAsync(LON, LAT, session)).rejects.toBeInstanceOf(UnexpectedStatusError);
        });

        it('fails on a malformed body', async () => {
            const { session } = createSession('<html>maintenance</html>');

            await expect(createFetcher().fetchJsonAsync(LON, LAT, session)).rejects.toBeInstanceOf(MalformedResponseError);
        });
    });

    it('yields identical records from both paths for the same response', async () => {
        vi.stubGlobal('fetch', vi.fn(async () => new Response(SAMPLE_BODY, { status: 200 })));
        const { session } = createSession(SAMPLE_BODY);
        const fetcher = createFetcher();

        const blocking = mapForecasts(await fetcher.fetchJson(LON, LAT));
        const pooled = mapForecasts(await fetcher.fetchJsonAsync(LON, LAT, session));

        expect(pooled).toEqual(blocking);
        expect(blocking).toEqual([
            { temperature: 6, humidity: 70, pressure: 0, thunderProbability: 0, cloudiness: 25, symbolCode: 3 },
            { temperature: 7, humidity: 0, pressure: 1009, thunderProbability: 20, cloudiness: 0, symbolCode: 11 }
        ]);
    });

    it('leaves failure reporting to the caller', async () => {
        vi.stubEnv('SMHI_DEBUG', '');
        const error = vi.spyOn(console, 'error').mockImplementation(() => {});
        const log = vi.spyOn(console, 'log').mockImplementation(() => {});
        vi.stubGlobal('fetch', vi.fn(async (_url: string) => new Response('gone', { status: 404 })));
        const { session } = createSession('', 503, 'Service Unavailable');
        const fetcher = new SmhiForecastFetcher({ baseUrl: BASE_URL });

        await expect(fetcher.fetchJson(LON, LAT)).rejects.toBeInstanceOf(UnexpectedStatusError);
        await expect(fetcher.fetchJsonAsync(LON, LAT, session)).rejects.toBeInstanceOf(UnexpectedStatusError);

        expect(error).not.toHaveBeenCalled();
        expect(log).not.toHaveBeenCalled();
    });

    it('reads the base URL from the environment when none is given', async () => {
        vi.stubEnv('SMHI_API_BASE_URL', 'http://localhost:8787/');
        const mockFetch = vi.fn(async (_url: string) => new Response('{"timeSeries":[]}', { status: 200 }));
        vi.stubGlobal('fetch', mockFetch);

        await new SmhiForecastFetcher({ logger: silentLogger }).fetchJson(LON, LAT);

        expect(mockFetch).toHaveBeenCalledWith(
            'http://localhost:8787/api/category/pmp3g/version/2/geotype/point/lon/18.0686/lat/59.3293/data.json'
        );
    });
});
