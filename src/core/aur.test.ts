import axios, { type InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from 'vitest';
import { RemoteConnectionError } from '../errors';
import { AurClient, INFO_CHUNK_SIZE } from './aur';

interface Reply {
    status: number;
    data: unknown;
}

// axios instance whose adapter answers in process
const fakeHttp = (respond: (params: URLSearchParams) => Reply) => {
    const requests: { url: string | undefined; params: URLSearchParams }[] = [];
    const http = axios.create({
        adapter: async (config: InternalAxiosRequestConfig) => {
            const params =
                config.params instanceof URLSearchParams
                    ? config.params
                    : new URLSearchParams();
            requests.push({ url: config.url, params });
            const { status, data } = respond(params);
            return { data, status, statusText: String(status), headers: {}, config };
        },
    });
    return { http, requests };
};

const record = (name: string, extra: Record<string, unknown> = {}) => ({
    ID: 1,
    Name: name,
    PackageBase: name,
    Version: '1.0-1',
    Description: `${name} description`,
    Maintainer: 'someone',
    Popularity: 0.5,
    ...extra,
});

const ok = (type: string, results: unknown[]): Reply => ({
    status: 200,
    data: { version: 5, type, resultcount: results.length, results },
});

describe('AurClient.search', () => {
    it('queries the RPC endpoint with a search argument', async () => {
        const { http, requests } = fakeHttp(() => ok('search', [record('yay')]));
        const client = new AurClient('https://aur.test/', http);

        const results = await client.search('yay');

        expect(requests).toHaveLength(1);
        expect(requests[0].url).toBe('https://aur.test/rpc');
        expect(requests[0].params.toString()).toBe('v=5&type=search&arg=yay');
        expect(results.map((r) => r.Name)).toEqual(['yay']);
        expect(results[0].Depends).toEqual([]);
        expect(results[0].MakeDepends).toEqual([]);
    });

    it('returns an empty list when nothing matches', async () => {
        const { http } = fakeHttp(() => ok('search', []));
        const client = new AurClient('https://aur.test', http);

        await expect(client.search('nothing-here')).resolves.toEqual([]);
    });

    it('fails with a connection error on a non-success status', async () => {
        const { http } = fakeHttp(() => ({ status: 503, data: 'unavailable' }));
        const client = new AurClient('https://aur.test', http);

        await expect(client.search('yay')).rejects.toMatchObject({
            name: 'RemoteConnectionError',
            status: 503,
        });
    });

    it('fails with a connection error when the transport fails', async () => {
        const http = axios.create({
            adapter: async () => {
                throw new Error('socket hang up');
            },
        });
        const client = new AurClient('https://aur.test', http);

        await expect(client.search('yay')).rejects.toBeInstanceOf(
            RemoteConnectionError,
        );
    });

    it('surfaces RPC error bodies as connection errors', async () => {
        const { http } = fakeHttp(() => ({
            status: 200,
            data: {
                version: 5,
                type: 'error',
                resultcount: 0,
                results: [],
                error: 'Too many package results.',
            },
        }));
        const client = new AurClient('https://aur.test', http);

        await expect(client.search('a')).rejects.toThrow(
            'AUR error: Too many package results.',
        );
    });
});

describe('AurClient.batchInfo', () => {
    it('splits large name sets into chunks', async () => {
        const { http, requests } = fakeHttp((params) =>
            ok(
                'multiinfo',
                params.getAll('arg[]').map((name) => record(name)),
            ),
        );
        const client = new AurClient('https://aur.test', http);
        const wanted = Array.from({ length: 450 }, (_, i) => `pkg${i}`);

        const results = await client.batchInfo(wanted);

        expect(INFO_CHUNK_SIZE).toBe(200);
        expect(requests.map((r) => r.params.getAll('arg[]').length)).toEqual([
            200, 200, 50,
        ]);
        expect(requests[0].params.get('type')).toBe('info');
        expect(results).toHaveLength(450);
    });

    it('leaves missing names out of the result', async () => {
        const { http } = fakeHttp(() =>
            ok('multiinfo', [record('present', { Depends: ['glibc'] })]),
        );
        const client = new AurClient('https://aur.test', http);

        const results = await client.batchInfo(['present', 'absent']);

        expect(results.map((r) => r.Name)).toEqual(['present']);
        expect(results[0].Depends).toEqual(['glibc']);
    });

    it('sends no request for an empty name set', async () => {
        const { http, requests } = fakeHttp(() => ok('multiinfo', []));
        const client = new AurClient('https://aur.test', http);

        await expect(client.batchInfo([])).resolves.toEqual([]);
        expect(requests).toHaveLength(0);
    });

    it('rejects malformed records', async () => {
        const { http } = fakeHttp(() => ok('multiinfo', [{ Name: 'broken' }]));
        const client = new AurClient('https://aur.test', http);

        await expect(client.batchInfo(['broken'])).rejects.toThrow(
            'Unexpected response from AUR.',
        );
    });
});

describe('AurClient.info', () => {
    it('returns the exact match or undefined', async () => {
        const { http } = fakeHttp((params) =>
            params.get('arg[]') === 'yay' ? ok('multiinfo', [record('yay')]) : ok('multiinfo', []),
        );
        const client = new AurClient('https://aur.test', http);

        expect((await client.info('yay'))?.Version).toBe('1.0-1');
        expect(await client.info('nope')).toBeUndefined();
    });
});
