import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { RemoteConnectionError, errorMessage } from '../errors';
import logger from '../logger';

// The RPC endpoint rejects overly long query strings.
const INFO_CHUNK_SIZE = 200;

const dependencyList = () => z.array(z.string()).optional().default([]);

const remotePackageSchema = z.object({
    ID: z.number(),
    Name: z.string(),
    PackageBase: z.string(),
    Version: z.string(),
    Description: z.string().nullable().optional().default(null),
    Maintainer: z.string().nullable().optional().default(null),
    Popularity: z.number().optional().default(0),
    NumVotes: z.number().optional(),
    OutOfDate: z.number().nullable().optional(),
    URL: z.string().nullable().optional(),
    Depends: dependencyList(),
    MakeDepends: dependencyList(),
    CheckDepends: dependencyList(),
    OptDepends: dependencyList(),
});

const rpcResponseSchema = z.discriminatedUnion('type', [
    z.object({
        type: z.literal('error'),
        error: z.string(),
    }),
    z.object({
        type: z.enum(['search', 'multiinfo', 'info']),
        resultcount: z.number(),
        results: z.array(remotePackageSchema),
    }),
]);

type RemotePackage = z.infer<typeof remotePackageSchema>;
type RemotePackageInput = z.input<typeof remotePackageSchema>;

const chunk = <T>(items: readonly T[], size: number): T[][] => {
    const chunks: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        chunks.push(items.slice(i, i + size));
    }
    return chunks;
};

class AurClient {
    private readonly endpoint: string;
    private readonly http: AxiosInstance;

    constructor(aurUrl: string, http: AxiosInstance = axios.create()) {
        this.endpoint = `${aurUrl.replace(/\/+$/, '')}/rpc`;
        this.http = http;
    }

    private async query(params: URLSearchParams): Promise<RemotePackage[]> {
        const response = await this.http
            .get<unknown>(this.endpoint, {
                params,
                validateStatus: () => true,
            })
            .catch((err: unknown) => {
                throw new RemoteConnectionError(
                    `Could not connect to AUR. Reason: ${errorMessage(err)}`,
                );
            });
        if (response.status < 200 || response.status >= 300) {
            throw new RemoteConnectionError(
                `Could not connect to AUR (HTTP ${response.status}).`,
                response.status,
            );
        }
        const parsed = rpcResponseSchema.safeParse(response.data);
        if (!parsed.success) {
            logger.debug(`Unexpected AUR response: ${parsed.error.message}`);
            throw new RemoteConnectionError('Unexpected response from AUR.');
        }
        if (parsed.data.type === 'error') {
            throw new RemoteConnectionError(`AUR error: ${parsed.data.error}`);
        }
        return parsed.data.results;
    }

    async search(term: string): Promise<RemotePackage[]> {
        logger.debug(`Searching AUR for ${term}`);
        return this.query(
            new URLSearchParams({ v: '5', type: 'search', arg: term }),
        );
    }

    async batchInfo(names: Iterable<string>): Promise<RemotePackage[]> {
        const unique = Array.from(new Set(names));
        const results: RemotePackage[] = [];
        for (const part of chunk(unique, INFO_CHUNK_SIZE)) {
            logger.debug(`Fetching AUR info for ${part.length} package(s)`);
            const params = new URLSearchParams({ v: '5', type: 'info' });
            part.forEach((name) => params.append('arg[]', name));
            results.push(...(await this.query(params)));
        }
        return results;
    }

    async info(name: string): Promise<RemotePackage | undefined> {
        const results = await this.batchInfo([name]);
        return results.find((pkg) => pkg.Name === name);
    }
}

export { AurClient, INFO_CHUNK_SIZE, remotePackageSchema };
export type { RemotePackage, RemotePackageInput };
