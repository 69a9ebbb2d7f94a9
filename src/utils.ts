import { spawn, type SpawnOptions } from 'child_process';
import type { Readable } from 'stream';

interface SpawnResult {
    stdout: string;
    stderr: string;
    code: number | null;
    signal: NodeJS.Signals | null;
}

interface SpawnPromiseOptions extends SpawnOptions {
    encoding?: BufferEncoding;
    maxBuffer?: number;
}

type CommandRunner = (
    command: string,
    args?: string[],
    options?: SpawnPromiseOptions,
) => Promise<SpawnResult>;

/** Output of a stream kept in memory, up to `limit` bytes. */
function collect(
    stream: Readable | null,
    limit: number,
    onOverflow: () => void,
): () => Buffer {
    const chunks: Buffer[] = [];
    let size = 0;
    stream?.on('data', (chunk: Buffer) => {
        size += chunk.length;
        if (size > limit) {
            onOverflow();
            return;
        }
        chunks.push(chunk);
    });
    return () => Buffer.concat(chunks);
}

/**
 * Runs a command and resolves with its output and exit status once it
 * closes. A nonzero exit is not an error here; only a spawn failure or an
 * output larger than `maxBuffer` rejects.
 */
function spawnPromise(
    command: string,
    args: string[] = [],
    options: SpawnPromiseOptions = {},
): Promise<SpawnResult> {
    return new Promise((resolve, reject) => {
        const {
            encoding = 'utf8',
            maxBuffer = 10 * 1024 * 1024,
            ...spawnOpts
        } = options;

        const child = spawn(command, args, spawnOpts);
        const overflow = (name: string) => () => {
            child.kill();
            reject(new Error(`${name} maxBuffer exceeded: ${maxBuffer} bytes`));
        };
        const stdout = collect(child.stdout, maxBuffer, overflow('stdout'));
        const stderr = collect(child.stderr, maxBuffer, overflow('stderr'));

        child.on('error', reject);
        child.on('close', (code, signal) => {
            resolve({
                stdout: stdout().toString(encoding),
                stderr: stderr().toString(encoding),
                code,
                signal,
            });
        });
    });
}

async function spawnPromiseStrict(
    command: string,
    args: string[] = [],
    options: SpawnPromiseOptions = {},
): Promise<SpawnResult> {
    const result = await spawnPromise(command, args, options);

    if (result.code !== 0) {
        throw Object.assign(
            new Error(
                `Command failed with exit code ${
                    result.code
                }: ${command} ${args.join(' ')}\n${result.stderr}`,
            ),
            result,
        );
    }

    return result;
}

async function commandExists(command: string): Promise<boolean> {
    try {
        await spawnPromiseStrict(command, ['--version'], { stdio: 'ignore' });
        return true;
    } catch {
        return false;
    }
}

const escapeRegExp = (value: string): string =>
    value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export { spawnPromise, spawnPromiseStrict, commandExists, escapeRegExp };
export type { SpawnResult, SpawnPromiseOptions, CommandRunner };
