import { NativeInstallError, RemoveError } from '../errors';
import logger from '../logger';
import type { Config, InstalledRecord, NativeGateway } from '../types';
import { spawnPromise, escapeRegExp, type CommandRunner } from '../utils';

const PACMAN = 'pacman';

const parseQueryLine = (line: string): InstalledRecord | undefined => {
    const [name, installedVersion] = line.trim().split(/\s+/);
    if (!name || !installedVersion) {
        return undefined;
    }
    return { name, installedVersion };
};

/**
 * Thin wrapper around pacman. Every method is a single pacman invocation;
 * privileged ones go through the configured su program and inherit the
 * terminal so pacman can ask its own questions.
 */
class PacmanGateway implements NativeGateway {
    constructor(
        private readonly config: Pick<Config, 'suProgram'>,
        private readonly run: CommandRunner = spawnPromise,
    ) {}

    async isAvailable(name: string): Promise<boolean> {
        const result = await this.run(
            PACMAN,
            ['-Ss', `^${escapeRegExp(name)}$`],
            { stdio: 'ignore' },
        );
        return result.code === 0;
    }

    async installedVersion(name: string): Promise<string | undefined> {
        const result = await this.run(PACMAN, ['-Q', name]);
        if (result.code !== 0) {
            return undefined;
        }
        return result.stdout
            .split('\n')
            .map(parseQueryLine)
            .find((record) => record?.name === name)?.installedVersion;
    }

    async installFromNative(name: string, asDependency: boolean): Promise<void> {
        const args = [PACMAN, '-S', '--needed'];
        if (asDependency) {
            args.push('--asdeps');
        }
        args.push(name);
        logger.verbose(`Running ${this.config.suProgram} ${args.join(' ')}`);
        const result = await this.run(this.config.suProgram, args, {
            stdio: 'inherit',
        });
        if (result.code !== 0) {
            throw new NativeInstallError(name, result.code);
        }
    }

    async remove(name: string): Promise<void> {
        const args = [PACMAN, '-R', name];
        logger.verbose(`Running ${this.config.suProgram} ${args.join(' ')}`);
        const result = await this.run(this.config.suProgram, args, {
            stdio: 'inherit',
        });
        if (result.code !== 0) {
            throw new RemoveError(name, result.code);
        }
    }

    async listForeign(): Promise<InstalledRecord[]> {
        const result = await this.run(PACMAN, ['-Qm']);
        // pacman exits 1 when no foreign package is installed
        if (result.code !== 0) {
            return [];
        }
        return result.stdout
            .split('\n')
            .map(parseQueryLine)
            .filter((record): record is InstalledRecord => record !== undefined);
    }
}

export { PacmanGateway, parseQueryLine };
