import { BuildError, CloneError } from '../errors';
import logger from '../logger';
import type { BuildOptions, Config, SourceBuilder } from '../types';
import { spawnPromise, type CommandRunner } from '../utils';

class MakepkgBuilder implements SourceBuilder {
    constructor(
        private readonly config: Pick<Config, 'aurUrl' | 'autorun'>,
        private readonly run: CommandRunner = spawnPromise,
    ) {}

    cloneUrl(baseName: string): string {
        return `${this.config.aurUrl.replace(/\/+$/, '')}/${baseName}.git`;
    }

    async clone(baseName: string, directory: string): Promise<void> {
        const url = this.cloneUrl(baseName);
        logger.verbose(`Cloning ${url} into ${directory}`);
        const result = await this.run('git', ['clone', url, directory], {
            stdio: 'inherit',
        }).catch((err: unknown) => {
            throw new CloneError(baseName, String(err));
        });
        if (result.code !== 0) {
            throw new CloneError(baseName, `git exited with code ${result.code}`);
        }
    }

    // makepkg escalates through sudo itself when it installs the package
    async build(
        name: string,
        directory: string,
        options: BuildOptions,
    ): Promise<void> {
        // --needed would let pacman skip a forced reinstall of the same version
        const args = options.reinstall ? ['-si'] : ['-si', '--needed'];
        if (options.asDependency) {
            args.push('--asdeps');
        }
        if (this.config.autorun) {
            args.push('--noconfirm');
        }
        logger.verbose(`Running makepkg ${args.join(' ')} in ${directory}`);
        const result = await this.run('makepkg', args, {
            cwd: directory,
            stdio: 'inherit',
        });
        if (result.code !== 0) {
            throw new BuildError(name, result.code);
        }
    }
}

export { MakepkgBuilder };
