import path from 'path';
import fse from 'fs-extra';
import {
    InstallDeclinedError,
    PackageNotFoundError,
    UserCancelledError,
    VersionParseError,
    errorMessage,
} from '../errors';
import logger from '../logger';
import type {
    BuildOptions,
    Config,
    Decisions,
    InstallOptions,
    InstallOutcome,
    NativeGateway,
    ProgressReporter,
    RemoteIndex,
    SourceBuilder,
} from '../types';
import { VersionOrder } from '../types';
import type { RemotePackage } from './aur';
import type { PackageDescriptor } from './descriptor';
import { withProgress } from './progress';
import type { DependencyResolver } from './resolver';
import { searchPackages } from './search';
import { compareVersions } from './version';

interface InstallerContext {
    config: Pick<Config, 'buildDirectory' | 'reviewBuildScript'>;
    native: NativeGateway;
    remote: RemoteIndex;
    resolver: DependencyResolver;
    builder: SourceBuilder;
    decisions: Decisions;
    progress: ProgressReporter;
}

/**
 * Drives the install of one requested package: pacman first, then the AUR
 * package with its AUR-only dependencies built leaf-first. One instance
 * serves one run; names it already installed are not processed twice.
 */
class InstallOrchestrator {
    private readonly handled = new Set<string>();

    constructor(private readonly ctx: InstallerContext) {}

    async install(
        name: string,
        options: InstallOptions = {},
    ): Promise<InstallOutcome> {
        // the typed name plus the package a search pick resolved it to
        const roots = new Set([name]);
        try {
            return await this.run(name, options, roots);
        } catch (err) {
            if (err instanceof UserCancelledError) {
                throw err;
            }
            if (err instanceof InstallDeclinedError && roots.has(err.packageName)) {
                logger.info(`Skipping ${name}.`);
                return 'skipped';
            }
            logger.error(`Failed to install ${name}. Reason: ${errorMessage(err)}`);
            return 'failed';
        }
    }

    private async run(
        name: string,
        { asDependency = false, force = false }: InstallOptions,
        roots?: Set<string>,
    ): Promise<InstallOutcome> {
        if (this.handled.has(name)) {
            logger.verbose(`${name} was already processed in this run.`);
            return 'skipped';
        }

        if (await this.ctx.native.isAvailable(name)) {
            return this.installNative(name, asDependency);
        }

        let metadata = await this.ctx.remote.info(name);
        if (!metadata) {
            metadata = await this.searchFallback(name);
            if (this.handled.has(metadata.Name)) {
                return 'skipped';
            }
            roots?.add(metadata.Name);
        }

        if (!force && (await this.isUpToDate(metadata.Name, metadata.Version))) {
            logger.info(
                `Skipping ${metadata.Name}: already installed and up to date (version ${metadata.Version}).`,
            );
            this.handled.add(metadata.Name);
            return 'up-to-date';
        }

        const remote = metadata;
        const descriptor = await withProgress(
            this.ctx.progress,
            `Resolving dependencies of ${remote.Name}`,
            () => this.ctx.resolver.describe(remote),
        );
        const plan = this.ctx.resolver.plan(descriptor);
        const unresolved = this.ctx.resolver.unresolved(descriptor);
        if (!(await this.ctx.decisions.confirmInstall(descriptor, plan, unresolved))) {
            throw new InstallDeclinedError(descriptor.name);
        }

        for (const missing of unresolved) {
            await this.run(missing, { asDependency: true });
        }
        for (const dependency of plan) {
            await this.buildDependency(dependency);
        }
        await this.build(descriptor, { asDependency, reinstall: force });
        return 'installed';
    }

    private async installNative(
        name: string,
        asDependency: boolean,
    ): Promise<InstallOutcome> {
        // a dependency pacman can provide gets pulled in by makepkg itself
        if (asDependency) {
            logger.verbose(`${name} is provided by pacman.`);
            return 'native';
        }
        logger.info(`The package ${name} is in the pacman repositories.`);
        if (!(await this.ctx.decisions.confirmNativeInstall(name))) {
            throw new InstallDeclinedError(name);
        }
        await this.ctx.native.installFromNative(name, false);
        this.handled.add(name);
        return 'native';
    }

    private async searchFallback(name: string): Promise<RemotePackage> {
        logger.warn(`Package ${name} not found on AUR.`);
        if (!(await this.ctx.decisions.confirmSearchFallback(name))) {
            throw new PackageNotFoundError(name);
        }
        const candidates = await searchPackages(this.ctx.remote, name);
        if (candidates.length === 0) {
            throw new PackageNotFoundError(name);
        }
        const selected = await this.ctx.decisions.selectPackage(name, candidates);
        if (selected === undefined) {
            throw new PackageNotFoundError(name);
        }
        // search results carry no dependency lists
        const metadata = await this.ctx.remote.info(selected);
        if (!metadata) {
            throw new PackageNotFoundError(selected);
        }
        return metadata;
    }

    private async isUpToDate(name: string, remoteVersion: string): Promise<boolean> {
        const installed = await this.ctx.native.installedVersion(name);
        if (installed === undefined) {
            return false;
        }
        try {
            return compareVersions(installed, remoteVersion) !== VersionOrder.LESS;
        } catch (err) {
            if (err instanceof VersionParseError) {
                logger.warn(
                    `Can not compare versions of ${name} (${installed} / ${remoteVersion}), rebuilding it. ${err.message}`,
                );
                return false;
            }
            throw err;
        }
    }

    private async buildDependency(descriptor: PackageDescriptor): Promise<void> {
        if (this.handled.has(descriptor.name)) {
            return;
        }
        if (await this.isUpToDate(descriptor.name, descriptor.version)) {
            logger.verbose(`Dependency ${descriptor.name} is up to date.`);
            this.handled.add(descriptor.name);
            return;
        }
        await this.build(descriptor, { asDependency: true, reinstall: false });
    }

    private async build(
        descriptor: PackageDescriptor,
        options: BuildOptions,
    ): Promise<void> {
        const directory = path.join(this.ctx.config.buildDirectory, descriptor.name);
        await fse.remove(directory);
        await fse.ensureDir(this.ctx.config.buildDirectory);
        try {
            await this.ctx.builder.clone(descriptor.baseName, directory);
            if (this.ctx.config.reviewBuildScript) {
                await this.review(descriptor, directory);
            }
            logger.info(`Building ${descriptor.name} ${descriptor.version}...`);
            await this.ctx.builder.build(descriptor.name, directory, options);
        } finally {
            await this.cleanup(directory);
        }
        this.handled.add(descriptor.name);
        logger.info(`Installed ${descriptor.name} ${descriptor.version}.`);
    }

    private async review(
        descriptor: PackageDescriptor,
        directory: string,
    ): Promise<void> {
        const script = await fse.readFile(path.join(directory, 'PKGBUILD'), 'utf8');
        if (!(await this.ctx.decisions.reviewBuildScript(descriptor.name, script))) {
            throw new InstallDeclinedError(descriptor.name);
        }
    }

    private async cleanup(directory: string): Promise<void> {
        try {
            await fse.remove(directory);
        } catch (err) {
            logger.error(
                `Error removing build files in ${directory}. Reason: ${errorMessage(err)}`,
            );
        }
    }
}

export { InstallOrchestrator };
export type { InstallerContext };
