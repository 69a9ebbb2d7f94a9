import pc from 'picocolors';
import type { RemotePackage } from '../core/aur';
import type { PackageDescriptor } from '../core/descriptor';
import type { InstalledRecord, PackageUpdate } from '../types';

const formatSearchResult = (pkg: RemotePackage): string =>
    [
        `${pc.bold(pc.cyan(pkg.Name))} ${pc.green(pkg.Version)}${
            pkg.OutOfDate ? ` ${pc.red('(out of date)')}` : ''
        }`,
        `    ${pkg.Description ?? ''}`,
        `    ${pc.dim(
            `Maintainer: ${pkg.Maintainer ?? 'orphan'}  Popularity: ${pkg.Popularity.toFixed(2)}`,
        )}`,
    ].join('\n');

const formatDependencies = (label: string, deps: readonly string[]): string =>
    `${label}: ${deps.length > 0 ? deps.join(', ') : pc.dim('none')}`;

const formatDescriptor = (
    descriptor: PackageDescriptor,
    plan: readonly PackageDescriptor[],
    unresolved: readonly string[] = descriptor.unresolvedDependencies,
): string => {
    const lines = [
        `Package: ${pc.bold(descriptor.name)}`,
        `Version: ${descriptor.version}`,
        `Description: ${descriptor.description ?? ''}`,
        `Maintainer: ${descriptor.maintainer ?? 'orphan'}`,
        formatDependencies('Dependencies', descriptor.runDependencies),
        formatDependencies('Build dependencies', descriptor.buildDependencies),
    ];
    if (descriptor.checkDependencies.length > 0) {
        lines.push(formatDependencies('Check dependencies', descriptor.checkDependencies));
    }
    if (descriptor.optionalDependencies.length > 0) {
        lines.push(formatDependencies('Optional', descriptor.optionalDependencies));
    }
    if (plan.length > 0) {
        lines.push(
            formatDependencies(
                'AUR packages to build first',
                plan.map((dep) => `${dep.name} ${dep.version}`),
            ),
        );
    }
    if (unresolved.length > 0) {
        lines.push(`${pc.yellow('Not found')}: ${unresolved.join(', ')}`);
    }
    return lines.join('\n');
};

const formatInstalled = (record: InstalledRecord, remoteVersion?: string): string => {
    const line = `${pc.bold(record.name)} ${record.installedVersion}`;
    if (remoteVersion === undefined) {
        return line;
    }
    return `${line} ${pc.dim('->')} ${pc.green(remoteVersion)}`;
};

const formatUpdates = (updates: readonly PackageUpdate[]): string =>
    updates
        .map((u) =>
            formatInstalled(
                { name: u.name, installedVersion: u.installedVersion },
                u.remoteVersion,
            ),
        )
        .join('\n');

export { formatSearchResult, formatDescriptor, formatInstalled, formatUpdates };
