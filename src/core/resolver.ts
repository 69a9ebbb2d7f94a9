import { DependencyCycleError } from '../errors';
import logger from '../logger';
import type { NativeGateway, RemoteIndex } from '../types';
import type { RemotePackage } from './aur';
import { PackageDescriptor } from './descriptor';

interface DescribeOptions {
    resolveDependencies: boolean;
}

/**
 * Builds package descriptors and the leaf-first list of AUR-only packages a
 * descriptor needs. Dependencies pacman can provide are never looked up on
 * the AUR.
 */
class DependencyResolver {
    constructor(
        private readonly native: NativeGateway,
        private readonly remote: RemoteIndex,
    ) {}

    async describe(
        metadata: RemotePackage,
        options: DescribeOptions = { resolveDependencies: true },
    ): Promise<PackageDescriptor> {
        if (!options.resolveDependencies) {
            return new PackageDescriptor(metadata);
        }
        return this.resolve(metadata, []);
    }

    private async resolve(
        metadata: RemotePackage,
        chain: readonly string[],
    ): Promise<PackageDescriptor> {
        const trail = [...chain, metadata.Name];
        const candidate = new PackageDescriptor(metadata);

        const aurNames: string[] = [];
        for (const name of candidate.requiredDependencyNames()) {
            if (await this.native.isAvailable(name)) {
                continue;
            }
            if (trail.includes(name)) {
                throw new DependencyCycleError([...trail, name]);
            }
            aurNames.push(name);
        }
        if (aurNames.length === 0) {
            return candidate;
        }

        logger.debug(
            `${metadata.Name}: AUR dependencies ${aurNames.join(', ')}`,
        );
        const found = new Map(
            (await this.remote.batchInfo(aurNames)).map(
                (pkg): [string, RemotePackage] => [pkg.Name, pkg],
            ),
        );

        const resolved: PackageDescriptor[] = [];
        const unresolved: string[] = [];
        for (const name of aurNames) {
            const pkg = found.get(name);
            if (pkg) {
                resolved.push(await this.resolve(pkg, trail));
            } else {
                unresolved.push(name);
            }
        }
        return new PackageDescriptor(metadata, resolved, unresolved);
    }

    /**
     * Flattens the AUR dependency tree leaf-first: before each direct
     * dependency come its own dependencies. A name reached through several
     * branches appears once, at its first (deepest) position.
     */
    plan(descriptor: PackageDescriptor): PackageDescriptor[] {
        const seen = new Set<string>([descriptor.name]);
        const ordered: PackageDescriptor[] = [];
        const visit = (node: PackageDescriptor): void => {
            for (const dependency of node.resolvedAurDependencies) {
                visit(dependency);
                if (!seen.has(dependency.name)) {
                    seen.add(dependency.name);
                    ordered.push(dependency);
                }
            }
        };
        visit(descriptor);
        return ordered;
    }

    /** Dependency names in the tree that neither pacman nor the AUR know. */
    unresolved(descriptor: PackageDescriptor): string[] {
        const names = new Set<string>();
        const visit = (node: PackageDescriptor): void => {
            node.resolvedAurDependencies.forEach(visit);
            node.unresolvedDependencies.forEach((name) => names.add(name));
        };
        visit(descriptor);
        return Array.from(names);
    }
}

export { DependencyResolver };
export type { DescribeOptions };
