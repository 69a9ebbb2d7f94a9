import type { RemotePackage } from './aur';

/**
 * Bare package name of a dependency declaration: `foo>=1.2` and
 * `foo: optional support for bar` both give `foo`. Constraints are not
 * enforced.
 */
const stripVersionConstraint = (dependency: string): string =>
    dependency.split(/[<>=:]/, 1)[0].trim();

class PackageDescriptor {
    readonly name: string;
    readonly version: string;
    readonly baseName: string;
    readonly description: string | null;
    readonly maintainer: string | null;
    readonly runDependencies: readonly string[];
    readonly buildDependencies: readonly string[];
    readonly checkDependencies: readonly string[];
    readonly optionalDependencies: readonly string[];
    readonly resolvedAurDependencies: readonly PackageDescriptor[];
    readonly unresolvedDependencies: readonly string[];

    constructor(
        metadata: RemotePackage,
        resolvedAurDependencies: readonly PackageDescriptor[] = [],
        unresolvedDependencies: readonly string[] = [],
    ) {
        this.name = metadata.Name;
        this.version = metadata.Version;
        this.baseName = metadata.PackageBase;
        this.description = metadata.Description;
        this.maintainer = metadata.Maintainer;
        this.runDependencies = Object.freeze([...metadata.Depends]);
        this.buildDependencies = Object.freeze([...metadata.MakeDepends]);
        this.checkDependencies = Object.freeze([...metadata.CheckDepends]);
        this.optionalDependencies = Object.freeze([...metadata.OptDepends]);
        this.resolvedAurDependencies = Object.freeze([...resolvedAurDependencies]);
        this.unresolvedDependencies = Object.freeze([...unresolvedDependencies]);
        Object.freeze(this);
    }

    /** Distinct bare names of run, build and check dependencies, in declaration order. */
    requiredDependencyNames(): string[] {
        const names = [
            ...this.runDependencies,
            ...this.buildDependencies,
            ...this.checkDependencies,
        ]
            .map(stripVersionConstraint)
            .filter((name) => name !== '');
        return Array.from(new Set(names));
    }
}

export { PackageDescriptor, stripVersionConstraint };
