import { RemoteConnectionError, VersionParseError } from '../errors';
import logger from '../logger';
import type {
    Decisions,
    InstallOptions,
    InstallOutcome,
    InstalledRecord,
    NativeGateway,
    PackageUpdate,
    RemoteIndex,
} from '../types';
import { VersionOrder } from '../types';
import type { RemotePackage } from './aur';
import { compareVersions } from './version';

const findUpdates = (
    installed: readonly InstalledRecord[],
    remote: readonly RemotePackage[],
): PackageUpdate[] => {
    const remoteVersions = new Map(
        remote.map((pkg): [string, string] => [pkg.Name, pkg.Version]),
    );
    const updates: PackageUpdate[] = [];
    for (const record of installed) {
        const remoteVersion = remoteVersions.get(record.name);
        if (remoteVersion === undefined) {
            logger.verbose(`${record.name} is not on the AUR.`);
            continue;
        }
        try {
            if (
                compareVersions(record.installedVersion, remoteVersion) ===
                VersionOrder.LESS
            ) {
                updates.push({
                    name: record.name,
                    installedVersion: record.installedVersion,
                    remoteVersion,
                });
            }
        } catch (err) {
            if (!(err instanceof VersionParseError)) {
                throw err;
            }
            logger.warn(`Skipping ${record.name}: ${err.message}`);
        }
    }
    return updates;
};

interface UpgradeContext {
    native: NativeGateway;
    remote: RemoteIndex;
    installer: {
        install(name: string, options?: InstallOptions): Promise<InstallOutcome>;
    };
    decisions: Decisions;
}

class UpgradePlanner {
    constructor(private readonly ctx: UpgradeContext) {}

    async plan(): Promise<PackageUpdate[]> {
        const installed = await this.ctx.native.listForeign();
        if (installed.length === 0) {
            return [];
        }
        const remote = await this.ctx.remote.batchInfo(
            installed.map((record) => record.name),
        );
        return findUpdates(installed, remote);
    }

    /** Installs every outdated package; true only if all of them succeed. */
    async upgrade({ force = false }: { force?: boolean } = {}): Promise<boolean> {
        let updates: PackageUpdate[];
        try {
            updates = await this.plan();
        } catch (err) {
            if (err instanceof RemoteConnectionError) {
                logger.error(`Can not check for updates. Reason: ${err.message}`);
                return false;
            }
            throw err;
        }

        if (updates.length === 0) {
            logger.info('All AUR packages are up to date. Nothing to do.');
            return true;
        }
        logger.info(
            `Packages to update: ${updates
                .map((u) => `${u.name} (${u.installedVersion} -> ${u.remoteVersion})`)
                .join(', ')}`,
        );
        if (!(await this.ctx.decisions.confirmUpgrade(updates))) {
            logger.info('Upgrade cancelled.');
            return true;
        }

        const failed: string[] = [];
        for (const update of updates) {
            const outcome = await this.ctx.installer.install(update.name, { force });
            if (outcome === 'failed') {
                failed.push(update.name);
            }
        }
        if (failed.length > 0) {
            logger.error(`Failed to upgrade: ${failed.join(', ')}`);
            return false;
        }
        return true;
    }
}

export { UpgradePlanner, findUpdates };
export type { UpgradeContext };
