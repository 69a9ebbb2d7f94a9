import { formatConfig } from '../config';
import { searchPackages } from '../core/search';
import { isNewer } from '../core/version';
import { RemoteConnectionError, RemoveError, VersionParseError } from '../errors';
import logger from '../logger';
import { commandExists } from '../utils';
import type { AppContext } from './context';
import { formatInstalled, formatSearchResult } from './format';

const BUILD_TOOLS = ['git', 'makepkg'];

const assertBuildTools = async (): Promise<boolean> => {
    for (const tool of BUILD_TOOLS) {
        if (!(await commandExists(tool))) {
            logger.error(`Command ${tool} not found. Please install it first.`);
            return false;
        }
    }
    return true;
};

const installPackages = async (
    ctx: AppContext,
    names: string[],
    options: { force?: boolean },
): Promise<boolean> => {
    if (!(await assertBuildTools())) {
        return false;
    }
    let success = true;
    for (const name of names) {
        const outcome = await ctx.installer.install(name, { force: options.force });
        if (outcome === 'failed') {
            success = false;
        }
    }
    return success;
};

const searchTerms = async (ctx: AppContext, terms: string[]): Promise<boolean> => {
    let success = true;
    for (const term of terms) {
        try {
            const results = await searchPackages(ctx.remote, term);
            if (results.length === 0) {
                logger.warn(`Package ${term} not found.`);
                success = false;
                continue;
            }
            console.log(`Search results for ${term}:\n`);
            console.log(results.map(formatSearchResult).join('\n\n'));
            console.log('');
        } catch (err) {
            if (!(err instanceof RemoteConnectionError)) {
                throw err;
            }
            logger.error(err.message);
            success = false;
        }
    }
    return success;
};

const listInstalled = async (ctx: AppContext): Promise<boolean> => {
    const installed = await ctx.native.listForeign();
    const remoteVersions = new Map<string, string>();
    try {
        const remote = await ctx.remote.batchInfo(installed.map((r) => r.name));
        remote.forEach((pkg) => remoteVersions.set(pkg.Name, pkg.Version));
    } catch (err) {
        if (!(err instanceof RemoteConnectionError)) {
            throw err;
        }
        logger.warn(`Available versions unknown. ${err.message}`);
    }
    for (const record of installed) {
        const remoteVersion = remoteVersions.get(record.name);
        let newer: string | undefined;
        try {
            newer =
                remoteVersion !== undefined && isNewer(remoteVersion, record.installedVersion)
                    ? remoteVersion
                    : undefined;
        } catch (err) {
            if (!(err instanceof VersionParseError)) {
                throw err;
            }
            logger.debug(`${record.name}: ${err.message}`);
        }
        console.log(formatInstalled(record, newer));
    }
    return true;
};

const upgradeAll = async (
    ctx: AppContext,
    options: { force?: boolean },
): Promise<boolean> => {
    if (!(await assertBuildTools())) {
        return false;
    }
    return ctx.planner.upgrade(options);
};

const removePackages = async (ctx: AppContext, names: string[]): Promise<boolean> => {
    let success = true;
    for (const name of names) {
        try {
            await ctx.native.remove(name);
        } catch (err) {
            if (!(err instanceof RemoveError)) {
                throw err;
            }
            logger.error(err.message);
            success = false;
        }
    }
    return success;
};

const showConfig = async (ctx: AppContext): Promise<boolean> => {
    console.log(formatConfig(ctx.config));
    return true;
};

export {
    installPackages,
    searchTerms,
    listInstalled,
    upgradeAll,
    removePackages,
    showConfig,
};
