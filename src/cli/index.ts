import fs from 'node:fs';
import path from 'node:path';
import { Command } from 'commander';
import { DEFAULT_CONFIG_FILE, loadConfig } from '../config';
import logger, { configureLogger } from '../logger';
import { createContext, type AppContext } from './context';
import {
    installPackages,
    listInstalled,
    removePackages,
    searchTerms,
    showConfig,
    upgradeAll,
} from './controller';

interface GlobalOptions {
    config: string;
    noconfirm?: boolean;
}

const getVersion = (): string => {
    try {
        const manifest: unknown = JSON.parse(
            fs.readFileSync(path.join(__dirname, '..', '..', 'package.json'), 'utf8'),
        );
        if (
            typeof manifest === 'object' &&
            manifest !== null &&
            'version' in manifest &&
            typeof manifest.version === 'string'
        ) {
            return manifest.version;
        }
    } catch (err) {
        logger.debug(`Can not read package.json. Reason: ${err}`);
    }
    return '0.0.0';
};

const createProgram = (): Command => {
    const program = new Command();

    const run = async (
        handler: (ctx: AppContext) => Promise<boolean>,
    ): Promise<void> => {
        const options = program.opts<GlobalOptions>();
        const loaded = loadConfig(options.config);
        const config = options.noconfirm ? { ...loaded, autorun: true } : loaded;
        configureLogger(config.logLevel, config.logFilename);
        const success = await handler(createContext(config));
        process.exitCode = success ? 0 : 1;
    };

    program
        .name('aurstep')
        .description('Install, search and upgrade AUR packages on top of pacman')
        .version(getVersion())
        .option('-c, --config <file>', 'configuration file', DEFAULT_CONFIG_FILE)
        .option('-y, --noconfirm', 'do not ask for any confirmation');

    program
        .command('install')
        .alias('S')
        .description('install packages from pacman or the AUR')
        .argument('<names...>', 'package names')
        .option('-f, --force', 'rebuild even if the installed version is up to date')
        .action((names: string[], opts: { force?: boolean }) =>
            run((ctx) => installPackages(ctx, names, opts)),
        );

    program
        .command('search')
        .alias('Q')
        .description('search packages on the AUR')
        .argument('<terms...>', 'search terms')
        .action((terms: string[]) => run((ctx) => searchTerms(ctx, terms)));

    program
        .command('list')
        .description('list installed AUR packages')
        .action(() => run(listInstalled));

    program
        .command('upgrade')
        .alias('Syu')
        .description('upgrade every outdated AUR package')
        .option('-f, --force', 'rebuild without checking the installed version')
        .action((opts: { force?: boolean }) => run((ctx) => upgradeAll(ctx, opts)));

    program
        .command('remove')
        .alias('R')
        .description('remove installed packages')
        .argument('<names...>', 'package names')
        .action((names: string[]) => run((ctx) => removePackages(ctx, names)));

    program
        .command('config')
        .description('show the configuration in use')
        .action(() => run(showConfig));

    return program;
};

export { createProgram, getVersion };
