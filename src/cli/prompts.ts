import * as clack from '@clack/prompts';
import logger from '../logger';
import { UserCancelledError } from '../errors';
import { silentProgress } from '../core/progress';
import type { Decisions, ProgressReporter } from '../types';
import { formatDescriptor, formatSearchResult, formatUpdates } from './format';

type SelectOption = { value: string; label?: string; hint?: string };

const unwrap = <T>(result: T | symbol): T => {
    if (clack.isCancel(result)) {
        clack.cancel('Operation cancelled.');
        throw new UserCancelledError();
    }
    return result;
};

const ask = async (message: string, initialValue = true): Promise<boolean> =>
    unwrap(await clack.confirm({ message, initialValue }));

/** Decisions backed by @clack/prompts; every question waits for the user. */
const createPromptDecisions = (): Decisions => ({
    confirmNativeInstall: (name) =>
        ask(`${name} is in the pacman repositories. Install it from there?`),

    async confirmInstall(descriptor, plan, unresolved) {
        clack.note(formatDescriptor(descriptor, plan, unresolved), descriptor.name);
        return ask(`Continue installation of ${descriptor.name}?`);
    },

    confirmSearchFallback: (name) =>
        ask(`Package ${name} not found. Search ${name} on AUR?`),

    async selectPackage(term, candidates) {
        const options: SelectOption[] = candidates.map((pkg) => ({
            value: pkg.Name,
            label: `${pkg.Name} ${pkg.Version}`,
            hint: pkg.Description ?? undefined,
        }));
        options.push({ value: '', label: 'None of these' });
        const selected = unwrap(
            await clack.select<SelectOption[], string>({
                message: `Search results for ${term}:`,
                options,
            }),
        );
        return selected === '' ? undefined : selected;
    },

    async reviewBuildScript(name, script) {
        clack.note(script, `${name}/PKGBUILD`);
        return ask(`Build ${name} with this PKGBUILD?`);
    },

    async confirmUpgrade(updates) {
        clack.note(formatUpdates(updates), 'Updates');
        return ask(`Upgrade ${updates.length} package(s)?`);
    },
});

/**
 * Decisions for AUTORUN or a non-interactive terminal: everything is
 * confirmed, and a missing package is never replaced by a search pick.
 */
const createUnattendedDecisions = (): Decisions => ({
    confirmNativeInstall: async () => true,

    async confirmInstall(descriptor, plan, unresolved) {
        logger.info(`\n${formatDescriptor(descriptor, plan, unresolved)}`);
        return true;
    },

    async confirmSearchFallback(name) {
        logger.verbose(`Not searching for ${name}: running unattended.`);
        return false;
    },

    async selectPackage(term, candidates) {
        logger.verbose(
            `Ignoring ${candidates.length} search result(s) for ${term}:\n${candidates
                .map(formatSearchResult)
                .join('\n')}`,
        );
        return undefined;
    },

    async reviewBuildScript(name, script) {
        logger.info(`${name}/PKGBUILD:\n${script}`);
        return true;
    },

    async confirmUpgrade(updates) {
        logger.info(`Updates:\n${formatUpdates(updates)}`);
        return true;
    },
});

const createSpinnerProgress = (): ProgressReporter => {
    if (!process.stdout.isTTY) {
        return silentProgress;
    }
    let active: ReturnType<typeof clack.spinner> | undefined;
    return {
        start(message) {
            active = clack.spinner();
            active.start(message);
        },
        stop(message) {
            active?.stop(message);
            active = undefined;
        },
    };
};

export { createPromptDecisions, createUnattendedDecisions, createSpinnerProgress };
