import { describe, expect, it, vi } from 'vitest';
import { RemoteConnectionError } from '../errors';
import { FakeNative, FakeRemote, fakeDecisions, remotePackage } from '../testing/fakes';
import type { Decisions, InstallOptions, InstallOutcome, RemoteIndex } from '../types';
import { UpgradePlanner, findUpdates } from './upgrade';

const planner = (options: {
    installed: Record<string, string>;
    remote: RemoteIndex;
    outcomes?: Record<string, InstallOutcome>;
    decisions?: Partial<Decisions>;
}) => {
    const install = vi.fn(
        async (name: string, _options?: InstallOptions): Promise<InstallOutcome> =>
            options.outcomes?.[name] ?? 'installed',
    );
    const upgrade = new UpgradePlanner({
        native: new FakeNative({ installed: options.installed }),
        remote: options.remote,
        installer: { install },
        decisions: fakeDecisions(options.decisions),
    });
    return { upgrade, install };
};

describe('findUpdates', () => {
    it('keeps only packages with a newer AUR version', () => {
        const updates = findUpdates(
            [
                { name: 'a', installedVersion: '1.0' },
                { name: 'b', installedVersion: '2.0' },
            ],
            [
                remotePackage({ Name: 'a', Version: '1.1' }),
                remotePackage({ Name: 'b', Version: '2.0' }),
            ],
        );

        expect(updates).toEqual([
            { name: 'a', installedVersion: '1.0', remoteVersion: '1.1' },
        ]);
    });

    it('leaves out packages the AUR does not know and unparseable versions', () => {
        const updates = findUpdates(
            [
                { name: 'local-only', installedVersion: '1.0' },
                { name: 'odd', installedVersion: 'v 1' },
            ],
            [remotePackage({ Name: 'odd', Version: '2.0' })],
        );

        expect(updates).toEqual([]);
    });
});

describe('UpgradePlanner', () => {
    it('asks the AUR about every foreign package in one batch', async () => {
        const remote = new FakeRemote([remotePackage({ Name: 'a', Version: '2.0' })]);
        const { upgrade } = planner({
            installed: { a: '1.0', b: '1.0' },
            remote,
        });

        expect(await upgrade.plan()).toEqual([
            { name: 'a', installedVersion: '1.0', remoteVersion: '2.0' },
        ]);
        expect(remote.infoRequests).toEqual([['a', 'b']]);
    });

    it('does not query the AUR when nothing foreign is installed', async () => {
        const remote = new FakeRemote([]);
        const { upgrade } = planner({ installed: {}, remote });

        expect(await upgrade.plan()).toEqual([]);
        expect(remote.infoRequests).toEqual([]);
    });

    it('succeeds without installing when everything is current', async () => {
        const { upgrade, install } = planner({
            installed: { a: '1.0' },
            remote: new FakeRemote([remotePackage({ Name: 'a', Version: '1.0' })]),
        });

        expect(await upgrade.upgrade()).toBe(true);
        expect(install).not.toHaveBeenCalled();
    });

    it('keeps going after a failed package and reports the failure', async () => {
        const { upgrade, install } = planner({
            installed: { a: '1.0', b: '1.0' },
            remote: new FakeRemote([
                remotePackage({ Name: 'a', Version: '1.1' }),
                remotePackage({ Name: 'b', Version: '1.1' }),
            ]),
            outcomes: { a: 'failed' },
        });

        expect(await upgrade.upgrade()).toBe(false);
        expect(install.mock.calls.map(([name]) => name)).toEqual(['a', 'b']);
    });

    it('passes force on to every install', async () => {
        const { upgrade, install } = planner({
            installed: { a: '1.0' },
            remote: new FakeRemote([remotePackage({ Name: 'a', Version: '1.1' })]),
        });

        expect(await upgrade.upgrade({ force: true })).toBe(true);
        expect(install).toHaveBeenCalledWith('a', { force: true });
    });

    it('fails when the AUR can not be reached', async () => {
        const remote = new FakeRemote([]);
        remote.batchInfo = async () => {
            throw new RemoteConnectionError('connect ECONNREFUSED');
        };
        const { upgrade, install } = planner({ installed: { a: '1.0' }, remote });

        expect(await upgrade.upgrade()).toBe(false);
        expect(install).not.toHaveBeenCalled();
    });

    it('installs nothing when the upgrade is declined', async () => {
        const { upgrade, install } = planner({
            installed: { a: '1.0' },
            remote: new FakeRemote([remotePackage({ Name: 'a', Version: '1.1' })]),
            decisions: { confirmUpgrade: async () => false },
        });

        expect(await upgrade.upgrade()).toBe(true);
        expect(install).not.toHaveBeenCalled();
    });
});
