import { describe, expect, it } from 'vitest';
import { PackageDescriptor } from '../core/descriptor';
import { remotePackage } from '../testing/fakes';
import { formatDescriptor, formatSearchResult, formatUpdates } from './format';

const plain = (text: string) => text.replace(/\x1b\[[0-9;]*m/g, '');

describe('format', () => {
    it('shows name, version, description and popularity of a search hit', () => {
        const pkg = remotePackage({
            Name: 'foo-git',
            Version: '2.1-1',
            Description: 'Foo from git',
            Maintainer: null,
            Popularity: 1.234,
        });

        expect(plain(formatSearchResult(pkg)).split('\n')).toEqual([
            'foo-git 2.1-1',
            '    Foo from git',
            '    Maintainer: orphan  Popularity: 1.23',
        ]);
    });

    it('lists the AUR packages built before the requested one', () => {
        const dependency = new PackageDescriptor(remotePackage({ Name: 'libfoo' }));
        const descriptor = new PackageDescriptor(
            remotePackage({ Name: 'foo', Depends: ['libfoo', 'glibc'] }),
            [dependency],
        );

        expect(plain(formatDescriptor(descriptor, [dependency])).split('\n')).toEqual([
            'Package: foo',
            'Version: 1.0-1',
            'Description: ',
            'Maintainer: orphan',
            'Dependencies: libfoo, glibc',
            'Build dependencies: none',
            'AUR packages to build first: libfoo 1.0-1',
        ]);
    });

    it('lists every dependency that still has to be looked up', () => {
        const descriptor = new PackageDescriptor(
            remotePackage({ Name: 'foo', Depends: ['lost'] }),
            [],
            ['lost'],
        );

        const lines = plain(formatDescriptor(descriptor, [], ['ghost', 'lost'])).split('\n');

        expect(lines[lines.length - 1]).toBe('Not found: ghost, lost');
    });

    it('prints one update per line', () => {
        expect(
            plain(
                formatUpdates([
                    { name: 'a', installedVersion: '1.0', remoteVersion: '1.1' },
                    { name: 'b', installedVersion: '2', remoteVersion: '3' },
                ]),
            ),
        ).toBe('a 1.0 -> 1.1\nb 2 -> 3');
    });
});
