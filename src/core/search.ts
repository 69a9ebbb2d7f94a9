import type { RemoteIndex } from '../types';
import type { RemotePackage } from './aur';

const byPopularity = (a: RemotePackage, b: RemotePackage): number =>
    b.Popularity - a.Popularity;

const searchPackages = async (
    remote: RemoteIndex,
    term: string,
): Promise<RemotePackage[]> => {
    const results = await remote.search(term);
    return [...results].sort(byPopularity);
};

export { searchPackages, byPopularity };
