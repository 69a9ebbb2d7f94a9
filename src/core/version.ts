import { VersionParseError } from '../errors';
import { VersionOrder } from '../types';

interface ParsedVersion {
    epoch: number;
    pkgver: string;
    pkgrel: string | undefined;
}

const VERSION_PATTERN = /^(?:(\d+):)?([A-Za-z0-9._+~]+)(?:-(\d+(?:\.\d+)?))?$/;

const parseVersion = (version: string): ParsedVersion => {
    const match = VERSION_PATTERN.exec(version);
    if (!match) {
        throw new VersionParseError(version);
    }
    return {
        epoch: match[1] === undefined ? 0 : parseInt(match[1], 10),
        pkgver: match[2],
        pkgrel: match[3],
    };
};

const isDigit = (ch: string | undefined): boolean =>
    ch !== undefined && ch >= '0' && ch <= '9';

const isAlpha = (ch: string | undefined): boolean =>
    ch !== undefined && /[A-Za-z]/.test(ch);

const isAlnum = (ch: string | undefined): boolean =>
    isDigit(ch) || isAlpha(ch);

const sign = (n: number): VersionOrder =>
    n < 0 ? VersionOrder.LESS : n > 0 ? VersionOrder.GREATER : VersionOrder.EQUAL;

/**
 * Segment comparison used by pacman for pkgver and pkgrel. Both strings are
 * split into runs of digits and runs of letters; everything else separates
 * segments.
 */
const compareSegments = (a: string, b: string): VersionOrder => {
    if (a === b) {
        return VersionOrder.EQUAL;
    }
    let i = 0;
    let j = 0;
    while (i < a.length && j < b.length) {
        const sepStartA = i;
        const sepStartB = j;
        while (i < a.length && !isAlnum(a[i])) i++;
        while (j < b.length && !isAlnum(b[j])) j++;
        if (i >= a.length || j >= b.length) {
            break;
        }
        if (i - sepStartA !== j - sepStartB) {
            return i - sepStartA < j - sepStartB
                ? VersionOrder.LESS
                : VersionOrder.GREATER;
        }

        const isNum = isDigit(a[i]);
        const matches = isNum ? isDigit : isAlpha;
        let endA = i;
        let endB = j;
        while (endA < a.length && matches(a[endA])) endA++;
        while (endB < b.length && matches(b[endB])) endB++;

        // numeric segments are always newer than alpha ones
        if (endB === j) {
            return isNum ? VersionOrder.GREATER : VersionOrder.LESS;
        }

        let segA = a.slice(i, endA);
        let segB = b.slice(j, endB);
        if (isNum) {
            segA = segA.replace(/^0+/, '');
            segB = segB.replace(/^0+/, '');
            if (segA.length !== segB.length) {
                return segA.length > segB.length
                    ? VersionOrder.GREATER
                    : VersionOrder.LESS;
            }
        }
        if (segA !== segB) {
            return segA < segB ? VersionOrder.LESS : VersionOrder.GREATER;
        }
        i = endA;
        j = endB;
    }

    const restA = a.slice(i);
    const restB = b.slice(j);
    if (restA === '' && restB === '') {
        return VersionOrder.EQUAL;
    }
    // a trailing alpha segment never beats the end of the string: 1.0a < 1.0
    if ((restA === '' && !isAlpha(restB[0])) || isAlpha(restA[0])) {
        return VersionOrder.LESS;
    }
    return VersionOrder.GREATER;
};

const compareVersions = (a: string, b: string): VersionOrder => {
    const left = parseVersion(a);
    const right = parseVersion(b);
    const epoch = sign(left.epoch - right.epoch);
    if (epoch !== VersionOrder.EQUAL) {
        return epoch;
    }
    const pkgver = compareSegments(left.pkgver, right.pkgver);
    if (pkgver !== VersionOrder.EQUAL || !left.pkgrel || !right.pkgrel) {
        return pkgver;
    }
    return compareSegments(left.pkgrel, right.pkgrel);
};

const isNewer = (candidate: string, current: string): boolean =>
    compareVersions(candidate, current) === VersionOrder.GREATER;

export { compareVersions, isNewer, parseVersion };
