//---------------------------------------------------------------------------
// @spanindex/core, an augmented interval tree for JS.
// Copyright (C) 2016-2021 Tony Garnock-Jones <tonyg@leastfixedpoint.com>
//
// This program is free software: you can redistribute it and/or modify
// it under the terms of the GNU General Public License as published by
// the Free Software Foundation, either version 3 of the License, or
// (at your option) any later version.
//
// This program is distributed in the hope that it will be useful,
// but WITHOUT ANY WARRANTY; without even the implied warranty of
// MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the
// GNU General Public License for more details.
//
// You should have received a copy of the GNU General Public License
// along with this program.  If not, see <https://www.gnu.org/licenses/>.
//---------------------------------------------------------------------------

// Ordered key domains with distinguished infinite bounds.

export const NegativeInfinity: unique symbol = Symbol('-inf');
export const PositiveInfinity: unique symbol = Symbol('+inf');

export type Infinite = typeof NegativeInfinity | typeof PositiveInfinity;
export type Bound<K> = K | Infinite;

export type Comparator<K> = (a: K, b: K) => number;

export function isInfinite<K>(b: Bound<K>): b is Infinite {
    return b === NegativeInfinity || b === PositiveInfinity;
}

/**
 * An order over keys of type `K`, extended with the two infinite sentinels.
 * The sentinels compare below (resp. above) every key and equal to
 * themselves. A key the comparator cannot order against itself (NaN) is
 * unordered against everything: `compare` gives NaN and every relation is
 * false.
 */
export class Domain<K> {
    readonly compareKeys: Comparator<K>;
    readonly formatKey: (k: K) => string;

    constructor(compareKeys: Comparator<K>, formatKey: (k: K) => string = String) {
        this.compareKeys = compareKeys;
        this.formatKey = formatKey;
    }

    compare(a: Bound<K>, b: Bound<K>): number {
        if (a === b) return 0;
        if (!this.isOrdered(a) || !this.isOrdered(b)) return NaN;
        if (a === NegativeInfinity || b === PositiveInfinity) return -1;
        if (a === PositiveInfinity || b === NegativeInfinity) return 1;
        return this.compareKeys(a, b);
    }

    isOrdered(b: Bound<K>): boolean {
        return isInfinite(b) || this.compareKeys(b, b) === 0;
    }

    lt(a: Bound<K>, b: Bound<K>): boolean {
        return this.compare(a, b) < 0;
    }

    le(a: Bound<K>, b: Bound<K>): boolean {
        return this.compare(a, b) <= 0;
    }

    gt(a: Bound<K>, b: Bound<K>): boolean {
        return this.compare(a, b) > 0;
    }

    ge(a: Bound<K>, b: Bound<K>): boolean {
        return this.compare(a, b) >= 0;
    }

    format(b: Bound<K>): string {
        if (b === NegativeInfinity) return '-inf';
        if (b === PositiveInfinity) return '+inf';
        return this.formatKey(b);
    }
}

export const numbers: Domain<number> =
    new Domain<number>((a, b) => (a < b) ? -1 : (a > b) ? 1 : (a === b) ? 0 : NaN);

export const strings: Domain<string> =
    new Domain<string>((a, b) => (a < b) ? -1 : (a > b) ? 1 : 0, s => JSON.stringify(s));
