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

// The public interval index: a span tree plus a registry of live intervals.

import { Bound, Domain, NegativeInfinity, PositiveInfinity } from './bound.js';
import {
    DuplicateNameError,
    InvalidIntervalError,
    InvariantViolationError,
    NameNotFoundError,
} from './errors.js';
import { findProblems } from './invariants.js';
import { IntervalNode, Name, Names } from './node.js';
import { render } from './render.js';

export interface Endpoints<K> {
    readonly start: Bound<K>;
    readonly end: Bound<K>;
}

export class IntervalTree<K> {
    readonly domain: Domain<K>;
    private _root: IntervalNode<K>;
    private readonly _registry: Map<Name, Endpoints<K>> = new Map();

    constructor(domain: Domain<K>) {
        this.domain = domain;
        this._root = IntervalNode.whole(domain);
    }

    get root(): IntervalNode<K> {
        return this._root;
    }

    get size(): number {
        return this._registry.size;
    }

    get height(): number {
        return this._root.height;
    }

    add(start: Bound<K>, end: Bound<K>, name: Name) {
        this.checkRange(start, end);
        if (this._registry.has(name)) throw new DuplicateNameError(name);
        this._root = this._root.add(start, end, name);
        this._registry.set(name, { start, end });
    }

    remove(name: Name) {
        const { start, end } = this.getEndpoints(name);
        this._root = this._root.remove(start, end, name);
        this._registry.delete(name);
    }

    has(name: Name): boolean {
        return this._registry.has(name);
    }

    getEndpoints(name: Name): Endpoints<K> {
        const endpoints = this._registry.get(name);
        if (endpoints === void 0) throw new NameNotFoundError(name);
        return endpoints;
    }

    testPoint(point: Bound<K>): Names {
        return this._root.testPoint(point);
    }

    testRange(start: Bound<K>, end: Bound<K>): Names {
        this.checkRange(start, end);
        return this._root.testRange(start, end);
    }

    names(): IterableIterator<Name> {
        return this._registry.keys();
    }

    entries(): IterableIterator<[Name, Endpoints<K>]> {
        return this._registry.entries();
    }

    clear() {
        this._root = IntervalNode.whole(this.domain);
        this._registry.clear();
    }

    /**
     * Throws {@link InvariantViolationError} listing everything wrong with the
     * tree's structure, or with its agreement with the registry.
     */
    validate() {
        const problems = findProblems(this._root);
        const d = this.domain;
        if (this._root.min !== NegativeInfinity || this._root.max !== PositiveInfinity) {
            problems.push(`root spans [${d.format(this._root.min)}, ${d.format(this._root.max)}]`);
        }
        const stored = this._root.testRange(NegativeInfinity, PositiveInfinity);
        for (const name of this._registry.keys()) {
            if (!stored.has(name)) problems.push(`${JSON.stringify(name)} is registered but not stored`);
        }
        stored.forEach(name => {
            if (!this._registry.has(name)) problems.push(`${JSON.stringify(name)} is stored but not registered`);
        });
        if (problems.length > 0) throw new InvariantViolationError(problems);
    }

    toString(): string {
        return render(this._root);
    }

    private checkRange(start: Bound<K>, end: Bound<K>) {
        if (!this.domain.lt(start, end)) {
            throw new InvalidIntervalError(this.domain.format(start), this.domain.format(end));
        }
    }
}
