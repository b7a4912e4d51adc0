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

// Span nodes of the interval tree. Every mutating operation returns the root
// of the (possibly rotated) subtree, which the caller must store in place of
// the node it called.

import { Set } from 'immutable';

import { Bound, Domain, NegativeInfinity, PositiveInfinity } from './bound.js';
import { rebalance } from './rotation.js';

export type Name = string;
export type Names = Set<Name>;

export interface Split<K> {
    boundary: Bound<K>;
    left: IntervalNode<K>;
    right: IntervalNode<K>;
}

type Edge = 'left' | 'right';

function edgeNodes<K>(n: IntervalNode<K>, edge: Edge): Array<IntervalNode<K>> {
    const nodes = [n];
    for (let s = n.split; s !== null; s = s[edge].split) nodes.push(s[edge]);
    return nodes;
}

function edgeCovering<K>(n: IntervalNode<K>, edge: Edge): Names {
    return edgeNodes(n, edge).reduce((acc, m) => acc.union(m.covering), Set<Name>());
}

function heightContribution<K>(n: IntervalNode<K>): number {
    return (n.split === null) ? -1 : n.height;
}

export class IntervalNode<K> {
    readonly domain: Domain<K>;
    min: Bound<K>;
    max: Bound<K>;
    covering: Names;
    split: Split<K> | null = null;
    height = 0;

    constructor(domain: Domain<K>, min: Bound<K>, max: Bound<K>, covering: Names = Set()) {
        this.domain = domain;
        this.min = min;
        this.max = max;
        this.covering = covering;
    }

    static whole<K>(domain: Domain<K>): IntervalNode<K> {
        return new IntervalNode(domain, NegativeInfinity, PositiveInfinity);
    }

    isLeaf(): boolean {
        return this.split === null;
    }

    /**
     * True when no interval is stored anywhere in this subtree.
     */
    isEmpty(): boolean {
        if (!this.covering.isEmpty()) return false;
        return this.split === null || (this.split.left.isEmpty() && this.split.right.isEmpty());
    }

    computeHeight(): number {
        const s = this.split;
        if (s === null) return 0;
        return 1 + Math.max(heightContribution(s.left), heightContribution(s.right));
    }

    updateHeight(): number {
        this.height = this.computeHeight();
        return this.height;
    }

    balance(): number {
        const s = this.split;
        return (s === null) ? 0 : s.right.height - s.left.height;
    }

    /**
     * Moves names held by both children up to this node, so that each name is
     * stored once per tiling span.
     */
    hoistShared(): void {
        const s = this.split;
        if (s === null) return;
        const both = s.left.covering.intersect(s.right.covering);
        if (both.isEmpty()) return;
        this.covering = this.covering.union(both);
        s.left.covering = s.left.covering.subtract(both);
        s.right.covering = s.right.covering.subtract(both);
    }

    add(start: Bound<K>, end: Bound<K>, name: Name): IntervalNode<K> {
        const d = this.domain;
        if (d.le(start, this.min) && d.ge(end, this.max)) {
            this.covering = this.covering.add(name);
        } else if (this.split === null) {
            if (d.gt(start, this.min)) {
                const left = new IntervalNode(d, this.min, start);
                let right = new IntervalNode(d, start, this.max);
                if (d.lt(end, this.max)) {
                    right = right.add(start, end, name);
                } else {
                    right.covering = Set.of(name);
                }
                this.split = { boundary: start, left, right };
            } else {
                this.split = {
                    boundary: end,
                    left: new IntervalNode(d, this.min, end, Set.of(name)),
                    right: new IntervalNode(d, end, this.max),
                };
            }
        } else {
            const s = this.split;
            if (d.lt(start, s.boundary) || d.le(end, s.boundary)) {
                s.left = s.left.add(start, end, name);
            }
            if (d.ge(start, s.boundary) || d.gt(end, s.boundary)) {
                s.right = s.right.add(start, end, name);
            }
        }
        return this.settle();
    }

    remove(start: Bound<K>, end: Bound<K>, name: Name): IntervalNode<K> {
        const d = this.domain;
        if (this.covering.has(name)) {
            this.covering = this.covering.remove(name);
        } else if (this.split !== null) {
            const s = this.split;
            if (d.ge(s.boundary, start)) s.left = s.left.remove(start, end, name);
            if (d.le(s.boundary, end)) s.right = s.right.remove(start, end, name);
        }
        this.compact();
        return this.settle();
    }

    /**
     * Structural simplification after a removal or a rotation. Collapses a
     * split with nothing beneath it, or drops a boundary whose two sides would
     * answer every query the same way: a leaf on one side, and on the other a
     * subtree whose nodes along the facing edge hold exactly the leaf's names.
     * The facing edge is then stretched over the leaf's span.
     */
    compact(): void {
        const s = this.split;
        if (s === null) return;

        if (s.left.isEmpty() && s.right.isEmpty()) {
            this.split = null;
            return;
        }

        if (!this.covering.isEmpty()) return;

        const { left, right } = s;
        if (right.isLeaf() && !left.isLeaf() && edgeCovering(left, 'right').equals(right.covering)) {
            this.absorb(left, 'right');
        } else if (left.isLeaf() && !right.isLeaf() && edgeCovering(right, 'left').equals(left.covering)) {
            this.absorb(right, 'left');
        }
    }

    private absorb(child: IntervalNode<K>, edge: Edge): void {
        this.covering = this.covering.union(child.covering);
        this.split = child.split;
        for (const n of edgeNodes(child, edge).slice(1)) {
            if (edge === 'right') {
                n.max = this.max;
            } else {
                n.min = this.min;
            }
        }
    }

    private settle(): IntervalNode<K> {
        if (this.split !== null) {
            this.split.left.updateHeight();
            this.split.right.updateHeight();
        }
        this.updateHeight();
        return rebalance(this);
    }

    testPoint(point: Bound<K>): Names {
        return Set<Name>().withMutations(acc => this.collectPoint(point, acc));
    }

    testRange(start: Bound<K>, end: Bound<K>): Names {
        return Set<Name>().withMutations(acc => this.collectRange(start, end, acc));
    }

    private collectPoint(point: Bound<K>, acc: Names): void {
        const d = this.domain;
        if (d.le(this.min, point) && d.le(point, this.max)) {
            this.covering.forEach(n => { acc.add(n); });
        }
        const s = this.split;
        if (s !== null) {
            if (d.le(point, s.boundary)) s.left.collectPoint(point, acc);
            if (d.ge(point, s.boundary)) s.right.collectPoint(point, acc);
        }
    }

    private collectRange(start: Bound<K>, end: Bound<K>, acc: Names): void {
        const d = this.domain;
        if (d.ge(this.max, start) && d.le(this.min, end)) {
            this.covering.forEach(n => { acc.add(n); });
        }
        const s = this.split;
        if (s !== null) {
            if (d.le(start, s.boundary)) s.left.collectRange(start, end, acc);
            if (d.le(s.boundary, end)) s.right.collectRange(start, end, acc);
        }
    }
}
