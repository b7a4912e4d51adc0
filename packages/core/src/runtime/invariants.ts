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

import type { IntervalNode } from './node.js';
import { preorder } from './walk.js';

function spanOf<K>(n: IntervalNode<K>): string {
    return `[${n.domain.format(n.min)}, ${n.domain.format(n.max)}]`;
}

/**
 * Lists every structural invariant the subtree at `root` breaks: span
 * partitioning, stored heights, AVL balance, a name stored twice along a path
 * or at both children of one node, and a split with no names beneath it. An
 * empty result means the subtree is well-formed.
 */
export function findProblems<K>(root: IntervalNode<K>): Array<string> {
    const problems: Array<string> = [];
    for (const { node, inherited } of preorder(root)) {
        const d = node.domain;
        const where = `node ${spanOf(node)}`;

        if (!d.lt(node.min, node.max)) problems.push(`${where}: empty span`);

        const expectedHeight = node.computeHeight();
        if (node.height !== expectedHeight) {
            problems.push(`${where}: height ${node.height}, expected ${expectedHeight}`);
        }

        const repeated = node.covering.intersect(inherited);
        if (!repeated.isEmpty()) {
            problems.push(`${where}: ${repeated.sort().join(', ')} also stored at an ancestor`);
        }

        const s = node.split;
        if (s === null) continue;

        if (!(d.lt(node.min, s.boundary) && d.lt(s.boundary, node.max))) {
            problems.push(`${where}: boundary ${d.format(s.boundary)} outside the span`);
        }
        if (d.compare(s.left.min, node.min) !== 0 || d.compare(s.left.max, s.boundary) !== 0) {
            problems.push(`${where}: left child spans ${spanOf(s.left)}`);
        }
        if (d.compare(s.right.min, s.boundary) !== 0 || d.compare(s.right.max, node.max) !== 0) {
            problems.push(`${where}: right child spans ${spanOf(s.right)}`);
        }

        const balance = node.balance();
        if (Math.abs(balance) > 1) problems.push(`${where}: balance ${balance}`);

        const shared = s.left.covering.intersect(s.right.covering);
        if (!shared.isEmpty()) {
            problems.push(`${where}: ${shared.sort().join(', ')} stored at both children`);
        }

        if (s.left.isEmpty() && s.right.isEmpty()) {
            problems.push(`${where}: nothing stored below boundary ${d.format(s.boundary)}`);
        }
    }
    return problems;
}
