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

// AVL rotations over span nodes. A rotation changes the spans of the two nodes
// it swaps, so their covering sets are redistributed from snapshots taken
// before any pointer moves.

import { RotationError } from './errors.js';
import type { IntervalNode } from './node.js';

/**
 * Promotes the left child. The demoted node keeps the right part of the
 * original span, starting at the promoted node's boundary.
 */
export function rotateRight<K>(old: IntervalNode<K>): IntervalNode<K> {
    const outer = old.split;
    if (outer === null || outer.left.split === null) throw new RotationError('right');
    const promoted = outer.left;
    const inner = outer.left.split;

    const oldCovering = old.covering;
    const promotedCovering = promoted.covering;

    outer.left = inner.right;
    inner.right = old;

    promoted.min = old.min;
    promoted.max = old.max;
    old.min = inner.boundary;

    promoted.covering = oldCovering;
    old.covering = oldCovering.clear();
    inner.left.covering = inner.left.covering.union(promotedCovering);
    outer.left.covering = outer.left.covering.union(promotedCovering);
    old.hoistShared();

    old.updateHeight();
    promoted.updateHeight();
    return promoted;
}

/**
 * Mirror image of {@link rotateRight}.
 */
export function rotateLeft<K>(old: IntervalNode<K>): IntervalNode<K> {
    const outer = old.split;
    if (outer === null || outer.right.split === null) throw new RotationError('left');
    const promoted = outer.right;
    const inner = outer.right.split;

    const oldCovering = old.covering;
    const promotedCovering = promoted.covering;

    outer.right = inner.left;
    inner.left = old;

    promoted.min = old.min;
    promoted.max = old.max;
    old.max = inner.boundary;

    promoted.covering = oldCovering;
    old.covering = oldCovering.clear();
    inner.right.covering = inner.right.covering.union(promotedCovering);
    outer.right.covering = outer.right.covering.union(promotedCovering);
    old.hoistShared();

    old.updateHeight();
    promoted.updateHeight();
    return promoted;
}

/**
 * Restores the AVL property at `node`, whose children's heights must be
 * current. Returns the root of the rebalanced subtree.
 *
 * A removal can shorten one side by more than a single level, so the demoted
 * node is rebalanced in turn and the new root checked again. Hoisting during a
 * rotation can leave a demoted node with nothing beneath its split, so every
 * demoted node is compacted before its height is read again.
 */
export function rebalance<K>(node: IntervalNode<K>): IntervalNode<K> {
    const s = node.split;
    if (s === null) return node;

    const balance = node.balance();
    let root: IntervalNode<K>;
    if (balance < -1) {
        const l = s.left.split;
        if (s.left.balance() > 0 && l !== null && l.right.split !== null) {
            s.left = demote(s.left, rotateLeft);
        }
        root = rotateRight(node);
    } else if (balance > 1) {
        const r = s.right.split;
        if (s.right.balance() < 0 && r !== null && r.left.split !== null) {
            s.right = demote(s.right, rotateRight);
        }
        root = rotateLeft(node);
    } else {
        return node;
    }

    const top = root.split;
    if (top === null) throw new RotationError(balance < 0 ? 'right' : 'left');
    node.compact();
    node.updateHeight();
    if (top.left === node) {
        top.left = rebalance(node);
    } else {
        top.right = rebalance(node);
    }
    top.left.updateHeight();
    top.right.updateHeight();
    root.compact();
    root.updateHeight();
    return rebalance(root);
}

function demote<K>(node: IntervalNode<K>,
                   rotate: (n: IntervalNode<K>) => IntervalNode<K>): IntervalNode<K>
{
    const root = rotate(node);
    node.compact();
    node.updateHeight();
    root.updateHeight();
    return root;
}
