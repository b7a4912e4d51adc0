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

// Pre-order traversal of a span tree over an explicit stack.

import type { IntervalNode, Names } from './node.js';

export type NonEmptyStack<T> = { item: T, rest: Stack<T> };
export type Stack<T> = null | NonEmptyStack<T>;

export type Side = 'root' | 'left' | 'right';

export interface Visit<K> {
    node: IntervalNode<K>;
    depth: number;
    side: Side;
    // Names stored at strict ancestors of `node`.
    inherited: Names;
}

export function push<T>(item: T, rest: Stack<T>): NonEmptyStack<T> {
    return { item, rest };
}

export function* preorder<K>(root: IntervalNode<K>): IterableIterator<Visit<K>> {
    let stack: Stack<Visit<K>> =
        push({ node: root, depth: 0, side: 'root', inherited: root.covering.clear() }, null);
    while (stack !== null) {
        const visit: Visit<K> = stack.item;
        stack = stack.rest;
        yield visit;
        const s = visit.node.split;
        if (s !== null) {
            const inherited = visit.inherited.union(visit.node.covering);
            const depth = visit.depth + 1;
            stack = push({ node: s.right, depth, side: 'right', inherited }, stack);
            stack = push({ node: s.left, depth, side: 'left', inherited }, stack);
        }
    }
}
