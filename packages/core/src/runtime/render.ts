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

const sideMarks = { root: '', left: '< ', right: '> ' };

export function describeNode<K>(node: IntervalNode<K>): string {
    const names = `[${node.covering.sort().join(', ')}]`;
    return (node.split === null)
        ? `L : ${names}`
        : `B : ${node.domain.format(node.split.boundary)} : ${names}`;
}

/**
 * Renders a subtree one node per line, children indented below their parent
 * and marked `<` (left) or `>` (right).
 */
export function render<K>(root: IntervalNode<K>): string {
    const lines: Array<string> = [];
    for (const { node, depth, side } of preorder(root)) {
        lines.push('  '.repeat(depth) + sideMarks[side] + describeNode(node));
    }
    return lines.join('\n');
}
