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

import assert from 'assert';
import { Set, is } from 'immutable';

import {
    DuplicateNameError,
    IntervalTree,
    InvalidIntervalError,
    NameNotFoundError,
    NegativeInfinity,
    Names,
    PositiveInfinity,
    numbers,
    strings,
} from '../src/index.js';

function expectSetsEqual(a: Names, bArray: Array<string>) {
    assert(is(a, Set(bArray)), `expected {${bArray.join(', ')}}, got {${a.sort().join(', ')}}`);
}

function abutting(): IntervalTree<number> {
    const tree = new IntervalTree(numbers);
    tree.add(50, 100, 'a');
    tree.add(100, 150, 'b');
    tree.add(150, 200, 'c');
    return tree;
}

describe('point queries', () => {
    it('should find a single interval including its endpoints', () => {
        const tree = new IntervalTree(numbers);
        tree.add(50, 100, 'a');
        expectSetsEqual(tree.testPoint(0), []);
        expectSetsEqual(tree.testPoint(50), ['a']);
        expectSetsEqual(tree.testPoint(75), ['a']);
        expectSetsEqual(tree.testPoint(100), ['a']);
        expectSetsEqual(tree.testPoint(150), []);
    });

    it('should handle overlapping intervals', () => {
        const tree = new IntervalTree(numbers);
        tree.add(50, 100, 'a');
        tree.add(75, 125, 'b');
        expectSetsEqual(tree.testPoint(0), []);
        expectSetsEqual(tree.testPoint(50), ['a']);
        expectSetsEqual(tree.testPoint(70), ['a']);
        expectSetsEqual(tree.testPoint(75), ['a', 'b']);
        expectSetsEqual(tree.testPoint(80), ['a', 'b']);
        expectSetsEqual(tree.testPoint(100), ['a', 'b']);
        expectSetsEqual(tree.testPoint(110), ['b']);
        expectSetsEqual(tree.testPoint(125), ['b']);
        expectSetsEqual(tree.testPoint(130), []);
    });

    it('should report both intervals at a shared endpoint', () => {
        const tree = abutting();
        expectSetsEqual(tree.testPoint(0), []);
        expectSetsEqual(tree.testPoint(50), ['a']);
        expectSetsEqual(tree.testPoint(75), ['a']);
        expectSetsEqual(tree.testPoint(100), ['a', 'b']);
        expectSetsEqual(tree.testPoint(125), ['b']);
        expectSetsEqual(tree.testPoint(150), ['b', 'c']);
        expectSetsEqual(tree.testPoint(175), ['c']);
        expectSetsEqual(tree.testPoint(200), ['c']);
        expectSetsEqual(tree.testPoint(250), []);
    });

    it('should find nothing in a gap', () => {
        const tree = new IntervalTree(numbers);
        tree.add(50, 100, 'a');
        tree.add(110, 120, 'b');
        expectSetsEqual(tree.testPoint(100), ['a']);
        expectSetsEqual(tree.testPoint(105), []);
        expectSetsEqual(tree.testPoint(110), ['b']);
        expectSetsEqual(tree.testPoint(130), []);
    });

    it('should accept the infinite bounds as points', () => {
        const tree = new IntervalTree(numbers);
        tree.add(NegativeInfinity, 0, 'neg');
        tree.add(0, PositiveInfinity, 'pos');
        expectSetsEqual(tree.testPoint(NegativeInfinity), ['neg']);
        expectSetsEqual(tree.testPoint(-1e9), ['neg']);
        expectSetsEqual(tree.testPoint(0), ['neg', 'pos']);
        expectSetsEqual(tree.testPoint(PositiveInfinity), ['pos']);
    });

    it('should find nothing at an unordered point', () => {
        const tree = new IntervalTree(numbers);
        tree.add(0, 10, 'a');
        tree.add(20, 30, 'b');
        tree.add(NegativeInfinity, PositiveInfinity, 'all');
        expectSetsEqual(tree.testPoint(NaN), []);
        expectSetsEqual(tree.testPoint(5), ['a', 'all']);
    });
});

describe('range queries', () => {
    it('should find a single interval', () => {
        const tree = new IntervalTree(numbers);
        tree.add(50, 100, 'a');
        expectSetsEqual(tree.testRange(0, 10), []);
        expectSetsEqual(tree.testRange(0, 50), ['a']);
        expectSetsEqual(tree.testRange(0, 75), ['a']);
        expectSetsEqual(tree.testRange(100, 150), ['a']);
        expectSetsEqual(tree.testRange(110, 150), []);
    });

    it('should include intervals touching the range ends', () => {
        const tree = abutting();
        expectSetsEqual(tree.testRange(0, 10), []);
        expectSetsEqual(tree.testRange(0, 50), ['a']);
        expectSetsEqual(tree.testRange(50, 100), ['a', 'b']);
        expectSetsEqual(tree.testRange(100, 120), ['a', 'b']);
        expectSetsEqual(tree.testRange(100, 150), ['a', 'b', 'c']);
        expectSetsEqual(tree.testRange(150, 200), ['b', 'c']);
        expectSetsEqual(tree.testRange(180, 210), ['c']);
        expectSetsEqual(tree.testRange(NegativeInfinity, PositiveInfinity), ['a', 'b', 'c']);
    });

    it('should reject an empty or inverted range', () => {
        const tree = abutting();
        assert.throws(() => tree.testRange(100, 100), InvalidIntervalError);
        assert.throws(() => tree.testRange(150, 100), InvalidIntervalError);
    });
});

describe('balancing', () => {
    it('should rotate three abutting intervals to height 2', () => {
        assert.strictEqual(abutting().height, 2);
    });

    it('should keep a hundred unit intervals shallow', () => {
        const tree = new IntervalTree(numbers);
        for (let x = 0; x < 100; x++) tree.add(x, x + 1, String(x));
        assert.strictEqual(tree.height, 7);
        for (let x = 0; x < 100; x++) {
            expectSetsEqual(tree.testPoint(x + 0.5), [String(x)]);
        }
        tree.validate();
    });
});

describe('removal', () => {
    it('should split stabbing sets after removing an inner interval', () => {
        const tree = new IntervalTree(numbers);
        tree.add(5, 10, 'a');
        tree.add(0, 15, 'b');
        tree.add(3, 7, 'c');
        tree.add(8, 12, 'd');
        tree.remove('a');
        expectSetsEqual(tree.testPoint(5), ['b', 'c']);
        expectSetsEqual(tree.testPoint(10), ['b', 'd']);
        tree.validate();
    });

    it('should drain to a single empty leaf', () => {
        const tree = new IntervalTree(numbers);
        for (let x = 0; x < 40; x++) tree.add(x, x + 2 + (x % 3), `i${x}`);
        for (let x = 0; x < 40; x += 2) tree.remove(`i${x}`);
        tree.validate();
        for (let x = 1; x < 40; x += 2) tree.remove(`i${x}`);
        assert(tree.root.isLeaf());
        assert(tree.root.covering.isEmpty());
        assert.strictEqual(tree.height, 0);
        assert.strictEqual(tree.size, 0);
        expectSetsEqual(tree.testRange(NegativeInfinity, PositiveInfinity), []);
    });

    it('should restore the queries seen before an add', () => {
        const tree = abutting();
        tree.add(20, 60, 'x');
        const points = [0, 20, 50, 60, 75, 100, 150, 200, 210];
        const before = points.map(p => tree.testPoint(p));
        tree.add(90, 160, 'probe');
        tree.remove('probe');
        points.forEach((p, i) => assert(is(tree.testPoint(p), before[i]), `point ${p}`));
        expectSetsEqual(tree.testRange(60, 90), ['a', 'x']);
        tree.validate();
    });
});

describe('registry', () => {
    it('should return the endpoints an interval was added with', () => {
        const tree = abutting();
        assert.deepStrictEqual(tree.getEndpoints('b'), { start: 100, end: 150 });
        assert.strictEqual(tree.size, 3);
        assert.deepStrictEqual([... tree.names()], ['a', 'b', 'c']);
        tree.remove('b');
        assert.strictEqual(tree.has('b'), false);
        assert.throws(() => tree.getEndpoints('b'), NameNotFoundError);
        assert.deepStrictEqual([... tree.entries()], [
            ['a', { start: 50, end: 100 }],
            ['c', { start: 150, end: 200 }],
        ]);
    });

    it('should reject a duplicate name without touching the tree', () => {
        const tree = abutting();
        const rendered = tree.toString();
        assert.throws(() => tree.add(0, 10, 'a'), DuplicateNameError);
        assert.strictEqual(tree.toString(), rendered);
        assert.deepStrictEqual(tree.getEndpoints('a'), { start: 50, end: 100 });
        expectSetsEqual(tree.testPoint(5), []);
    });

    it('should reject malformed intervals before mutating', () => {
        const tree = abutting();
        assert.throws(() => tree.add(10, 10, 'z'), InvalidIntervalError);
        assert.throws(() => tree.add(10, 5, 'z'), InvalidIntervalError);
        assert.throws(() => tree.add(NaN, 5, 'z'), InvalidIntervalError);
        assert.throws(() => tree.add(NegativeInfinity, NaN, 'z'), InvalidIntervalError);
        assert.throws(() => tree.testRange(NaN, PositiveInfinity), InvalidIntervalError);
        assert.strictEqual(tree.has('z'), false);
        assert.strictEqual(tree.height, 2);
    });

    it('should fail to remove an unknown name', () => {
        const tree = abutting();
        assert.throws(() => tree.remove('nope'), (e: unknown) =>
            e instanceof NameNotFoundError && e.intervalName === 'nope');
        assert.strictEqual(tree.size, 3);
    });

    it('should forget everything on clear', () => {
        const tree = abutting();
        tree.clear();
        assert.strictEqual(tree.size, 0);
        assert(tree.root.isLeaf());
        expectSetsEqual(tree.testRange(NegativeInfinity, PositiveInfinity), []);
        tree.add(50, 100, 'a');
        expectSetsEqual(tree.testPoint(60), ['a']);
    });
});

describe('other key domains', () => {
    it('should index version strings lexically', () => {
        const tree = new IntervalTree(strings);
        tree.add('1.0', '1.4', 'legacy');
        tree.add('1.2', '2.0', 'current');
        tree.add('2.0', PositiveInfinity, 'next');
        expectSetsEqual(tree.testPoint('1.1'), ['legacy']);
        expectSetsEqual(tree.testPoint('1.3'), ['legacy', 'current']);
        expectSetsEqual(tree.testPoint('2.0'), ['current', 'next']);
        expectSetsEqual(tree.testPoint('9'), ['next']);
        expectSetsEqual(tree.testRange('0', '1.1'), ['legacy']);
        assert.throws(() => tree.add('b', 'a', 'backwards'),
                      (e: unknown) => e instanceof InvalidIntervalError && e.start === '"b"');
    });
});
