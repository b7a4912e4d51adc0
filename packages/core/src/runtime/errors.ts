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

export class IntervalTreeError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class InvalidIntervalError extends IntervalTreeError {
    readonly start: string;
    readonly end: string;

    constructor(start: string, end: string) {
        super(`The start of an interval must be smaller than its end (got ${start} and ${end})`);
        this.start = start;
        this.end = end;
    }
}

export class DuplicateNameError extends IntervalTreeError {
    readonly intervalName: string;

    constructor(intervalName: string) {
        super(`An interval named ${JSON.stringify(intervalName)} is already present`);
        this.intervalName = intervalName;
    }
}

export class NameNotFoundError extends IntervalTreeError {
    readonly intervalName: string;

    constructor(intervalName: string) {
        super(`No interval named ${JSON.stringify(intervalName)}`);
        this.intervalName = intervalName;
    }
}

// Signals a bug in the rebalancing decision, never bad input.
export class RotationError extends IntervalTreeError {
    constructor(direction: 'left' | 'right') {
        super(`Can't move a leaf node up (rotating ${direction})`);
    }
}

export class InvariantViolationError extends IntervalTreeError {
    readonly problems: ReadonlyArray<string>;

    constructor(problems: ReadonlyArray<string>) {
        super(`Interval tree invariants violated:\n - ${problems.join('\n - ')}`);
        this.problems = problems;
    }
}
