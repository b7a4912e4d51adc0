import {
    Bound,
    IntervalTree,
    IntervalTreeError,
    NegativeInfinity,
    PositiveInfinity,
    numbers,
} from '@spanindex/core';

export type NumericBound = Bound<number>;

export interface IntervalRecord {
    name: string;
    start: NumericBound;
    end: NumericBound;
    lineNumber: number;
}

export class IntervalFileError extends Error {
    readonly fileName: string;
    readonly lineNumber: number;

    constructor(fileName: string, lineNumber: number, message: string) {
        super(`${fileName}:${lineNumber}: ${message}`);
        this.name = 'IntervalFileError';
        this.fileName = fileName;
        this.lineNumber = lineNumber;
    }
}

export class RangeSyntaxError extends Error {
    constructor(text: string) {
        super(`Invalid range ${JSON.stringify(text)}; expected start:end`);
        this.name = 'RangeSyntaxError';
    }
}

export function parseBound(text: string): NumericBound | null {
    switch (text) {
        case '-inf': return NegativeInfinity;
        case 'inf':
        case '+inf': return PositiveInfinity;
        default: {
            if (text.trim() === '') return null;
            const n = Number(text);
            return Number.isNaN(n) ? null : n;
        }
    }
}

/**
 * Parses `start:end`, as given to `--range`.
 */
export function parseRange(text: string): [NumericBound, NumericBound] {
    const parts = text.split(/:/);
    const start = parts.length === 2 ? parseBound(parts[0]) : null;
    const end = parts.length === 2 ? parseBound(parts[1]) : null;
    if (start === null || end === null) {
        throw new RangeSyntaxError(text);
    }
    return [start, end];
}

// One interval per line, "name start end"; blank lines and #-comments are
// skipped.
export function parseIntervals(source: string, fileName: string): Array<IntervalRecord> {
    const records: Array<IntervalRecord> = [];
    source.split(/\r?\n/).forEach((rawLine, index) => {
        const lineNumber = index + 1;
        const line = rawLine.replace(/#.*$/, '').trim();
        if (line === '') return;
        const fields = line.split(/\s+/);
        if (fields.length !== 3) {
            throw new IntervalFileError(fileName, lineNumber,
                                        `expected "name start end", got ${JSON.stringify(line)}`);
        }
        const [name, startText, endText] = fields;
        const start = parseBound(startText);
        const end = parseBound(endText);
        if (start === null) throw new IntervalFileError(fileName, lineNumber, `bad start ${JSON.stringify(startText)}`);
        if (end === null) throw new IntervalFileError(fileName, lineNumber, `bad end ${JSON.stringify(endText)}`);
        records.push({ name, start, end, lineNumber });
    });
    return records;
}

export function loadIntervals(tree: IntervalTree<number>, records: Array<IntervalRecord>, fileName: string) {
    for (const { name, start, end, lineNumber } of records) {
        try {
            tree.add(start, end, name);
        } catch (e) {
            if (e instanceof IntervalTreeError) throw new IntervalFileError(fileName, lineNumber, e.message);
            throw e;
        }
    }
}

export function newTree(): IntervalTree<number> {
    return new IntervalTree(numbers);
}
