import yargs from 'yargs/yargs';

import fs from 'fs';
import { glob } from 'glob';

import { IntervalTree, IntervalTreeError, Names } from '@spanindex/core';

import {
    IntervalFileError,
    RangeSyntaxError,
    loadIntervals,
    newTree,
    parseIntervals,
    parseRange,
} from './intervals.js';

export type CommandLineArguments = {
    input: string | undefined;
    point: Array<number>;
    range: Array<string>;
    remove: Array<string>;
    dump: boolean;
    check: boolean;
};

export function parseArguments(argv: string[]): CommandLineArguments {
    const parsed = yargs(argv)
        .scriptName('spanindex')
        .command('$0 [input]',
                 'Answer point and range queries over interval files',
                 yargs => yargs
                     .positional('input', {
                         type: 'string',
                         description: 'Interval filename or glob (stdin if omitted)',
                     }))
        .option('point', {
            alias: 'p',
            type: 'number',
            array: true,
            description: 'Report the intervals containing this point',
        })
        .option('range', {
            alias: 'r',
            type: 'string',
            array: true,
            description: 'Report the intervals overlapping start:end',
        })
        .option('remove', {
            type: 'string',
            array: true,
            description: 'Remove the named interval after loading',
        })
        .option('dump', {
            type: 'boolean',
            description: 'Print the tree structure',
            default: false,
        })
        .option('check', {
            type: 'boolean',
            description: 'Validate the tree after loading',
            default: true,
        })
        .parseSync();

    return {
        input: (typeof parsed.input === 'string') ? parsed.input : void 0,
        point: parsed.point ?? [],
        range: parsed.range ?? [],
        remove: parsed.remove ?? [],
        dump: parsed.dump,
        check: parsed.check,
    };
}

function formatNames(names: Names): string {
    return names.isEmpty() ? '(none)' : names.sort().join(' ');
}

export function runQueries(tree: IntervalTree<number>, options: CommandLineArguments): Array<string> {
    for (const name of options.remove) tree.remove(name);
    const lines: Array<string> = [];
    if (options.dump) lines.push(tree.toString());
    for (const p of options.point) {
        lines.push(`point ${p}: ${formatNames(tree.testPoint(p))}`);
    }
    for (const r of options.range) {
        const [start, end] = parseRange(r);
        lines.push(`range ${r}: ${formatNames(tree.testRange(start, end))}`);
    }
    return lines;
}

export function buildTree(inputFilenames: Array<string>, check: boolean): IntervalTree<number> {
    const tree = newTree();
    for (const inputFilename of inputFilenames) {
        const source = fs.readFileSync(inputFilename, 'utf-8');
        loadIntervals(tree, parseIntervals(source, inputFilename), inputFilename);
    }
    if (check) tree.validate();
    return tree;
}

export function main(argv: string[]) {
    const STDIN = '/dev/stdin';
    try {
        const options = parseArguments(argv);
        const inputFilenames = (options.input === void 0) ? [STDIN] : glob.sync(options.input).sort();
        if (inputFilenames.length === 0) {
            console.warn(`No interval files matched ${JSON.stringify(options.input)}`);
        }
        const tree = buildTree(inputFilenames, options.check);
        runQueries(tree, options).forEach(line => console.log(line));
    } catch (e) {
        if (e instanceof IntervalTreeError || e instanceof IntervalFileError || e instanceof RangeSyntaxError) {
            console.error(e.message);
            process.exitCode = 1;
        } else {
            throw e;
        }
    }
}
