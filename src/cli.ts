/**
 * Command-line front end
 *
 * Usage:
 *   cladekit prune -i trees.nwk -o pruned.nwk -n Node1,Node2
 *   cladekit filter-support -i trees.nwk -o kept.nwk -t 0.8 -b 0.02
 *   cladekit filter-leaves -i trees.nwk -o kept.nwk -t 10
 *   cladekit filter-groups -i trees.nwk -c groups.csv -o kept.nwk -g 30
 *   cladekit wgd -a 1,2 -b 3,4 gene1.nwk gene2.nwk
 *   cladekit wgt -a 1,2,3 -b 4,5,6 *.nwk
 *   cladekit stats -i trees.nwk
 */

import { readFileSync, writeFileSync } from 'fs';
import { parseArgs } from 'util';
import { CladekitConfig } from './types.js';
import { CladekitError, StructuralError, UsageError } from './errors.js';
import { Logger, createLogger } from './logger.js';
import { parseBatch, filterBatch, FilterOutcome } from './batch.js';
import { exportNewick } from './newick-exporter.js';
import { pruneTree } from './prune.js';
import {
    extractInternalStats,
    passesSupportFilter,
    passesLeafCount,
    passesGroupCoverage,
    countCoveredGroups
} from './filters.js';
import { aggregateWgd, aggregateWgt } from './polyploidy.js';
import { TsvCollector, writeWgdTable, writeWgtTable, formatFilterReport } from './summary.js';
import { loadGroupMapping, groupMembers } from './group-map.js';
import {
    resolveConfig,
    resolveCopySets,
    parseNameList,
    parseNumberOption,
    parseIntegerOption
} from './settings.js';

// ==================== IO ====================

/** Everything the CLI touches outside the process */
export interface CliIo {
    readFile(path: string): string;
    writeFile(path: string, content: string): void;
    /** Report lines for the user (stdout) */
    print(line: string): void;
    logger: Logger;
}

export function nodeIo(): CliIo {
    return {
        readFile: path => readFileSync(path, 'utf-8'),
        writeFile: (path, content) => writeFileSync(path, content, 'utf-8'),
        print: line => console.log(line),
        logger: createLogger('cladekit')
    };
}

export const USAGE = [
    'Usage: cladekit <command> [options]',
    '',
    'Commands:',
    '  prune           -i <in> -o <out> -n <names> [--precision 10] [--internal-names] [--strict]',
    '  filter-support  -i <in> -o <out> [-t 0.7] [-b 0.01]',
    '  filter-leaves   -i <in> -o <out> -t <min leaves>',
    '  filter-groups   -i <in> -c <mapping.csv> -o <out> [-g 30]',
    '  wgd             -a <copies> -b <copies> [-o WGD_support_summary.txt] <files...>',
    '  wgt             -a <copies> -b <copies> [-o WGT_support_summary.txt] <files...>',
    '  stats           -i <in> [-c <mapping.csv>] [-o <out>]'
].join('\n');

// ==================== HELPERS ====================

function required(value: string | undefined, option: string): string {
    if (!value) throw new UsageError(`Missing required option ${option}`);
    return value;
}

function joinStatements(statements: string[]): string {
    return statements.length > 0 ? `${statements.join('\n')}\n` : '';
}

function writeFiltered(io: CliIo, outPath: string, outcome: FilterOutcome, cutoffs: Array<[string, string | number]>): void {
    io.writeFile(outPath, joinStatements(outcome.passed));
    for (const line of formatFilterReport(outcome, cutoffs)) io.print(line);
    io.print(`Filtered trees saved to '${outPath}'.`);
}

/** parseArgs throws plain TypeErrors on unknown options */
function parseCommandArgs<T>(parse: () => T): T {
    try {
        return parse();
    } catch (err) {
        if (err instanceof TypeError) throw new UsageError(err.message);
        throw err;
    }
}

// ==================== COMMANDS ====================

function runPrune(args: string[], io: CliIo): void {
    const { values } = parseCommandArgs(() => parseArgs({
        args,
        options: {
            input: { type: 'string', short: 'i' },
            output: { type: 'string', short: 'o' },
            names: { type: 'string', short: 'n' },
            precision: { type: 'string' },
            'internal-names': { type: 'boolean', default: false },
            strict: { type: 'boolean', default: false }
        }
    }));

    const input = required(values.input, '-i');
    const output = required(values.output, '-o');
    const names = parseNameList(required(values.names, '-n'));
    const config = resolveConfig({ precision: parseIntegerOption(values.precision, '--precision') });

    const batch = parseBatch(io.readFile(input), { source: input, logger: io.logger });
    const written: string[] = [];
    let removed = 0;
    let refused = 0;

    for (const { index, tree } of batch.trees) {
        try {
            const result = pruneTree(tree, names, { strict: values.strict, logger: io.logger });
            removed += result.removed.length;
        } catch (err) {
            if (!(err instanceof StructuralError)) throw err;
            io.logger.error(`${input}: tree ${index + 1} not written: ${err.message}`);
            refused++;
            continue;
        }
        written.push(exportNewick(tree, {
            precision: config.precision,
            internalNames: values['internal-names']
        }));
    }

    io.writeFile(output, joinStatements(written));
    io.print(`Total trees:    ${batch.attempted}`);
    io.print(`Trees written:  ${written.length}`);
    io.print(`Nodes removed:  ${removed}`);
    io.print(`Parse failures: ${batch.failures.length}`);
    if (refused > 0) io.print(`Refused (strict): ${refused}`);
    io.print(`Pruned trees saved to '${output}'.`);
}

function runFilterSupport(args: string[], io: CliIo): void {
    const { values } = parseCommandArgs(() => parseArgs({
        args,
        options: {
            input: { type: 'string', short: 'i' },
            output: { type: 'string', short: 'o' },
            threshold_support: { type: 'string', short: 't' },
            threshold_branch: { type: 'string', short: 'b' }
        }
    }));

    const input = required(values.input, '-i');
    const output = required(values.output, '-o');
    const config = resolveConfig({
        minSupport: parseNumberOption(values.threshold_support, '-t'),
        minBranch: parseNumberOption(values.threshold_branch, '-b')
    });

    const outcome = filterBatch(
        io.readFile(input),
        tree => passesSupportFilter(tree, config),
        { source: input, logger: io.logger }
    );
    writeFiltered(io, output, outcome, [
        ['Support cutoff', config.minSupport],
        ['Branch length cutoff', config.minBranch]
    ]);
}

function runFilterLeaves(args: string[], io: CliIo): void {
    const { values } = parseCommandArgs(() => parseArgs({
        args,
        options: {
            input: { type: 'string', short: 'i' },
            output: { type: 'string', short: 'o' },
            threshold: { type: 'string', short: 't' }
        }
    }));

    const input = required(values.input, '-i');
    const output = required(values.output, '-o');
    const config = resolveConfig({
        minLeaves: parseIntegerOption(required(values.threshold, '-t'), '-t')
    });

    const outcome = filterBatch(
        io.readFile(input),
        tree => passesLeafCount(tree, config.minLeaves),
        { source: input, logger: io.logger }
    );
    writeFiltered(io, output, outcome, [['Leaf count cutoff', config.minLeaves]]);
}

function runFilterGroups(args: string[], io: CliIo): void {
    const { values } = parseCommandArgs(() => parseArgs({
        args,
        options: {
            input: { type: 'string', short: 'i' },
            csv: { type: 'string', short: 'c' },
            output: { type: 'string', short: 'o' },
            groups: { type: 'string', short: 'g' }
        }
    }));

    const input = required(values.input, '-i');
    const csv = required(values.csv, '-c');
    const output = required(values.output, '-o');
    const config = resolveConfig({ minGroups: parseIntegerOption(values.groups, '-g') });

    const mapping = loadGroupMapping(io.readFile(csv));
    io.logger.info(`Loaded ${mapping.size} ids in ${groupMembers(mapping).size} groups from ${csv}`);

    const outcome = filterBatch(
        io.readFile(input),
        tree => passesGroupCoverage(tree, mapping, config.minGroups),
        { source: input, logger: io.logger }
    );
    writeFiltered(io, output, outcome, [['Required groups', config.minGroups]]);
}

function runClassification(kind: 'wgd' | 'wgt', args: string[], io: CliIo): void {
    const { values, positionals } = parseCommandArgs(() => parseArgs({
        args,
        allowPositionals: true,
        options: {
            a: { type: 'string', short: 'a' },
            b: { type: 'string', short: 'b' },
            output: { type: 'string', short: 'o' },
            digits: { type: 'string' }
        }
    }));

    const sets = resolveCopySets(values.a, values.b);
    if (positionals.length === 0) throw new UsageError('No input files given');

    const config: CladekitConfig = resolveConfig({ ratioDigits: parseIntegerOption(values.digits, '--digits') });
    const output = values.output ?? (kind === 'wgd' ? 'WGD_support_summary.txt' : 'WGT_support_summary.txt');
    const table = new TsvCollector();

    // Files are independent units; rows are collected for a single write
    const batches = positionals.map(file => parseBatch(io.readFile(file), { source: file, logger: io.logger }));
    if (kind === 'wgd') {
        writeWgdTable(table, batches.map(b => aggregateWgd(b, sets)), config.ratioDigits);
    } else {
        writeWgtTable(table, batches.map(b => aggregateWgt(b, sets)), config.ratioDigits);
    }

    io.writeFile(output, table.toString());
    io.print(`Analysis completed. Results saved to ${output}`);
    if (kind === 'wgd') {
        io.print('  - Independent: both species monophyletic (WGD after speciation)');
        io.print('  - Shared: neither species monophyletic (WGD before speciation)');
        io.print('  - Uncertain: mixed pattern (may indicate gene loss)');
    } else {
        io.print('  - Higher Shared_Ratio (>0.5) suggests a shared WGT event');
        io.print('  - Higher NonShared_Ratio (>0.5) suggests independent WGT events');
    }
}

function runStats(args: string[], io: CliIo): void {
    const { values } = parseCommandArgs(() => parseArgs({
        args,
        options: {
            input: { type: 'string', short: 'i' },
            output: { type: 'string', short: 'o' },
            csv: { type: 'string', short: 'c' }
        }
    }));

    const input = required(values.input, '-i');
    const mapping = values.csv ? loadGroupMapping(io.readFile(values.csv)) : null;
    const batch = parseBatch(io.readFile(input), { source: input, logger: io.logger });

    const table = new TsvCollector();
    const header = ['Tree', 'Leaves', 'Supports', 'Min_Support', 'Min_Branch'];
    if (mapping) header.push('Groups');
    table.writeRow(header);

    for (const { index, tree } of batch.trees) {
        const { supports, branches } = extractInternalStats(tree);
        const row = [
            String(index + 1),
            String(tree.leafCount()),
            String(supports.length),
            supports.length > 0 ? String(Math.min(...supports)) : 'NA',
            branches.length > 0 ? String(Math.min(...branches)) : 'NA'
        ];
        if (mapping) row.push(String(countCoveredGroups(tree, mapping)));
        table.writeRow(row);
    }

    if (values.output) {
        io.writeFile(values.output, table.toString());
    } else {
        io.print(table.toString().trimEnd());
    }
    io.print(`Total trees: ${batch.attempted}, parsed: ${batch.trees.length}, failures: ${batch.failures.length}`);
}

// ==================== ENTRY ====================

const COMMANDS: Record<string, (args: string[], io: CliIo) => void> = {
    'prune': runPrune,
    'filter-support': runFilterSupport,
    'filter-leaves': runFilterLeaves,
    'filter-groups': runFilterGroups,
    'wgd': (args, io) => runClassification('wgd', args, io),
    'wgt': (args, io) => runClassification('wgt', args, io),
    'stats': runStats
};

/**
 * Run one command; returns the process exit code
 */
export function runCli(argv: string[], io: CliIo = nodeIo()): number {
    const [command, ...rest] = argv;
    const handler = command && Object.prototype.hasOwnProperty.call(COMMANDS, command)
        ? COMMANDS[command]
        : undefined;

    if (!handler) {
        if (command && command !== '-h' && command !== '--help') {
            io.logger.error(`Unknown command '${command}'`);
        }
        io.print(USAGE);
        return command === '-h' || command === '--help' ? 0 : 1;
    }

    try {
        handler(rest, io);
        return 0;
    } catch (err) {
        if (err instanceof UsageError) {
            io.logger.error(err.message);
            io.print(USAGE);
            return 1;
        }
        if (err instanceof CladekitError) {
            io.logger.error(err.message);
            return 1;
        }
        throw err;
    }
}
