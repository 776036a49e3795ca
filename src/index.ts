/**
 * Cladekit - public API
 */

export * from './types.js';
export * from './errors.js';
export { PhyloTree, type NodeFields } from './phylo-tree.js';
export { parseNewick, splitNewickStatements, isNumericToken } from './newick-parser.js';
export {
    exportNewick,
    formatLabel,
    formatBranchLength,
    formatSupport,
    DEFAULT_EXPORT_OPTIONS,
    type NewickExportOptions
} from './newick-exporter.js';
export { isMonophyletic, checkMonophyly, commonAncestor, presentLeafNames, type MonophylyReport } from './monophyly.js';
export { validateTree, type ValidationResult, type ValidationIssue, type IssueSeverity, type IssueType } from './validation.js';
export { pruneTree, type PruneOptions, type PruneResult } from './prune.js';
export {
    extractInternalStats,
    passesSupportFilter,
    passesLeafCount,
    coveredGroups,
    countCoveredGroups,
    passesGroupCoverage,
    type InternalStats,
    type SupportThresholds
} from './filters.js';
export { classifyWgd, classifyWgt, aggregateWgd, aggregateWgt, ratio } from './polyploidy.js';
export {
    parseBatch,
    filterBatch,
    type ParsedBatch,
    type ParsedStatement,
    type ParseFailure,
    type FilterOutcome,
    type BatchOptions
} from './batch.js';
export * from './summary.js';
export { loadGroupMapping, groupMembers } from './group-map.js';
export { resolveConfig, resolveCopySets, parseNameList } from './settings.js';
export { createLogger, silentLogger, type Logger, type LogLevel } from './logger.js';
export { runCli, type CliIo } from './cli.js';
