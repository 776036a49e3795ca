/**
 * Cladekit - Type Definitions
 * Branded node handles, tree node records, configuration and classification types
 */

// ==================== BRANDED TYPES ====================

/** Branded type for node handles - an index into a tree's node arena */
export type NodeId = number & { readonly __brand: 'NodeId' };

/** Helper to create a NodeId from an arena index */
export function toNodeId(index: number): NodeId {
    return index as NodeId;
}

// ==================== CORE ENTITIES ====================

export interface PhyloNode {
    id: NodeId;
    /** Taxon identifier for leaves; optional label for internal nodes */
    name?: string;
    /** Bootstrap or posterior support, read positionally after ')' */
    support?: number;
    /** Branch length to the parent */
    length?: number;
    /** Back-reference only; a node is owned by its parent's children list */
    parent: NodeId | null;
    children: NodeId[];
}

/** Plain nested form of a subtree (debugging, tests) */
export interface NestedNode {
    name?: string;
    support?: number;
    length?: number;
    children?: NestedNode[];
}

// ==================== CONFIGURATION ====================

export interface CladekitConfig {
    /** Decimal places for branch lengths in Newick output */
    precision: number;
    /** Minimum internal support for the support filter */
    minSupport: number;
    /** Minimum internal branch length for the support filter */
    minBranch: number;
    /** Minimum leaf count for the leaf-count filter */
    minLeaves: number;
    /** Minimum number of distinct groups for the group-coverage filter */
    minGroups: number;
    /** Decimal places for ratios in summary tables */
    ratioDigits: number;
}

export const DEFAULT_CONFIG: CladekitConfig = {
    precision: 10,
    minSupport: 0.7,
    minBranch: 0.01,
    minLeaves: 4,
    minGroups: 30,
    ratioDigits: 4
};

/** Two disjoint sets of gene-copy leaf names, one per species */
export interface CopySets {
    a: ReadonlySet<string>;
    b: ReadonlySet<string>;
}

/** Leaf name -> group label (species, order, ...) */
export type GroupMapping = ReadonlyMap<string, string>;

// ==================== CLASSIFICATION ====================

/** Whole-genome duplication verdict for one tree */
export type WgdClass = 'independent' | 'shared' | 'uncertain' | 'skipped';

/** Whole-genome triplication verdict for one tree */
export type WgtClass = 'nonShared' | 'shared';

export interface WgdSummary {
    file: string;
    total: number;
    independent: number;
    shared: number;
    uncertain: number;
    /** Trees parsed but lacking two copies of A or of B */
    skipped: number;
    /** Statements that failed to parse */
    failed: number;
    independentRatio: number;
    sharedRatio: number;
}

export interface WgtSummary {
    file: string;
    total: number;
    nonShared: number;
    shared: number;
    failed: number;
    nonSharedRatio: number;
    sharedRatio: number;
}
