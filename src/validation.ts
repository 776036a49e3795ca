/**
 * Tree Validation Module
 * Structural invariant checks and data warnings for a PhyloTree
 */

import { NodeId } from './types.js';
import { PhyloTree } from './phylo-tree.js';

// ==================== ISSUE TYPES ====================

export type IssueSeverity = 'error' | 'warning' | 'info';

export type IssueType =
    | 'parent_link'
    | 'unnamed_leaf'
    | 'shared_child'
    | 'duplicate_leaf'
    | 'negative_length'
    | 'unary_node';

export interface ValidationIssue {
    severity: IssueSeverity;
    type: IssueType;
    message: string;
    nodeIds: NodeId[];
}

export interface ValidationResult {
    valid: boolean;
    issues: ValidationIssue[];
    stats: {
        errors: number;
        warnings: number;
        infos: number;
    };
}

// ==================== VALIDATION ====================

/**
 * Run all checks over the nodes reachable from the root.
 * Errors break the data-model invariants; warnings and infos do not.
 */
export function validateTree(tree: PhyloTree): ValidationResult {
    const issues: ValidationIssue[] = [];
    const addIssue = (severity: IssueSeverity, type: IssueType, message: string, nodeIds: NodeId[]) => {
        issues.push({ severity, type, message, nodeIds });
    };

    const seen = new Set<NodeId>();
    const leafIds = new Map<string, NodeId[]>();

    if (tree.parent(tree.root) !== null) {
        addIssue('error', 'parent_link', 'Root has a parent', [tree.root]);
    }

    for (const id of tree.preorder()) {
        const node = tree.get(id);

        for (const childId of node.children) {
            if (tree.parent(childId) !== id) {
                addIssue('error', 'parent_link', `Node ${childId} does not point back to its parent ${id}`, [id, childId]);
            }
            if (seen.has(childId)) {
                addIssue('error', 'shared_child', `Node ${childId} appears under more than one parent`, [childId]);
            }
            seen.add(childId);
        }

        if (node.children.length === 0) {
            if (!node.name) {
                addIssue('error', 'unnamed_leaf', `Leaf ${id} has no name`, [id]);
            } else {
                const list = leafIds.get(node.name) ?? [];
                list.push(id);
                leafIds.set(node.name, list);
            }
        } else if (node.children.length === 1) {
            addIssue('info', 'unary_node', `Internal node ${id} has a single child`, [id]);
        }

        if (node.length !== undefined && node.length < 0) {
            addIssue('warning', 'negative_length', `Node ${id} has negative branch length ${node.length}`, [id]);
        }
    }

    for (const [name, ids] of leafIds) {
        if (ids.length > 1) {
            addIssue('warning', 'duplicate_leaf', `Leaf name '${name}' occurs ${ids.length} times`, ids);
        }
    }

    const stats = {
        errors: issues.filter(i => i.severity === 'error').length,
        warnings: issues.filter(i => i.severity === 'warning').length,
        infos: issues.filter(i => i.severity === 'info').length
    };

    return {
        valid: stats.errors === 0,
        issues,
        stats
    };
}
