/**
 * PhyloTree - Arena-backed rooted tree
 *
 * Nodes live in a flat array addressed by NodeId. Children lists own their
 * nodes; `parent` is a back-reference used for upward traversal only.
 * Nodes removed by pruning stay in the arena but are no longer reachable
 * from the root, so every query below walks from the root.
 */

import { NodeId, PhyloNode, NestedNode, toNodeId } from './types.js';
import { StructuralError } from './errors.js';

export interface NodeFields {
    name?: string;
    support?: number;
    length?: number;
}

export class PhyloTree {
    private nodes: PhyloNode[] = [];
    private rootId: NodeId;

    constructor(rootFields: NodeFields = {}) {
        this.rootId = this.createNode(rootFields);
    }

    // ==================== ACCESS ====================

    get root(): NodeId {
        return this.rootId;
    }

    /** Number of nodes reachable from the root */
    get size(): number {
        let count = 0;
        for (const _ of this.preorder()) count++;
        return count;
    }

    get(id: NodeId): PhyloNode {
        const node = this.nodes[id];
        if (!node) throw new StructuralError(`Unknown node ${id}`);
        return node;
    }

    isLeaf(id: NodeId): boolean {
        return this.get(id).children.length === 0;
    }

    parent(id: NodeId): NodeId | null {
        return this.get(id).parent;
    }

    children(id: NodeId): readonly NodeId[] {
        return this.get(id).children;
    }

    /**
     * Children of the node's parent excluding the node itself.
     * Empty for the root.
     */
    siblings(id: NodeId): NodeId[] {
        const parentId = this.get(id).parent;
        if (parentId === null) return [];
        return this.get(parentId).children.filter(c => c !== id);
    }

    /** Parent, grandparent, ... up to the root */
    ancestors(id: NodeId): NodeId[] {
        const chain: NodeId[] = [];
        let current = this.get(id).parent;
        while (current !== null) {
            chain.push(current);
            current = this.get(current).parent;
        }
        return chain;
    }

    /** True while the node is still connected to the current root */
    isAttached(id: NodeId): boolean {
        if (id === this.rootId) return true;
        const chain = this.ancestors(id);
        return chain.length > 0 && chain[chain.length - 1] === this.rootId;
    }

    // ==================== TRAVERSAL ====================

    /** Depth-first, parent before children, children in insertion order */
    *preorder(from: NodeId = this.rootId): IterableIterator<NodeId> {
        const stack: NodeId[] = [from];
        while (stack.length > 0) {
            const id = stack.pop();
            if (id === undefined) break;
            yield id;
            const kids = this.get(id).children;
            for (let i = kids.length - 1; i >= 0; i--) {
                stack.push(kids[i]);
            }
        }
    }

    /** Children before parent; matches the order closing parentheses appear in Newick */
    *postorder(from: NodeId = this.rootId): IterableIterator<NodeId> {
        const stack: Array<{ id: NodeId; expanded: boolean }> = [{ id: from, expanded: false }];
        while (stack.length > 0) {
            const top = stack.pop();
            if (!top) break;
            if (top.expanded) {
                yield top.id;
                continue;
            }
            stack.push({ id: top.id, expanded: true });
            const kids = this.get(top.id).children;
            for (let i = kids.length - 1; i >= 0; i--) {
                stack.push({ id: kids[i], expanded: false });
            }
        }
    }

    *leaves(from: NodeId = this.rootId): IterableIterator<NodeId> {
        for (const id of this.preorder(from)) {
            if (this.isLeaf(id)) yield id;
        }
    }

    /** Leaf-set of a subtree, computed on demand */
    leafNames(from: NodeId = this.rootId): Set<string> {
        const names = new Set<string>();
        for (const id of this.leaves(from)) {
            const name = this.get(id).name;
            if (name !== undefined) names.add(name);
        }
        return names;
    }

    leafCount(from: NodeId = this.rootId): number {
        let count = 0;
        for (const _ of this.leaves(from)) count++;
        return count;
    }

    /** Every reachable node carrying this name (duplicates are possible) */
    findByName(name: string): Set<NodeId> {
        const found = new Set<NodeId>();
        for (const id of this.preorder()) {
            if (this.get(id).name === name) found.add(id);
        }
        return found;
    }

    totalBranchLength(): number {
        let sum = 0;
        for (const id of this.preorder()) {
            sum += this.get(id).length ?? 0;
        }
        return sum;
    }

    // ==================== MUTATION ====================

    /** Allocate a detached node in the arena */
    createNode(fields: NodeFields = {}): NodeId {
        const id = toNodeId(this.nodes.length);
        const node: PhyloNode = { id, parent: null, children: [] };
        if (fields.name !== undefined) node.name = fields.name;
        if (fields.support !== undefined) node.support = fields.support;
        if (fields.length !== undefined) node.length = fields.length;
        this.nodes.push(node);
        return id;
    }

    /** Append a detached node to a parent, optionally replacing its branch length */
    addChild(parentId: NodeId, childId: NodeId, length?: number): void {
        const parent = this.get(parentId);
        const child = this.get(childId);
        if (child.parent !== null) {
            throw new StructuralError(`Node ${childId} already has a parent`);
        }
        if (childId === this.rootId) {
            throw new StructuralError('Cannot attach the root below another node');
        }
        child.parent = parentId;
        parent.children.push(childId);
        if (length !== undefined) child.length = length;
    }

    /** Cut a node (and its subtree) loose from its parent */
    detach(id: NodeId): NodeId {
        const node = this.get(id);
        if (node.parent === null) return id;
        const parent = this.get(node.parent);
        parent.children = parent.children.filter(c => c !== id);
        node.parent = null;
        return id;
    }

    /** Make a node the root; the previous structure is abandoned if unreachable */
    setRoot(id: NodeId): void {
        this.detach(id);
        this.rootId = id;
    }

    /**
     * Remove a single node: its children are lifted onto its parent in its place.
     * A non-root parent left with fewer than two children is dissolved into the
     * grandparent the same way (one level only); a lone remaining child absorbs
     * the dissolved parent's branch length.
     */
    deleteNode(id: NodeId): void {
        const node = this.get(id);
        const parentId = node.parent;
        if (parentId === null) {
            throw new StructuralError('Cannot delete the root node');
        }

        this.liftChildren(id);

        const parent = this.get(parentId);
        if (parent.parent !== null && parent.children.length < 2) {
            const lone = parent.children.length === 1 ? this.get(parent.children[0]) : null;
            if (lone && (lone.length !== undefined || parent.length !== undefined)) {
                lone.length = (lone.length ?? 0) + (parent.length ?? 0);
            }
            this.liftChildren(parentId);
        }
    }

    /** Remove a node and everything below it */
    removeSubtree(id: NodeId): void {
        if (id === this.rootId) {
            throw new StructuralError('Cannot remove the root subtree');
        }
        this.detach(id);
    }

    /** Splice a node out, putting its children where it was in the parent's list */
    private liftChildren(id: NodeId): void {
        const node = this.get(id);
        if (node.parent === null) return;
        const parent = this.get(node.parent);
        const index = parent.children.indexOf(id);
        for (const childId of node.children) {
            this.get(childId).parent = node.parent;
        }
        parent.children.splice(index, 1, ...node.children);
        node.children = [];
        node.parent = null;
    }

    // ==================== CONVERSION ====================

    /** Plain nested copy of a subtree, built in preorder without recursion */
    toNested(from: NodeId = this.rootId): NestedNode {
        const built = new Map<NodeId, NestedNode>();
        let top: NestedNode = {};

        for (const id of this.preorder(from)) {
            const node = this.get(id);
            const out: NestedNode = {};
            if (node.name !== undefined) out.name = node.name;
            if (node.support !== undefined) out.support = node.support;
            if (node.length !== undefined) out.length = node.length;
            built.set(id, out);

            const parentOut = id === from || node.parent === null ? undefined : built.get(node.parent);
            if (parentOut === undefined) {
                top = out;
            } else if (parentOut.children) {
                parentOut.children.push(out);
            } else {
                parentOut.children = [out];
            }
        }
        return top;
    }
}
