import type { ValueNode } from '../types.js';

export interface AllocatorOptions {
    /** Allocation fails once this many nodes are live */
    maxNodes?: number;
}

/**
 * Hands out value nodes and takes them back.
 * Keeps a live count so a failed parse can be checked for leaks.
 */
export class NodeAllocator {
    private readonly maxNodes: number;
    private readonly owned = new WeakSet<ValueNode>();
    private count = 0;

    constructor(options: AllocatorOptions = {}) {
        this.maxNodes = options.maxNodes ?? Infinity;
    }

    /** Nodes allocated and not yet released */
    get live(): number {
        return this.count;
    }

    /**
     * Fresh untyped node, or null when the node limit is reached.
     */
    allocate(): ValueNode | null {
        if (this.count >= this.maxNodes) return null;

        const node = createNode();
        this.owned.add(node);
        this.count++;
        return node;
    }

    /**
     * Release a node with its whole subtree and buffers.
     * Nodes this allocator does not own (or no longer owns) are left alone.
     */
    release(node: ValueNode): void {
        for (const current of this.take(node)) {
            current.children = [];
            current.scratch = null;
            current.textValue = null;
            current.key = null;
        }
    }

    /**
     * Hand a completed tree over to the caller: it stays intact but no longer
     * counts against this allocator.
     */
    detach(node: ValueNode): void {
        this.take(node);
    }

    // Drops ownership of every owned node in the tree, without recursing
    private take(node: ValueNode): ValueNode[] {
        const taken: ValueNode[] = [];
        const stack = [node];

        for (let current = stack.pop(); current !== undefined; current = stack.pop()) {
            if (!this.owned.has(current)) continue;

            this.owned.delete(current);
            this.count--;
            taken.push(current);
            for (const child of current.children) {
                stack.push(child);
            }
        }
        return taken;
    }
}

export function createNode(): ValueNode {
    return {
        kind: 'untyped',
        key: null,
        textValue: null,
        numberValue: 0,
        boolValue: false,
        children: [],
        state: 'ITEM',
        scratch: null,
    };
}

/** Count of nodes in a tree, the root included */
export function countNodes(node: ValueNode): number {
    let total = 0;
    const stack = [node];
    for (let current = stack.pop(); current !== undefined; current = stack.pop()) {
        total++;
        for (const child of current.children) {
            stack.push(child);
        }
    }
    return total;
}
