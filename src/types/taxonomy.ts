/**
 * Taxonomy node as written in configuration.
 */
export interface TaxonomyNodeInput {
    name: string;
    /** Parent node name; omitted or null for a root */
    parent?: string | null;
    aliases?: string[];
    description?: string;
}

/**
 * Resolved taxonomy node.
 */
export interface TaxonomyNode {
    readonly name: string;
    readonly parent: string | null;
    readonly aliases: readonly string[];
    readonly description: string | null;
    /** Depth from the root (roots are level 1) */
    readonly level: number;
    /** Names from the root down to this node, inclusive */
    readonly path: readonly string[];
}
