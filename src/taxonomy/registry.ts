import type { TaxonomyNode, TaxonomyNodeInput } from '../types/index.js';
import { ConfigError } from '../utils/errors.js';

/**
 * Read-only tree of method categories shared by every extraction call in a run.
 *
 * Lookups are case-insensitive and accept either a node name or one of its aliases;
 * they always return the canonical node.
 */
export class Taxonomy {
    private readonly byKey = new Map<string, TaxonomyNode>();
    private readonly ordered: TaxonomyNode[];

    private constructor(nodes: TaxonomyNode[]) {
        this.ordered = nodes;
        for (const node of nodes) {
            this.byKey.set(keyOf(node.name), node);
            for (const alias of node.aliases) {
                this.byKey.set(keyOf(alias), node);
            }
        }
    }

    /**
     * Build and validate a taxonomy from configuration nodes.
     * Rejects duplicate names or aliases, unknown parents, and cycles.
     */
    static fromNodes(inputs: readonly TaxonomyNodeInput[]): Taxonomy {
        const inputsByKey = new Map<string, TaxonomyNodeInput>();
        const claimed = new Map<string, string>();

        const claim = (label: string, owner: string): void => {
            const key = keyOf(label);
            const existing = claimed.get(key);
            if (existing !== undefined) {
                throw new ConfigError(`Taxonomy label "${label}" is used by both "${existing}" and "${owner}"`, 'taxonomy');
            }
            claimed.set(key, owner);
        };

        for (const input of inputs) {
            const name = input.name.trim();
            claim(name, name);
            inputsByKey.set(keyOf(name), input);
        }
        for (const input of inputs) {
            for (const alias of input.aliases ?? []) {
                claim(alias.trim(), input.name.trim());
            }
        }

        const resolved = new Map<string, TaxonomyNode>();

        const resolve = (input: TaxonomyNodeInput, trail: string[]): TaxonomyNode => {
            const name = input.name.trim();
            const cached = resolved.get(keyOf(name));
            if (cached) return cached;

            if (trail.includes(keyOf(name))) {
                throw new ConfigError(`Taxonomy cycle through "${name}"`, 'taxonomy');
            }

            let parentNode: TaxonomyNode | null = null;
            if (input.parent) {
                const parentInput = inputsByKey.get(keyOf(input.parent));
                if (!parentInput) {
                    throw new ConfigError(`Taxonomy node "${name}" has unknown parent "${input.parent}"`, 'taxonomy');
                }
                parentNode = resolve(parentInput, [...trail, keyOf(name)]);
            }

            const node: TaxonomyNode = {
                name,
                parent: parentNode?.name ?? null,
                aliases: (input.aliases ?? []).map((alias) => alias.trim()),
                description: input.description?.trim() || null,
                level: parentNode ? parentNode.level + 1 : 1,
                path: parentNode ? [...parentNode.path, name] : [name],
            };
            resolved.set(keyOf(name), node);
            return node;
        };

        return new Taxonomy(inputs.map((input) => resolve(input, [])));
    }

    /**
     * Find the canonical node for a name or alias.
     */
    resolve(label: string): TaxonomyNode | undefined {
        return this.byKey.get(keyOf(label));
    }

    has(label: string): boolean {
        return this.byKey.has(keyOf(label));
    }

    /**
     * All nodes in configuration order.
     */
    nodes(): readonly TaxonomyNode[] {
        return this.ordered;
    }

    children(name: string): TaxonomyNode[] {
        const parent = this.resolve(name);
        if (!parent) return [];
        return this.ordered.filter((node) => node.parent === parent.name);
    }

    get size(): number {
        return this.ordered.length;
    }

    /**
     * Indented outline for prompts, one node per line.
     */
    describe(): string {
        const lines: string[] = [];
        const visit = (node: TaxonomyNode): void => {
            const aliases = node.aliases.length > 0 ? ` (aliases: ${node.aliases.join(', ')})` : '';
            const description = node.description ? `: ${node.description}` : '';
            lines.push(`${'  '.repeat(node.level - 1)}- ${node.name}${aliases}${description}`);
            for (const child of this.children(node.name)) visit(child);
        };
        for (const root of this.ordered.filter((node) => node.parent === null)) visit(root);
        return lines.join('\n');
    }
}

function keyOf(label: string): string {
    return label.trim().toLowerCase().replace(/\s+/g, ' ');
}
