// services/categoryMatcher.ts
import type { CategoryMatch } from "../types.js";
import type { DestinationCategory } from "./inventreeService.js";

export interface CategoryMatchResult {
  path: CategoryMatch;
  categoryId: number | null;
  /** Number of distinct destination categories whose name matched a hint segment. */
  considered: number;
  warnings: string[];
}

function key(name: string): string {
  return name.trim().toLowerCase();
}

function byPath(a: string[], b: string[]): number {
  const left = a.join("/");
  const right = b.join("/");
  return left < right ? -1 : left > right ? 1 : 0;
}

/**
 * Read-only index over the destination category listing.
 */
export class CategoryTree {
  private readonly byId = new Map<number, DestinationCategory>();
  private readonly byName = new Map<string, DestinationCategory[]>();

  constructor(categories: DestinationCategory[]) {
    for (const category of categories) {
      this.byId.set(category.pk, category);
      const bucket = this.byName.get(key(category.name)) ?? [];
      bucket.push(category);
      this.byName.set(key(category.name), bucket);
    }
  }

  get size(): number {
    return this.byId.size;
  }

  pathOf(id: number): string[] {
    const path: string[] = [];
    const seen = new Set<number>();
    let node = this.byId.get(id);
    while (node && !seen.has(node.pk)) {
      seen.add(node.pk);
      path.unshift(node.name);
      node = node.parent === null ? undefined : this.byId.get(node.parent);
    }
    return path;
  }

  /** Same-named categories ordered by their full path. */
  named(name: string): DestinationCategory[] {
    return [...(this.byName.get(key(name)) ?? [])].sort((a, b) =>
      byPath(this.pathOf(a.pk), this.pathOf(b.pk))
    );
  }

  child(parent: number | null, name: string): DestinationCategory | undefined {
    return this.named(name).find(category => category.parent === parent);
  }
}

/**
 * Walks the supplier hint from the most general segment down, matching names
 * case-insensitively, and stops at the first segment with no match.
 * Never throws: a miss is reported as a null path plus a warning.
 */
export function matchCategory(hint: string[], tree: CategoryTree): CategoryMatchResult {
  if (hint.length === 0) {
    return {
      path: null,
      categoryId: null,
      considered: 0,
      warnings: ["Supplier reported no category; no destination category suggested"]
    };
  }

  const warnings: string[] = [];
  const considered = new Set<number>();
  let current: DestinationCategory | null = null;

  for (const segment of hint) {
    const candidates = tree.named(segment);
    if (candidates.length === 0) break;
    candidates.forEach(c => considered.add(c.pk));

    const parent: number | null = current ? current.pk : null;
    const underParent: DestinationCategory[] = candidates.filter(c => c.parent === parent);
    const pool: DestinationCategory[] = underParent.length > 0 ? underParent : candidates;

    if (pool.length > 1) {
      warnings.push(
        `Multiple destination categories named '${segment}', using '${tree.pathOf(pool[0].pk).join(" / ")}'`
      );
    }
    current = pool[0];
  }

  if (!current) {
    warnings.push(`No destination category matches supplier category '${hint.join(" / ")}'`);
    return { path: null, categoryId: null, considered: considered.size, warnings };
  }

  return {
    path: tree.pathOf(current.pk),
    categoryId: current.pk,
    considered: considered.size,
    warnings
  };
}
