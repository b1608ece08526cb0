import type { BundleStore } from '../bundles/bundle-store.js';
import { CyclicDependencyError, SelfDependencyError, UnknownBundleError } from '../../utils/errors.js';

/**
 * Directed "depends on" edges between bundles of a BundleStore.
 *
 * Only the dependant → dependencies direction is stored; dependants are
 * derived by scanning, so there is no second mapping to keep in sync.
 * Insertion order is kept on both levels for deterministic output.
 */
export class DependencyGraph {
  private readonly edges = new Map<string, Set<string>>();

  constructor(private readonly store: BundleStore) {}

  /**
   * Rebuild a graph from persisted edges without validation.
   * Used by the state loader, which may read a hand-edited file.
   */
  static restore(store: BundleStore, record: Record<string, string[]>): DependencyGraph {
    const graph = new DependencyGraph(store);
    for (const [dependant, dependencies] of Object.entries(record)) {
      if (dependencies.length === 0) continue;
      graph.edges.set(dependant, new Set(dependencies));
    }
    return graph;
  }

  /**
   * Record that `dependant` requires `dependency`.
   * All checks run before the edge set is touched.
   */
  addDependency(dependant: string, dependency: string): void {
    if (dependant === dependency) {
      throw new SelfDependencyError(dependant);
    }
    if (!this.store.has(dependant)) {
      throw new UnknownBundleError(dependant);
    }
    if (!this.store.has(dependency)) {
      throw new UnknownBundleError(dependency);
    }
    if (this.edges.get(dependant)?.has(dependency)) {
      return;
    }

    const path = this.findPath(dependency, dependant);
    if (path) {
      throw new CyclicDependencyError(dependant, dependency, path);
    }

    const dependencies = this.edges.get(dependant);
    if (dependencies) {
      dependencies.add(dependency);
    } else {
      this.edges.set(dependant, new Set([dependency]));
    }
  }

  dependenciesOf(id: string): string[] {
    return Array.from(this.edges.get(id) ?? []);
  }

  dependantsOf(id: string): string[] {
    const dependants: string[] = [];
    for (const [dependant, dependencies] of this.edges) {
      if (dependencies.has(id)) {
        dependants.push(dependant);
      }
    }
    return dependants;
  }

  isUsedByOthers(id: string, excluding?: string): boolean {
    return this.dependantsOf(id).some(dependant => dependant !== excluding);
  }

  /**
   * Drop `id`'s own edge set and every edge pointing at it.
   */
  removeBundleEdges(id: string): void {
    this.edges.delete(id);
    for (const [dependant, dependencies] of this.edges) {
      dependencies.delete(id);
      if (dependencies.size === 0) {
        this.edges.delete(dependant);
      }
    }
  }

  /**
   * Transitive dependency closure of `id`, depth-first preorder.
   * `id` itself only appears if a corrupted graph cycles back to it.
   */
  reachableFrom(id: string): string[] {
    const visited = new Set<string>();
    const order: string[] = [];

    const visit = (node: string): void => {
      for (const dependency of this.edges.get(node) ?? []) {
        if (visited.has(dependency)) continue;
        visited.add(dependency);
        order.push(dependency);
        visit(dependency);
      }
    };

    visit(id);
    return order;
  }

  /**
   * Depth-first search for a dependency path `from` → … → `to`.
   * Returns the ids along the path (both ends included) or undefined.
   */
  findPath(from: string, to: string): string[] | undefined {
    const visited = new Set<string>();

    const search = (node: string): string[] | undefined => {
      if (node === to) return [node];
      visited.add(node);
      for (const dependency of this.edges.get(node) ?? []) {
        if (visited.has(dependency)) continue;
        const rest = search(dependency);
        if (rest) return [node, ...rest];
      }
      return undefined;
    };

    return search(from);
  }

  /**
   * First cycle found, as a closed path (`[a, b, a]`), or undefined for a DAG.
   */
  findCycle(): string[] | undefined {
    const done = new Set<string>();
    const onPath: string[] = [];

    const visit = (node: string): string[] | undefined => {
      const index = onPath.indexOf(node);
      if (index !== -1) return [...onPath.slice(index), node];
      if (done.has(node)) return undefined;

      onPath.push(node);
      for (const dependency of this.edges.get(node) ?? []) {
        const cycle = visit(dependency);
        if (cycle) return cycle;
      }
      onPath.pop();
      done.add(node);
      return undefined;
    };

    for (const node of this.edges.keys()) {
      const cycle = visit(node);
      if (cycle) return cycle;
    }
    return undefined;
  }

  /**
   * Order `ids` so that every bundle comes before the bundles it depends on.
   * Ids keep their given relative order where no edge constrains them.
   */
  removalOrder(ids: Iterable<string>): string[] {
    const members = new Set(ids);
    const visited = new Set<string>();
    const order: string[] = [];

    const visit = (node: string): void => {
      if (visited.has(node)) return;
      visited.add(node);
      for (const dependant of this.dependantsOf(node)) {
        if (members.has(dependant)) visit(dependant);
      }
      order.push(node);
    };

    for (const id of members) {
      visit(id);
    }
    return order;
  }

  /**
   * Copy of this graph bound to `store` (normally a clone of the original store).
   */
  clone(store: BundleStore): DependencyGraph {
    return DependencyGraph.restore(store, this.toRecord());
  }

  toRecord(): Record<string, string[]> {
    const record: Record<string, string[]> = {};
    for (const [dependant, dependencies] of this.edges) {
      if (dependencies.size > 0) {
        record[dependant] = Array.from(dependencies);
      }
    }
    return record;
  }
}
