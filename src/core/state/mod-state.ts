import { BundleStore } from '../bundles/bundle-store.js';
import { DependencyGraph } from '../graph/dependency-graph.js';

/**
 * The whole tracked state of one updates directory: bundle statuses plus
 * dependency edges. Loaded once per command and saved once at the end.
 */
export interface ModState {
  readonly store: BundleStore;
  readonly graph: DependencyGraph;
}

export function createEmptyState(): ModState {
  const store = new BundleStore();
  return { store, graph: new DependencyGraph(store) };
}

/**
 * Deep copy; workflows mutate the copy and hand it back only on success.
 */
export function cloneState(state: ModState): ModState {
  const store = state.store.clone();
  return { store, graph: state.graph.clone(store) };
}

/**
 * Installed bundles that depend on `id`.
 */
export function installedDependantsOf(state: ModState, id: string): string[] {
  return state.graph.dependantsOf(id).filter(dependant => state.store.isInstalled(dependant));
}

/**
 * Persistence collaborator: the state file, or an in-memory stand-in in tests.
 */
export interface StateRepository {
  load(): Promise<ModState>;
  save(state: ModState): Promise<void>;
}
