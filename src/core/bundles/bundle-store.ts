import type { Bundle, BundleStatus } from '../../types/index.js';
import { DuplicateBundleError, UnknownBundleError } from '../../utils/errors.js';

/**
 * Known bundle ids and their installed/uninstalled status, in insertion order.
 */
export class BundleStore {
  private readonly bundles = new Map<string, BundleStatus>();

  get size(): number {
    return this.bundles.size;
  }

  has(id: string): boolean {
    return this.bundles.has(id);
  }

  get(id: string): Bundle | undefined {
    const status = this.bundles.get(id);
    return status ? { id, status } : undefined;
  }

  statusOf(id: string): BundleStatus | undefined {
    return this.bundles.get(id);
  }

  isInstalled(id: string): boolean {
    return this.bundles.get(id) === 'installed';
  }

  /**
   * Add `id` as uninstalled. Registering an uninstalled id again is a no-op;
   * registering an installed one is a duplicate.
   */
  register(id: string): Bundle {
    const existing = this.bundles.get(id);
    if (existing === 'installed') {
      throw new DuplicateBundleError(id);
    }
    if (existing === undefined) {
      this.bundles.set(id, 'uninstalled');
    }
    return { id, status: 'uninstalled' };
  }

  markInstalled(id: string): void {
    this.setStatus(id, 'installed');
  }

  markUninstalled(id: string): void {
    this.setStatus(id, 'uninstalled');
  }

  remove(id: string): void {
    if (!this.bundles.delete(id)) {
      throw new UnknownBundleError(id);
    }
  }

  listInstalled(): Iterable<string> {
    return this.idsWithStatus('installed');
  }

  listUninstalled(): Iterable<string> {
    return this.idsWithStatus('uninstalled');
  }

  /** Every bundle, in insertion order */
  list(): Bundle[] {
    return Array.from(this.bundles, ([id, status]) => ({ id, status }));
  }

  clone(): BundleStore {
    const copy = new BundleStore();
    for (const [id, status] of this.bundles) {
      copy.bundles.set(id, status);
    }
    return copy;
  }

  private setStatus(id: string, status: BundleStatus): void {
    if (!this.bundles.has(id)) {
      throw new UnknownBundleError(id);
    }
    this.bundles.set(id, status);
  }

  // Evaluated on every iteration so each for..of sees the current contents
  private idsWithStatus(status: BundleStatus): Iterable<string> {
    const bundles = this.bundles;
    return {
      *[Symbol.iterator]() {
        for (const [id, current] of bundles) {
          if (current === status) yield id;
        }
      }
    };
  }
}
