import pico from 'picocolors';
import type { ModState } from '../state/mod-state.js';
import type { BundleStatus } from '../../types/index.js';
import { STATUS_TAGS } from '../../constants/index.js';

export interface GraphRenderOptions {
  /** Wrap status tags in ANSI colors */
  color?: boolean;
}

type TagKind = BundleStatus | 'missing';

/**
 * Get tree connector characters based on position
 */
export function getTreeConnector(isLast: boolean): string {
  return isLast ? '└── ' : '├── ';
}

/**
 * Calculate child prefix based on parent prefix and position
 */
export function getChildPrefix(parentPrefix: string, isLast: boolean): string {
  return parentPrefix + (isLast ? '    ' : '│   ');
}

/**
 * Render every tracked bundle followed by its dependency tree.
 *
 * Pure: reads the state and returns lines. A node that is already on the
 * current path is printed once more, marked circular, and not expanded,
 * so a corrupted (cyclic) state still renders in finite output.
 */
export function renderDependencyGraph(state: ModState, options: GraphRenderOptions = {}): string[] {
  const { store, graph } = state;
  const colors = pico.createColors(options.color ?? false);

  const tag = (id: string): string => {
    const kind: TagKind = store.statusOf(id) ?? 'missing';
    const text = STATUS_TAGS[kind];
    switch (kind) {
      case 'installed':
        return colors.green(text);
      case 'uninstalled':
        return colors.yellow(text);
      default:
        return colors.red(text);
    }
  };

  const bundles = store.list();
  if (bundles.length === 0) {
    return ['No bundles tracked.'];
  }

  const lines: string[] = [];

  const renderChildren = (id: string, prefix: string, path: string[]): void => {
    const dependencies = graph.dependenciesOf(id);
    for (let i = 0; i < dependencies.length; i++) {
      const dependency = dependencies[i];
      const isLast = i === dependencies.length - 1;
      const connector = getTreeConnector(isLast);

      if (path.includes(dependency)) {
        lines.push(`${prefix}${connector}${dependency} ${tag(dependency)} ${colors.dim('(circular dependency)')}`);
        continue;
      }

      lines.push(`${prefix}${connector}${dependency} ${tag(dependency)}`);
      renderChildren(dependency, getChildPrefix(prefix, isLast), [...path, dependency]);
    }
  };

  for (const bundle of bundles) {
    if (lines.length > 0) {
      lines.push('');
    }
    lines.push(`${bundle.id} ${tag(bundle.id)}`);
    if (graph.dependenciesOf(bundle.id).length === 0) {
      lines.push(`${getTreeConnector(true)}${colors.dim('(no dependencies)')}`);
      continue;
    }
    renderChildren(bundle.id, '', [bundle.id]);
  }

  return lines;
}
