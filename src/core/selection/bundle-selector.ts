import type { PromptChoice, PromptPort } from '../ports/prompt.js';

/**
 * Selection collaborator: picks bundle ids out of lists offered by the
 * workflows. Returned ids are validated by the workflows, not here.
 */
export interface BundleSelector {
  selectInstallTarget(candidates: string[]): Promise<string>;
  selectDependencies(bundleId: string, installed: string[]): Promise<string[]>;
  selectRemovalTarget(installed: string[]): Promise<string>;
}

export interface PresetSelection {
  bundle?: string;
  dependsOn?: string[];
}

function toChoices(ids: string[]): PromptChoice[] {
  return ids.map(id => ({ title: id, value: id }));
}

/**
 * Selector that asks the user through a PromptPort
 */
export function createPromptSelector(prompt: PromptPort): BundleSelector {
  return {
    selectInstallTarget(candidates: string[]): Promise<string> {
      return prompt.select('Select a bundle to install:', toChoices(candidates));
    },

    selectDependencies(bundleId: string, installed: string[]): Promise<string[]> {
      if (installed.length === 0) {
        return Promise.resolve([]);
      }
      return prompt.multiselect(`Select dependencies for ${bundleId} (none is fine):`, toChoices(installed), { min: 0 });
    },

    selectRemovalTarget(installed: string[]): Promise<string> {
      return prompt.select('Select a bundle to remove:', toChoices(installed));
    },
  };
}

/**
 * Selector answering from command-line flags, deferring to `fallback`
 * for anything the flags leave open.
 */
export function createPresetSelector(preset: PresetSelection, fallback: BundleSelector): BundleSelector {
  return {
    selectInstallTarget(candidates: string[]): Promise<string> {
      return preset.bundle !== undefined
        ? Promise.resolve(preset.bundle)
        : fallback.selectInstallTarget(candidates);
    },

    selectDependencies(bundleId: string, installed: string[]): Promise<string[]> {
      return preset.dependsOn !== undefined
        ? Promise.resolve([...preset.dependsOn])
        : fallback.selectDependencies(bundleId, installed);
    },

    selectRemovalTarget(installed: string[]): Promise<string> {
      return preset.bundle !== undefined
        ? Promise.resolve(preset.bundle)
        : fallback.selectRemovalTarget(installed);
    },
  };
}
