import fiveState from './presets/five-state.json';
import tenState from './presets/ten-state.json';
import { TransitionTable } from './transition-table.js';

export const PRESET_NAMES = ['five-state', 'ten-state'] as const;
export type PresetName = typeof PRESET_NAMES[number];
export const DEFAULT_PRESET: PresetName = 'ten-state';

const definitions: Record<PresetName, unknown> = {
  'five-state': fiveState,
  'ten-state': tenState,
};

const cache = new Map<PresetName, TransitionTable>();

export function isPresetName(name: string): name is PresetName {
  return PRESET_NAMES.some((preset) => preset === name);
}

export function getPreset(name: PresetName = DEFAULT_PRESET): TransitionTable {
  let table = cache.get(name);
  if (!table) {
    const result = TransitionTable.fromJSON(definitions[name], name);
    if (result.isErr()) {
      throw result.error;
    }
    table = result.value;
    cache.set(name, table);
  }
  return table;
}
