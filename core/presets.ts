import { z } from 'zod';
import presetData from '../config/presets.json';

const presetsSchema = z.record(z.string(), z.array(z.string().min(1)));

export type PresetMap = z.infer<typeof presetsSchema>;

/**
 * Maps a named preset (a disease focus or drug class) to its hashtags.
 */
export interface PresetResolver {
  resolve(name: string): readonly string[] | undefined;
  list(): string[];
}

export class StaticPresetResolver implements PresetResolver {
  private readonly presets: ReadonlyMap<string, readonly string[]>;

  constructor(presets: PresetMap) {
    this.presets = new Map(
      Object.entries(presets).map(([name, terms]) => [name.toLowerCase(), Object.freeze([...terms])])
    );
  }

  resolve(name: string): readonly string[] | undefined {
    return this.presets.get(name.trim().toLowerCase());
  }

  list(): string[] {
    return [...this.presets.keys()].sort();
  }
}

export const defaultPresetResolver: PresetResolver = new StaticPresetResolver(presetsSchema.parse(presetData));

export function listPresets(): string[] {
  return defaultPresetResolver.list();
}

export function resolvePreset(name: string): readonly string[] | undefined {
  return defaultPresetResolver.resolve(name);
}
