/**
 * Read-only character profiles, used only as scorer context.
 */

import type { CharacterConfig } from "./config.js";

export interface CharacterProfile {
  characterId: string;
  name: string;
  summary?: string;
}

export interface CharacterDirectory {
  getProfile(characterId: string): Promise<CharacterProfile | undefined>;
  getRelationships(characterId: string): Promise<string[]>;
}

/**
 * Directory backed by the `characters` section of the config file.
 */
export class StaticCharacterDirectory implements CharacterDirectory {
  constructor(private characters: Record<string, CharacterConfig> = {}) {}

  async getProfile(characterId: string): Promise<CharacterProfile | undefined> {
    const character = this.characters[characterId];
    if (!character) return undefined;
    return { characterId, name: character.name, summary: character.summary };
  }

  async getRelationships(characterId: string): Promise<string[]> {
    return this.characters[characterId]?.relationships ?? [];
  }
}
