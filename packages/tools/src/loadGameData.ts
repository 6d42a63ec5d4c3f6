import { readFileSync } from 'fs';
import type { ManualGameData } from '@blocktales-manual/options';
import { validateGameDataSchema } from './validateSchema.js';
import { workspacePath } from './paths.js';

/**
 * Reads and validates data/game.json (or the given file)
 * Throws if the file does not match the game data schema
 */
export function loadGameData(path: string = workspacePath('data/game.json')): ManualGameData {
  const gameData: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  const result = validateGameDataSchema(gameData);
  if (!result.valid) {
    throw new Error(`Invalid game data in ${path}:\n  ${result.errors.join('\n  ')}`);
  }
  return result.value;
}
