import { readFileSync } from 'fs';
import Ajv, { type SchemaObject } from 'ajv';
import type { ManualGameData, PlayerSettings } from '@blocktales-manual/options';
import { workspacePath } from './paths.js';

/**
 * A player settings document (one player, one game)
 */
export type PlayerSettingsFile = {
  name: string;
  game: string;
  description?: string;
  options: PlayerSettings;
};

export type SchemaResult<T> =
  | { valid: true; value: T; errors: string[] }
  | { valid: false; errors: string[] };

function loadSchema(fileName: string): SchemaObject {
  return JSON.parse(readFileSync(workspacePath('schemas', fileName), 'utf-8'));
}

function validateAgainstSchema<T>(data: unknown, schemaFile: string): SchemaResult<T> {
  const ajv = new Ajv({ allErrors: true, strict: false });
  const validate = ajv.compile<T>(loadSchema(schemaFile));

  if (validate(data)) {
    return { valid: true, value: data, errors: [] };
  }

  const errors: string[] = [];
  for (const error of validate.errors ?? []) {
    const path = error.instancePath || error.schemaPath;
    errors.push(`${path}: ${error.message}`);
  }
  return { valid: false, errors };
}

/**
 * Validates a player settings document against its JSON schema
 */
export function validatePlayerSettingsSchema(settings: unknown): SchemaResult<PlayerSettingsFile> {
  return validateAgainstSchema<PlayerSettingsFile>(settings, 'player-settings.schema.json');
}

/**
 * Validates Manual game data against its JSON schema
 */
export function validateGameDataSchema(gameData: unknown): SchemaResult<ManualGameData> {
  return validateAgainstSchema<ManualGameData>(gameData, 'game-data.schema.json');
}
