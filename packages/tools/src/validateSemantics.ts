import {
  OptionValueError,
  RNG,
  hasKey,
  resolveOptionValue,
  type OptionDefinition,
  type OptionSet,
  type RawSetting,
} from '@blocktales-manual/options';
import type { PlayerSettingsFile } from './validateSchema.js';

export type ValidationIssue = {
  type: 'error' | 'warning';
  message: string;
  path?: string;
};

/**
 * Performs semantic validation of player settings against the option set
 */
export function validatePlayerSettingsSemantics(
  settings: PlayerSettingsFile,
  optionSet: OptionSet,
  game: string
): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  if (settings.game !== game) {
    issues.push({
      type: 'error',
      message: `Settings are for game "${settings.game}", expected "${game}"`,
      path: 'game',
    });
  }

  for (const [key, raw] of Object.entries(settings.options)) {
    const path = `options.${key}`;

    if (!hasKey(optionSet.typeHints, key)) {
      issues.push({
        type: 'warning',
        message: `Unknown option "${key}" will be ignored`,
        path,
      });
      continue;
    }

    const definition = optionSet.typeHints[key];
    if (definition.visibility === 'hidden') {
      issues.push({
        type: 'warning',
        message: `Option "${key}" is hidden and is normally left at its default`,
        path,
      });
    }

    validateValue(definition, raw, path, issues);
  }

  return issues;
}

/**
 * Resolves the value, and every weighted entry that can be picked, reporting rejections once each
 */
function validateValue(
  definition: OptionDefinition,
  raw: RawSetting,
  path: string,
  issues: ValidationIssue[]
): void {
  const candidates: RawSetting[] = [raw];
  if (typeof raw === 'object') {
    for (const [value, weight] of Object.entries(raw)) {
      if (weight > 0) {
        candidates.push(value);
      }
    }
  }

  const messages = new Set<string>();
  for (const candidate of candidates) {
    try {
      resolveOptionValue(definition, candidate, new RNG(0));
    } catch (error) {
      if (!(error instanceof OptionValueError)) {
        throw error;
      }
      messages.add(error.message);
    }
  }

  for (const message of messages) {
    issues.push({ type: 'error', message, path });
  }
}
