import { readFileSync } from 'fs';
import { resolve } from 'path';
import { defineOptions, manualGameName, optionHooks } from '@blocktales-manual/options';
import { validatePlayerSettingsSchema } from './validateSchema.js';
import { validatePlayerSettingsSemantics } from './validateSemantics.js';
import { loadGameData } from './loadGameData.js';
import { workspacePath } from './paths.js';

/**
 * Validates a player settings file (schema + semantics)
 * Usage: validateSettings [settings.json]
 */
function validateSettings(): void {
  const settingsPath = process.argv[2]
    ? resolve(process.argv[2])
    : workspacePath('settings/example.settings.json');

  try {
    console.log(`Loading settings from: ${settingsPath}`);
    const settings: unknown = JSON.parse(readFileSync(settingsPath, 'utf-8'));

    const gameData = loadGameData();
    const { optionSet } = defineOptions(gameData, optionHooks);

    const game = manualGameName(gameData);
    console.log(`\n🎮 Validating settings for: ${game}`);
    console.log(`   Options defined: ${Object.keys(optionSet.typeHints).length}\n`);

    // Schema validation
    console.log('🔍 Schema validation...');
    const schemaResult = validatePlayerSettingsSchema(settings);
    if (!schemaResult.valid) {
      console.error('❌ Schema validation failed:');
      for (const error of schemaResult.errors) {
        console.error(`   ${error}`);
      }
      console.error('❌ Validation failed with errors');
      process.exit(1);
    }
    console.log('✅ Schema validation passed\n');

    // Semantic validation
    console.log('🔍 Semantic validation...');
    const issues = validatePlayerSettingsSemantics(schemaResult.value, optionSet, game);

    const errors = issues.filter(i => i.type === 'error');
    const warnings = issues.filter(i => i.type === 'warning');

    if (errors.length > 0) {
      console.error(`❌ Found ${errors.length} semantic error(s):`);
      for (const error of errors) {
        const pathStr = error.path ? ` (${error.path})` : '';
        console.error(`   ${error.message}${pathStr}`);
      }
    }

    if (warnings.length > 0) {
      console.warn(`⚠️  Found ${warnings.length} semantic warning(s):`);
      for (const warning of warnings) {
        const pathStr = warning.path ? ` (${warning.path})` : '';
        console.warn(`   ${warning.message}${pathStr}`);
      }
    }

    if (issues.length === 0) {
      console.log('✅ Semantic validation passed\n');
    } else {
      console.log('');
    }

    // Summary
    if (errors.length > 0) {
      console.error('❌ Validation failed with errors');
      process.exit(1);
    } else if (warnings.length > 0) {
      console.warn('⚠️  Validation passed with warnings');
      process.exit(0);
    } else {
      console.log('✅ All validations passed!');
      process.exit(0);
    }
  } catch (error) {
    if (error instanceof Error) {
      console.error('❌ Validation error:', error.message);
      if (error.stack) {
        console.error(error.stack);
      }
    } else {
      console.error('❌ Validation error:', error);
    }
    process.exit(1);
  }
}

validateSettings();
