import { buildSettingsTemplate, defineOptions, optionHooks } from '@blocktales-manual/options';
import { loadGameData } from './loadGameData.js';

/**
 * Prints a player settings template with every visible option at its default
 * Usage: exportTemplate [playerName]
 */
function exportTemplate(): void {
  try {
    const gameData = loadGameData();
    const { optionSet } = defineOptions(gameData, optionHooks);
    const template = buildSettingsTemplate(optionSet, gameData, process.argv[2]);

    console.log(JSON.stringify(template, null, 2));
  } catch (error) {
    if (error instanceof Error) {
      console.error('❌ Template export failed:', error.message);
      if (error.stack) {
        console.error(error.stack);
      }
    } else {
      console.error('❌ Template export failed:', error);
    }
    process.exit(1);
  }
}

exportTemplate();
