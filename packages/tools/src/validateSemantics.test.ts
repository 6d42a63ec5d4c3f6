import { describe, it, expect } from 'vitest';
import { defineOptions, manualGameName, optionHooks } from '@blocktales-manual/options';
import { validatePlayerSettingsSemantics } from './validateSemantics.js';
import type { PlayerSettingsFile } from './validateSchema.js';
import { loadGameData } from './loadGameData.js';

describe('validatePlayerSettingsSemantics', () => {
  const gameData = loadGameData();
  const { optionSet } = defineOptions(gameData, optionHooks);
  const game = manualGameName(gameData);

  const makeSettings = (options: PlayerSettingsFile['options']): PlayerSettingsFile => ({
    name: 'Blocky',
    game: 'Manual_BlockTales_blocktales_manual',
    options,
  });

  it('accepts valid settings', () => {
    const issues = validatePlayerSettingsSemantics(
      makeSettings({
        goal: 'chapter_3',
        total_characters_to_win_with: 25,
        soul_type: 'dark',
        the_pit: { on: 1, off: 1 },
      }),
      optionSet,
      game
    );

    expect(issues).toEqual([]);
  });

  it('reports settings written for another game', () => {
    const issues = validatePlayerSettingsSemantics(
      { ...makeSettings({}), game: 'Other' },
      optionSet,
      game
    );

    expect(issues).toEqual([
      {
        type: 'error',
        message: 'Settings are for game "Other", expected "Manual_BlockTales_blocktales_manual"',
        path: 'game',
      },
    ]);
  });

  it('warns about unknown options', () => {
    const issues = validatePlayerSettingsSemantics(
      makeSettings({ death_link: true }),
      optionSet,
      game
    );

    expect(issues).toEqual([
      {
        type: 'warning',
        message: 'Unknown option "death_link" will be ignored',
        path: 'options.death_link',
      },
    ]);
  });

  it('warns about hidden options', () => {
    const issues = validatePlayerSettingsSemantics(
      makeSettings({ co_op: false }),
      optionSet,
      game
    );

    expect(issues).toEqual([
      {
        type: 'warning',
        message: 'Option "co_op" is hidden and is normally left at its default',
        path: 'options.co_op',
      },
    ]);
  });

  it('reports values outside the declared range', () => {
    const issues = validatePlayerSettingsSemantics(
      makeSettings({ total_characters_to_win_with: 60 }),
      optionSet,
      game
    );

    expect(issues).toEqual([
      {
        type: 'error',
        message:
          'Invalid value 60 for option "total_characters_to_win_with": must be between 10 and 50',
        path: 'options.total_characters_to_win_with',
      },
    ]);
  });

  it('reports a bad weighted entry once', () => {
    const issues = validatePlayerSettingsSemantics(
      makeSettings({ soul_type: { pure: 1, grey: 2 } }),
      optionSet,
      game
    );

    expect(issues).toEqual([
      {
        type: 'error',
        message: 'Invalid value "grey" for option "soul_type": expected one of: pure, dark',
        path: 'options.soul_type',
      },
    ]);
  });

  it('ignores bad entries that can never be picked', () => {
    const issues = validatePlayerSettingsSemantics(
      makeSettings({ soul_type: { pure: 1, grey: 0 } }),
      optionSet,
      game
    );

    expect(issues).toEqual([]);
  });
});
