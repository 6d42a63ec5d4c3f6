import type { ManualGameData } from '../host/manualOptions';
import { HIDDEN_OPTION_KEYS } from '../options/visibility';

/**
 * Creates minimal Manual game data declaring every category option the hooks hide
 */
export function makeTestGameData(overrides?: Partial<ManualGameData>): ManualGameData {
  return {
    game: 'BlockTales',
    creator: 'test_creator',
    goals: ['Prologue', 'Chapter 1', 'Chapter 2'],
    categoryOptions: [...HIDDEN_OPTION_KEYS],
    ...overrides,
  };
}
