import {
  describe,
  expect,
  it
} from 'vitest';

import {
  createPropagationStrategies,
  createRefinement,
  isRefinementName
} from '../../src/strategies/createDefaultStrategies.ts';

describe('createPropagationStrategies', () => {
  it('runs elimination before only-choice', () => {
    expect(createPropagationStrategies().map((strategy) => strategy.name)).toEqual(['elimination', 'only-choice']);
  });
});

describe('createRefinement', () => {
  it('defaults to naked twins', () => {
    expect(createRefinement().name).toBe('naked-twins');
  });

  it('creates the identity refinement', () => {
    expect(createRefinement('none').name).toBe('none');
  });
});

describe('isRefinementName', () => {
  it('accepts known names only', () => {
    expect(isRefinementName('naked-twins')).toBe(true);
    expect(isRefinementName('none')).toBe(true);
    expect(isRefinementName('hidden-pairs')).toBe(false);
  });
});
