import type { Strategy } from './Strategy.ts';

import { EliminationStrategy } from './EliminationStrategy.ts';
import { IdentityStrategy } from './IdentityStrategy.ts';
import { NakedTwinsStrategy } from './NakedTwinsStrategy.ts';
import { OnlyChoiceStrategy } from './OnlyChoiceStrategy.ts';

export type RefinementName = 'naked-twins' | 'none';

export const REFINEMENT_NAMES: readonly RefinementName[] = ['naked-twins', 'none'];

export const DEFAULT_REFINEMENT: RefinementName = 'naked-twins';

export function createPropagationStrategies(): Strategy[] {
  return [
    new EliminationStrategy(),
    new OnlyChoiceStrategy()
  ];
}

export function createRefinement(name: RefinementName = DEFAULT_REFINEMENT): Strategy {
  switch (name) {
    case 'naked-twins':
      return new NakedTwinsStrategy();
    case 'none':
      return new IdentityStrategy();
    default: {
      const exhaustive: never = name;
      throw new Error(`Unknown refinement: ${String(exhaustive)}`);
    }
  }
}

export function isRefinementName(value: string): value is RefinementName {
  return REFINEMENT_NAMES.some((refinement) => refinement === value);
}
