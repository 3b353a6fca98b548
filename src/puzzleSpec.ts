import type { RefinementName } from './strategies/createDefaultStrategies.ts';

import yaml from 'js-yaml';

import {
  DEFAULT_REFINEMENT,
  isRefinementName,
  REFINEMENT_NAMES
} from './strategies/createDefaultStrategies.ts';
import { isRecord } from './typeGuards.ts';

export interface PuzzleSpec {
  readonly grid: string;
  readonly refinement: RefinementName;
  readonly title: string;
}

export function parsePuzzleSpec(content: string, name: string): PuzzleSpec {
  const spec: unknown = yaml.load(content);
  if (!isRecord(spec)) {
    throw new Error('Puzzle file must be a mapping');
  }

  const grid = spec['grid'];
  if (typeof grid !== 'string') {
    throw new Error('\'grid\' must be a string (quote it or use a block scalar)');
  }

  const title = spec['title'] ?? name;
  if (typeof title !== 'string') {
    throw new Error('\'title\' must be a string');
  }

  const refinement = spec['refinement'] ?? DEFAULT_REFINEMENT;
  if (typeof refinement !== 'string' || !isRefinementName(refinement)) {
    throw new Error(`'refinement' must be one of: ${REFINEMENT_NAMES.join(', ')}`);
  }

  const trimmedTitle = title.trim();
  return { grid, refinement, title: trimmedTitle === '' ? name : trimmedTitle };
}
