import type { ExtractionStrategy } from '../interfaces/strategy.js';
import { ExtractionStrategyName } from '../models/types.js';
import { codeBlockStrategy } from './code-block.js';
import { headingLinkStrategy } from './heading-link.js';
import { looseTextStrategy } from './loose-text.js';
import { tableStrategy } from './table.js';

/**
 * Error thrown when a strategy list cannot be built
 */
export class StrategyCreationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StrategyCreationError';
  }
}

const STRATEGIES: Record<ExtractionStrategyName, ExtractionStrategy> = {
  [ExtractionStrategyName.CODE_BLOCK]: codeBlockStrategy,
  [ExtractionStrategyName.TABLE]: tableStrategy,
  [ExtractionStrategyName.HEADING_LINK]: headingLinkStrategy,
  [ExtractionStrategyName.LOOSE_TEXT]: looseTextStrategy,
};

/**
 * Priority order: structural signals first, free text last
 */
export const STRATEGY_PRIORITY: readonly ExtractionStrategyName[] = [
  ExtractionStrategyName.CODE_BLOCK,
  ExtractionStrategyName.TABLE,
  ExtractionStrategyName.HEADING_LINK,
  ExtractionStrategyName.LOOSE_TEXT,
];

/**
 * Build the strategies to run, always in priority order regardless of the order requested
 *
 * @param enabled - strategies to include; all of them when omitted
 * @throws StrategyCreationError when `enabled` names no strategy
 */
export function createStrategies(enabled?: readonly ExtractionStrategyName[]): ExtractionStrategy[] {
  if (enabled && enabled.length === 0) {
    throw new StrategyCreationError(
      `At least one extraction strategy is required. Available strategies: ${STRATEGY_PRIORITY.join(', ')}`
    );
  }

  return STRATEGY_PRIORITY
    .filter((name) => !enabled || enabled.includes(name))
    .map((name) => STRATEGIES[name]);
}
