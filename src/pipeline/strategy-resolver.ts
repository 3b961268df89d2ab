import { Logger } from '@nestjs/common';
import { RecoverableError } from '../common/errors';

export const NOT_FOUND = 'NOT_FOUND';

export interface Strategy<TContext, TValue> {
  readonly name: string;
  /** Pure precondition. A false trigger skips the strategy without any external call. */
  trigger(context: TContext): boolean;
  execute(context: TContext): Promise<TValue | null>;
}

export type StrategyResult<TValue> =
  | { kind: 'candidate'; value: TValue }
  | { kind: 'empty' }
  | { kind: 'recoverable-error'; error: RecoverableError };

export type StrategyOutcome<TValue> =
  | { value: TValue; strategy: string }
  | { value: null; strategy: typeof NOT_FOUND };

/**
 * Runs one strategy and folds its result into a StrategyResult.
 * Only RecoverableError is converted; anything else propagates.
 */
export async function settle<TValue>(run: () => Promise<TValue | null>): Promise<StrategyResult<TValue>> {
  try {
    const value = await run();
    return value === null ? { kind: 'empty' } : { kind: 'candidate', value };
  } catch (error) {
    if (error instanceof RecoverableError) {
      return { kind: 'recoverable-error', error };
    }
    throw error;
  }
}

/**
 * Tries an ordered list of strategies and returns the first candidate that passes validation.
 */
export class StrategyResolver<TContext, TValue> {
  private readonly logger: Logger;

  constructor(
    readonly label: string,
    private readonly strategies: readonly Strategy<TContext, TValue>[],
    private readonly validate: (candidate: TValue) => boolean,
  ) {
    this.logger = new Logger(`${StrategyResolver.name}:${label}`);
  }

  get strategyNames(): string[] {
    return this.strategies.map((s) => s.name);
  }

  async resolve(context: TContext, subject: string): Promise<StrategyOutcome<TValue>> {
    for (const strategy of this.strategies) {
      if (!strategy.trigger(context)) {
        this.logger.debug(`[${subject}] Skipping strategy ${strategy.name}: trigger not satisfied`);
        continue;
      }

      const result = await settle(() => strategy.execute(context));
      switch (result.kind) {
        case 'recoverable-error':
          this.logger.warn(`[${subject}] Strategy ${strategy.name} failed: ${result.error.message}`);
          break;
        case 'empty':
          this.logger.log(`[${subject}] Strategy ${strategy.name} returned no candidate`);
          break;
        case 'candidate':
          if (this.validate(result.value)) {
            this.logger.log(`[${subject}] Strategy ${strategy.name} succeeded`);
            return { value: result.value, strategy: strategy.name };
          }
          this.logger.warn(`[${subject}] Strategy ${strategy.name} candidate rejected: ${String(result.value)}`);
          break;
      }
    }

    this.logger.log(`[${subject}] All strategies exhausted (${this.strategyNames.join(', ')})`);
    return { value: null, strategy: NOT_FOUND };
  }
}
