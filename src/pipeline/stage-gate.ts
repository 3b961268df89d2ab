/**
 * Decides whether a stage must (re)produce its output for an entity.
 * Every stage shares the same rule and only supplies its own "already has output" predicate.
 */
export class StageGate<TEntity> {
  constructor(
    readonly stage: string,
    private readonly hasOutput: (entity: TEntity) => boolean,
  ) {}

  shouldRun(entity: TEntity, force: boolean): boolean {
    return force || !this.hasOutput(entity);
  }
}

export function hasText(value: string | null | undefined): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

export function hasEntries(value: Record<string, unknown> | null | undefined): boolean {
  return !!value && Object.keys(value).length > 0;
}
