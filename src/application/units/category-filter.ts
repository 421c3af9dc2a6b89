import type { EventRecord } from '../../domain/event-record.js';
import { getString } from '../../domain/value.js';
import { RecordFormatError } from '../../domain/errors.js';
import type { TransformUnit, UnitOutcome } from '../../domain/units/index.js';
import { CONTINUE, DROP, fail } from '../../domain/units/index.js';

export interface CategoryFilterConfig {
  /** Top-level field holding the category (default: `category`). */
  field: string;
  /** When non-empty, only these categories pass. */
  include: readonly string[];
  /** These categories are dropped. */
  exclude: readonly string[];
}

/**
 * Keep/drop on one string field.
 *
 * 1. Field missing or not a string → continue.
 * 2. Include list set and value not in it → drop (exclude not consulted).
 * 3. Exclude list set and value in it → drop.
 * 4. Otherwise continue.
 */
export class CategoryFilter implements TransformUnit {
  readonly name = 'category_filter';
  private readonly field: string;
  private readonly include: ReadonlySet<string>;
  private readonly exclude: ReadonlySet<string>;

  constructor(config: CategoryFilterConfig) {
    this.field = config.field;
    this.include = new Set(config.include);
    this.exclude = new Set(config.exclude);
  }

  async apply(record: EventRecord): Promise<UnitOutcome> {
    const body = record.objectBody();
    if (!body) {
      return fail(new RecordFormatError(this.name, 'category_filter expects object'));
    }
    return this.decide(getString(body, this.field));
  }

  private decide(category: ReturnType<typeof getString>): UnitOutcome {
    if (!category.ok) return CONTINUE;

    if (this.include.size > 0 && !this.include.has(category.value)) return DROP;
    if (this.exclude.size > 0 && this.exclude.has(category.value)) return DROP;
    return CONTINUE;
  }
}
