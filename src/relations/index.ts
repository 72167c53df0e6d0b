import { IDatasetRelation, IDatasetRelationInput, IOpaqueRelation, Relation } from './types';

export * from './types';

/**
 * Create an immutable dataset relation. Duplicate column names collapse
 * into one entry.
 *
 * @example
 * ```typescript
 * const sales = createDatasetRelation({
 *   engine: 'bigquery',
 *   datasetIdentifier: 'sales',
 *   columns: ['id', 'amount']
 * });
 * ```
 */
export function createDatasetRelation(input: IDatasetRelationInput): IDatasetRelation {
  return Object.freeze({
    kind: 'dataset',
    engine: input.engine,
    datasetIdentifier: input.datasetIdentifier,
    columns: new ReadonlyColumnSet(input.columns)
  });
}

/**
 * Create a relation that no factory understands
 */
export function createOpaqueRelation(description?: string): IOpaqueRelation {
  return Object.freeze({
    kind: 'opaque',
    ...(description !== undefined && { description })
  });
}

export function isDatasetRelation(relation: Relation): relation is IDatasetRelation {
  return relation.kind === 'dataset';
}

/**
 * Check whether a dataset relation exposes `column` (case-sensitive)
 */
export function hasColumn(relation: IDatasetRelation, column: string): boolean {
  return relation.columns.has(column);
}

/**
 * Set whose mutators throw, so a frozen relation cannot be changed through
 * its column set at run time either
 */
class ReadonlyColumnSet extends Set<string> {
  private sealed = false;

  constructor(columns: Iterable<string>) {
    super(columns);
    this.sealed = true;
  }

  public override add(value: string): this {
    if (this.sealed) {
      throw new TypeError(`Cannot add column ${value} to a relation`);
    }
    return super.add(value);
  }

  public override delete(value: string): boolean {
    throw new TypeError(`Cannot remove column ${value} from a relation`);
  }

  public override clear(): void {
    throw new TypeError('Cannot clear the columns of a relation');
  }
}
