/**
 * Relation Types
 *
 * Relations are supplied by the planner, one per relational node. This
 * library only reads them.
 */

/**
 * A dataset exposed by a SQL engine, with the columns it can be queried on
 */
export interface IDatasetRelation {
  readonly kind: 'dataset';

  /**
   * Engine the dataset lives in; must match the factory dialect's engine
   */
  readonly engine: string;

  /**
   * Identifier of the dataset as the engine knows it
   */
  readonly datasetIdentifier: string;

  /**
   * Columns exposed by the dataset
   */
  readonly columns: ReadonlySet<string>;
}

/**
 * Any relation this library cannot reason about, such as the output of an
 * in-memory transform the planner did not push down
 */
export interface IOpaqueRelation {
  readonly kind: 'opaque';
  readonly description?: string;
}

/**
 * Every relation a factory may be handed
 */
export type Relation = IDatasetRelation | IOpaqueRelation;

/**
 * Input for createDatasetRelation
 */
export interface IDatasetRelationInput {
  engine: string;
  datasetIdentifier: string;
  columns: Iterable<string>;
}
