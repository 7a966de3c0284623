// Request model seen by the tracker: the statements a session executes

export type BatchType = 'LOGGED' | 'UNLOGGED' | 'COUNTER';

export interface SimpleStatement {
  kind: 'simple';
  query: string;
  positionalValues?: readonly unknown[];
  namedValues?: Readonly<Record<string, unknown>>;
}

export interface BoundStatement {
  kind: 'bound';
  preparedQuery: string;
  values: readonly unknown[];
  /** Variable names of the prepared statement, in bind order */
  variableNames?: readonly string[];
}

export interface BatchStatement {
  kind: 'batch';
  batchType: BatchType;
  statements: readonly (SimpleStatement | BoundStatement)[];
}

export type Request = SimpleStatement | BoundStatement | BatchStatement;

export interface Node {
  /** Renderable address of the node, e.g. "10.0.0.1:9042" */
  readonly endPoint: string;
}

export interface NamedValue {
  name: string;
  value: unknown;
}
