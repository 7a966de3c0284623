// Query text and bound values of a request, as the log formatter reads them

import { BatchType, BoundStatement, NamedValue, Request, SimpleStatement } from './types';

const BATCH_OPENERS: Record<BatchType, string> = {
  LOGGED: 'BEGIN BATCH',
  UNLOGGED: 'BEGIN UNLOGGED BATCH',
  COUNTER: 'BEGIN COUNTER BATCH',
};

function statementQuery(statement: SimpleStatement | BoundStatement): string {
  return statement.kind === 'simple' ? statement.query : statement.preparedQuery;
}

/**
 * Query text of a request. For a batch, building stops as soon as the text is
 * longer than `maxLength`, so callers truncating to that length get the same prefix.
 */
export function queryText(request: Request, maxLength: number = Infinity): string {
  if (request.kind !== 'batch') {
    return statementQuery(request);
  }

  let text = `${BATCH_OPENERS[request.batchType]} `;
  for (const statement of request.statements) {
    if (text.length > maxLength) {
      return text;
    }
    text += `${statementQuery(statement)}; `;
  }
  return `${text}APPLY BATCH`;
}

/**
 * Ordered values of a request. Positional values are named v0, v1, ...
 * and batch statements continue the numbering across the whole batch.
 */
export function boundValues(request: Request): NamedValue[] {
  const values: NamedValue[] = [];
  const statements = request.kind === 'batch' ? request.statements : [request];

  for (const statement of statements) {
    if (statement.kind === 'simple' && statement.namedValues) {
      for (const [name, value] of Object.entries(statement.namedValues)) {
        values.push({ name, value });
      }
      continue;
    }

    const positional = statement.kind === 'simple' ? statement.positionalValues ?? [] : statement.values;
    const names = statement.kind === 'bound' ? statement.variableNames : undefined;
    positional.forEach((value, index) => {
      values.push({ name: names?.[index] ?? `v${values.length}`, value });
    });
  }

  return values;
}

export function statementCount(request: Request): number {
  return request.kind === 'batch' ? request.statements.length : 1;
}
