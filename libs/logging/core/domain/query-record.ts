/** One database statement observed while a request was being handled. */
export interface QueryRecord {
  /** Execution time in seconds. */
  time: number;
  statement: string;
}

/**
 * Render the queries executed during a request as a numbered block, or
 * undefined when there were none.
 */
export function summarizeQueries(queries: readonly QueryRecord[]): string | undefined {
  if (queries.length === 0) {
    return undefined;
  }

  const lines = queries.map(
    (query, index) =>
      `\t\tQuery${index + 1}={time: ${query.time.toFixed(3)}(s), statement: [${query.statement}]}`,
  );

  return `${queries.length} QUERIES EXECUTED\n${lines.join('\n')}\n`;
}
