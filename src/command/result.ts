/**
 * Parsed operation output.
 */

import { searchPath } from '../util/path.js';

/**
 * Response details kept beside the parsed output.
 */
export interface ResultMetadata {
  /** HTTP status code of the response */
  statusCode: number;
  /** Service request ID, when the response carried one */
  requestId?: string;
  /** Response headers (lowercase names) */
  headers: Record<string, string>;
}

/**
 * Output of one operation call.
 *
 * @example
 * ```typescript
 * const result = await client.execute('DescribeTable', { TableName: 'users' });
 * result.search('Table.TableStatus'); // 'ACTIVE'
 * result.metadata.requestId;
 * ```
 */
export class Result<T extends Record<string, unknown> = Record<string, unknown>> {
  constructor(
    public readonly data: T,
    public readonly metadata: ResultMetadata
  ) {}

  /**
   * Top-level output member.
   */
  get(key: string): unknown {
    return this.data[key];
  }

  has(key: string): boolean {
    return this.data[key] !== undefined;
  }

  /**
   * Evaluate a path expression against the output.
   */
  search(expression: string): unknown {
    return searchPath(this.data, expression);
  }

  toJSON(): T {
    return this.data;
  }
}
