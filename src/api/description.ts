/**
 * Service description built from a JSON model document.
 *
 * @module api/description
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import type {
  OperationDescription,
  PaginationTemplate,
  ServiceDescription,
  ServiceMetadata,
  WaiterTemplate,
} from './types.js';
import { PreconditionError } from '../error/index.js';

const stringOrList = z.union([z.string(), z.array(z.string())]);

const metadataSchema = z.object({
  serviceFullName: z.string().min(1),
  endpointPrefix: z.string().min(1),
  apiVersion: z.string().min(1),
  protocol: z.string().min(1),
  jsonVersion: z.string().optional(),
  targetPrefix: z.string().optional(),
  signatureVersion: z.string().optional(),
  signingName: z.string().optional(),
});

const operationSchema = z.object({
  name: z.string().min(1),
  http: z
    .object({
      method: z.enum(['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD']),
      requestUri: z.string(),
    })
    .default({ method: 'POST', requestUri: '/' }),
  documentation: z.string().optional(),
});

const paginatorSchema = z.object({
  input_token: stringOrList.optional(),
  output_token: stringOrList.optional(),
  result_key: stringOrList.optional(),
  limit_key: z.string().optional(),
  more_results: z.string().optional(),
});

const acceptorSchema = z.object({
  state: z.enum(['success', 'failure', 'retry']),
  matcher: z.enum(['path', 'pathAll', 'pathAny', 'status', 'error']),
  argument: z.string().optional(),
  expected: z.unknown(),
});

const waiterSchema = z.object({
  operation: z.string().optional(),
  delay: z.number().nonnegative(),
  maxAttempts: z.number().int().positive(),
  acceptors: z.array(acceptorSchema),
});

const documentSchema = z.object({
  metadata: metadataSchema,
  operations: z.record(operationSchema),
  paginators: z.record(paginatorSchema).default({}),
  waiters: z.record(waiterSchema).default({}),
});

/**
 * Raw model document accepted by {@link ApiDescription.fromDocument}.
 */
export type ApiDocument = z.input<typeof documentSchema>;

type ParsedDocument = z.output<typeof documentSchema>;
type RawPaginator = z.output<typeof paginatorSchema>;

function toList(value: string | string[] | undefined): string[] {
  if (value === undefined) {
    return [];
  }
  return Array.isArray(value) ? value : [value];
}

function toPaginationTemplate(raw: RawPaginator): PaginationTemplate {
  return Object.freeze({
    inputToken: toList(raw.input_token),
    outputToken: toList(raw.output_token),
    resultKey: toList(raw.result_key),
    limitKey: raw.limit_key,
    moreResults: raw.more_results,
  });
}

/**
 * Immutable {@link ServiceDescription} backed by a validated model document.
 *
 * @example
 * ```typescript
 * const api = ApiDescription.fromFile('models/dynamodb-2012-08-10.json');
 * api.hasOperation('GetItem');              // true
 * api.paginationTemplate('Scan')?.resultKey; // ['Items']
 * ```
 */
export class ApiDescription implements ServiceDescription {
  public readonly metadata: ServiceMetadata;
  private readonly operations: ReadonlyMap<string, OperationDescription>;
  private readonly paginators: ReadonlyMap<string, PaginationTemplate>;
  private readonly waiters: ReadonlyMap<string, WaiterTemplate>;

  private constructor(document: ParsedDocument) {
    this.metadata = Object.freeze({ ...document.metadata });
    this.operations = new Map(Object.entries(document.operations));
    this.paginators = new Map(
      Object.entries(document.paginators).map(
        ([name, raw]): [string, PaginationTemplate] => [name, toPaginationTemplate(raw)]
      )
    );
    this.waiters = new Map(
      Object.entries(document.waiters).map(([name, raw]): [string, WaiterTemplate] => [
        name,
        Object.freeze({
          operation: raw.operation ?? name,
          delay: raw.delay,
          maxAttempts: raw.maxAttempts,
          acceptors: Object.freeze(raw.acceptors.map((acceptor) => Object.freeze({ ...acceptor }))),
        }),
      ])
    );
    Object.freeze(this);
  }

  /**
   * Validate and wrap a model document.
   *
   * @throws {PreconditionError} `INVALID_CONFIG` when the document is malformed
   */
  static fromDocument(document: unknown): ApiDescription {
    const result = documentSchema.safeParse(document);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at "${issue.path.join('.')}"` : '';
      throw new PreconditionError(
        `Invalid service description${where}: ${issue?.message ?? 'unknown error'}`,
        'INVALID_CONFIG'
      );
    }
    return new ApiDescription(result.data);
  }

  /**
   * Read a model document from disk.
   *
   * @throws {PreconditionError} `INVALID_CONFIG` when the file cannot be read or parsed
   */
  static fromFile(path: string | URL): ApiDescription {
    let document: unknown;
    try {
      document = JSON.parse(readFileSync(path, 'utf8'));
    } catch (error) {
      throw new PreconditionError(
        `Unable to load service description ${String(path)}: ${error instanceof Error ? error.message : String(error)}`,
        'INVALID_CONFIG'
      );
    }
    return ApiDescription.fromDocument(document);
  }

  hasOperation(name: string): boolean {
    return this.operations.has(name);
  }

  getOperation(name: string): OperationDescription | undefined {
    return this.operations.get(name);
  }

  operationNames(): string[] {
    return Array.from(this.operations.keys());
  }

  paginationTemplate(operation: string): PaginationTemplate | undefined {
    return this.paginators.get(operation);
  }

  waitTemplate(name: string): WaiterTemplate | undefined {
    return this.waiters.get(name);
  }

  waiterNames(): string[] {
    return Array.from(this.waiters.keys());
  }

  signingName(): string {
    return this.metadata.signingName ?? this.metadata.endpointPrefix;
  }
}
