// LedgerClient -- HTTP wrapper for the ledger API.
//
// Uses native fetch (Node 20+) with AbortController timeout and Zod
// validation of every response. Non-2xx responses become LedgerRequestError
// carrying the server's error code and literal failure reason.

import type { z } from 'zod';

import type {
  ApprovalRequest,
  ApprovalResponse,
  AssetResponse,
  BalanceBatchRequest,
  BalanceBatchResponse,
  BalanceResponse,
  BurnBatchRequest,
  BurnRequest,
  CreateAssetRequest,
  CreateAssetResponse,
  EventsQuery,
  EventsResponse,
  MintBatchRequest,
  MintRequest,
  OperationResponse,
  TransferBatchRequest,
  TransferRequest,
} from './types.js';
import {
  ApprovalResponseSchema,
  AssetResponseSchema,
  BalanceBatchResponseSchema,
  BalanceResponseSchema,
  CreateAssetResponseSchema,
  ErrorResponseSchema,
  EventsResponseSchema,
  OperationResponseSchema,
} from './types.js';

export interface LedgerClientOptions {
  /** Base URL of the ledger service (e.g. "http://localhost:3000") */
  baseUrl: string;
  /** Address sent as x-caller on every request */
  caller?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Additional headers to send with every request */
  headers?: Record<string, string>;
}

/** Non-2xx answer from the ledger service. */
export class LedgerRequestError extends Error {
  readonly statusCode: number;
  /** Server error code, e.g. LEDGER_INSUFFICIENT_BALANCE; HTTP_ERROR when the body had none */
  readonly code: string;

  constructor(statusCode: number, code: string, message: string) {
    super(message);
    this.name = 'LedgerRequestError';
    this.statusCode = statusCode;
    this.code = code;
  }
}

type Method = 'GET' | 'POST' | 'PUT';

export class LedgerClient {
  private readonly baseUrl: string;
  private readonly timeout: number;
  private readonly headers: Record<string, string>;

  constructor(options: LedgerClientOptions) {
    // Strip trailing slash for consistent URL building
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeout = options.timeout ?? 30_000;
    this.headers = {
      ...(options.caller !== undefined && { 'x-caller': options.caller }),
      ...options.headers,
    };
  }

  /** Client bound to a different caller, sharing every other option. */
  as(caller: string): LedgerClient {
    return new LedgerClient({
      baseUrl: this.baseUrl,
      timeout: this.timeout,
      headers: { ...this.headers, 'x-caller': caller },
    });
  }

  // ---- Assets ----

  async createAsset(request: CreateAssetRequest): Promise<CreateAssetResponse> {
    return this.send('POST', '/assets', CreateAssetResponseSchema, request);
  }

  async getAsset(id: string): Promise<AssetResponse> {
    return this.send('GET', `/assets/${encodeURIComponent(id)}`, AssetResponseSchema);
  }

  // ---- Balances ----

  async balanceOf(asset: string, holder: string): Promise<BalanceResponse> {
    return this.send(
      'GET',
      `/balances/${encodeURIComponent(asset)}/${encodeURIComponent(holder)}`,
      BalanceResponseSchema
    );
  }

  async balanceOfBatch(request: BalanceBatchRequest): Promise<BalanceBatchResponse> {
    return this.send('POST', '/balances/batch', BalanceBatchResponseSchema, request);
  }

  // ---- Approvals ----

  async setApprovalForAll(request: ApprovalRequest): Promise<OperationResponse> {
    return this.send('PUT', '/approvals', OperationResponseSchema, request);
  }

  async isApprovedForAll(owner: string, operator: string): Promise<ApprovalResponse> {
    return this.send(
      'GET',
      `/approvals/${encodeURIComponent(owner)}/${encodeURIComponent(operator)}`,
      ApprovalResponseSchema
    );
  }

  // ---- Transfers ----

  async transfer(request: TransferRequest): Promise<OperationResponse> {
    return this.send('POST', '/transfers', OperationResponseSchema, request);
  }

  async transferBatch(request: TransferBatchRequest): Promise<OperationResponse> {
    return this.send('POST', '/transfers/batch', OperationResponseSchema, request);
  }

  // ---- Supply ----

  async mint(request: MintRequest): Promise<OperationResponse> {
    return this.send('POST', '/mint', OperationResponseSchema, request);
  }

  async mintBatch(request: MintBatchRequest): Promise<OperationResponse> {
    return this.send('POST', '/mint/batch', OperationResponseSchema, request);
  }

  async burn(request: BurnRequest): Promise<OperationResponse> {
    return this.send('POST', '/burn', OperationResponseSchema, request);
  }

  async burnBatch(request: BurnBatchRequest): Promise<OperationResponse> {
    return this.send('POST', '/burn/batch', OperationResponseSchema, request);
  }

  // ---- Events ----

  async events(query: EventsQuery = {}): Promise<EventsResponse> {
    const params = new URLSearchParams();
    if (query.after !== undefined) params.set('after', String(query.after));
    if (query.limit !== undefined) params.set('limit', String(query.limit));
    const search = params.toString();
    return this.send('GET', search ? `/events?${search}` : '/events', EventsResponseSchema);
  }

  // ---- Private helpers ----

  private async send<T>(
    method: Method,
    path: string,
    schema: z.ZodType<T>,
    body?: unknown
  ): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(url, {
        method,
        headers: {
          ...(body !== undefined && { 'Content-Type': 'application/json' }),
          ...this.headers,
        },
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: controller.signal,
      });

      const json: unknown = await response.json().catch(() => undefined);

      if (!response.ok) {
        throw toRequestError(response, json);
      }

      const parsed = schema.safeParse(json);
      if (!parsed.success) {
        throw new Error(`Invalid ledger response: ${parsed.error.message}`);
      }

      return parsed.data;
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`Ledger request to ${path} timed out after ${this.timeout}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

function toRequestError(response: Response, body: unknown): LedgerRequestError {
  const parsed = ErrorResponseSchema.safeParse(body);
  if (parsed.success) {
    const { code, message } = parsed.data.error;
    return new LedgerRequestError(response.status, code, message);
  }
  return new LedgerRequestError(
    response.status,
    'HTTP_ERROR',
    `Ledger returned ${response.status} ${response.statusText}`
  );
}
