/**
 * HTTP Transport
 *
 * POSTs the graph to a long-lived layout service.
 *   POST {url}/layout -> positioned graph
 *   POST {url}/scene  -> scene tree
 */

import type { TransportKind } from '../../shared/config.js';
import { ELK_ENGINE_URL } from '../../shared/config.js';
import {
  EngineFailureError,
  EngineUnavailableError,
  LayoutRejectedError,
  errorMessage,
} from '../../shared/errors.js';
import { LayoutLogger } from '../../shared/logger.js';
import type { Deadline } from './deadline.js';
import { describeErrorBody, parseEngineResponse } from './response.js';
import { TransportBase } from './transport-base.js';
import type { TransportBaseOptions } from './transport-base.js';

export interface NetworkTransportOptions extends TransportBaseOptions {
  url?: string;
}

/** Statuses meaning the service understood the request and refused the graph */
const REJECTED_STATUSES = new Set([400, 422]);

export class HttpTransport extends TransportBase {
  readonly kind: TransportKind = 'http';
  private readonly endpoint: URL;

  constructor(options: NetworkTransportOptions = {}) {
    super(options);
    const base = options.url ?? ELK_ENGINE_URL;
    this.endpoint = new URL(this.outputMode, base.endsWith('/') ? base : `${base}/`);
  }

  protected async exchange(payload: string, deadline: Deadline): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: payload,
        signal: deadline.signal,
      });
    } catch (error) {
      if (deadline.aborted) throw deadline.toError(this.kind);
      throw new EngineUnavailableError(
        `Cannot reach layout engine at ${this.endpoint.href}: ${errorMessage(error)}`,
        this.kind,
        { cause: error }
      );
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      if (deadline.aborted) throw deadline.toError(this.kind);
      throw new EngineFailureError(
        `Connection dropped while reading the engine response: ${errorMessage(error)}`,
        this.kind,
        { status: response.status }
      );
    }

    if (response.ok) {
      return parseEngineResponse(text, this.kind);
    }

    const reason = describeErrorBody(text, `HTTP ${response.status}`);
    if (REJECTED_STATUSES.has(response.status)) {
      throw new LayoutRejectedError(reason);
    }
    LayoutLogger.debug(`Engine answered HTTP ${response.status} [${this.kind}]`);
    throw new EngineFailureError(`Layout engine answered HTTP ${response.status}: ${reason}`, this.kind, {
      status: response.status,
    });
  }

  protected async release(): Promise<void> {
    // fetch keeps no connection state of its own
  }
}
