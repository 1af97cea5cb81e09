/**
 * POS API Client
 * ==============
 *
 * fetch-based client for the external POS inventory API. Every call is
 * bounded by an AbortController timeout and returns a typed result; only
 * programmer errors escape as exceptions.
 */

import { z } from 'zod';
import { PosApiError } from '../../../errors';
import type {
  AdminHoldRequest,
  AdminHoldResult,
  CreateListingResult,
  DeleteListingResult,
  PosApi,
  PosListingPayload,
} from '../../../types/pos';
import { log } from '../../../utils/log';
import { POS_API_CONFIG } from '../config/constants';
import { httpError, transportError } from '../utils/error-classifier';

export interface PosApiClientOptions {
  baseUrl: string;
  token: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

const createListingResponseSchema = z.object({
  id: z.union([z.string().min(1), z.number()]),
});

type RequestOutcome =
  | { ok: true; status: number; body: string }
  | { ok: false; error: PosApiError };

export class HttpPosApiClient implements PosApi {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: PosApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? POS_API_CONFIG.TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  // ================================================
  // LISTINGS
  // ================================================

  async createListing(payload: PosListingPayload): Promise<CreateListingResult> {
    const outcome = await this.request('POST', `${POS_API_CONFIG.INVENTORY_PATH}/`, payload);
    if (!outcome.ok) return outcome;

    if (outcome.status !== 200 && outcome.status !== 201) {
      return { ok: false, error: httpError(outcome.status, outcome.body) };
    }

    const parsed = createListingResponseSchema.safeParse(parseJson(outcome.body));
    if (!parsed.success) {
      return {
        ok: false,
        error: new PosApiError('server', 'POS API create response did not include a listing id', outcome.status),
      };
    }

    const listingId = String(parsed.data.id);
    log.info(`✅ POS listing created: ${listingId} for ${payload.externalId}`);
    return { ok: true, listingId };
  }

  async deleteListing(listingId: string): Promise<DeleteListingResult> {
    const outcome = await this.request('DELETE', `${POS_API_CONFIG.INVENTORY_PATH}/${encodeURIComponent(listingId)}`);
    if (!outcome.ok) return { outcome: 'failed', error: outcome.error };

    if (outcome.status === 200 || outcome.status === 204) {
      log.info(`✅ POS listing deleted: ${listingId}`);
      return { outcome: 'deleted' };
    }
    if (outcome.status === 404) {
      log.info(`ℹ️ POS listing ${listingId} already removed upstream`);
      return { outcome: 'not_found' };
    }
    return { outcome: 'failed', error: httpError(outcome.status, outcome.body) };
  }

  async placeAdminHold(listingId: string, request: AdminHoldRequest): Promise<AdminHoldResult> {
    const outcome = await this.request(
      'PUT',
      `${POS_API_CONFIG.INVENTORY_PATH}/${encodeURIComponent(listingId)}/admin-hold`,
      request
    );
    if (!outcome.ok) return outcome;
    if (outcome.status >= 200 && outcome.status < 300) {
      log.info(`✅ Admin hold placed on POS listing ${listingId}`);
      return { ok: true };
    }
    return { ok: false, error: httpError(outcome.status, outcome.body) };
  }

  // ================================================
  // TRANSPORT
  // ================================================

  private async request(method: string, path: string, body?: unknown): Promise<RequestOutcome> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers: {
          'Authorization': `Bearer ${this.token}`,
          'Content-Type': 'application/json',
          'Accept': 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
      const text = await response.text();
      return { ok: true, status: response.status, body: text };
    } catch (error) {
      const failure = transportError(error, this.timeoutMs);
      log.warn(`⚠️ POS ${method} ${path} failed: ${failure.message}`);
      return { ok: false, error: failure };
    } finally {
      clearTimeout(timer);
    }
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
