import { CALCULATOR_DEFAULTS, VERSION, type HttpRetryConfig } from '../config/constants.js';
import { TransportError } from '../errors/index.js';
import type { RequestRecord } from '../query/types.js';
import type { Logger } from '../utils/logger.js';
import { ok, err, type Result } from '../utils/result.js';
import { HttpClient } from './http.js';

/**
 * Looks up the raw calculator answer for one request.
 * Implementations return transport failures rather than throwing them.
 */
export interface DeclinationClient {
  fetch(request: RequestRecord): Promise<Result<string, TransportError>>;
}

export interface NoaaClientConfig {
  endpoint?: string;
  /** Sent as the `key` parameter when set */
  apiKey?: string;
  /** Sent as the `model` parameter when set (e.g. WMM, IGRF) */
  model?: string;
  timeoutMs?: number;
  retry?: HttpRetryConfig;
  logger?: Logger;
  /** Override the transport, mainly for tests */
  http?: HttpClient;
}

/**
 * Query parameters for the NOAA declination calculator
 */
export function buildQuery(
  request: RequestRecord,
  options: { apiKey?: string; model?: string } = {}
): Record<string, string> {
  const query: Record<string, string> = {
    lat1: String(request.latitude),
    lat1Hemisphere: CALCULATOR_DEFAULTS.LATITUDE_HEMISPHERE,
    lon1: String(request.longitude),
    lon1Hemisphere: CALCULATOR_DEFAULTS.LONGITUDE_HEMISPHERE,
    resultFormat: CALCULATOR_DEFAULTS.RESULT_FORMAT,
    startYear: request.year,
    startMonth: request.month,
    startDay: request.day,
  };

  if (options.apiKey) {
    query.key = options.apiKey;
  }
  if (options.model) {
    query.model = options.model;
  }

  return query;
}

export class NoaaDeclinationClient implements DeclinationClient {
  private endpoint: string;
  private apiKey?: string;
  private model?: string;
  private http: HttpClient;
  private logger?: Logger;

  constructor(config: NoaaClientConfig = {}) {
    this.endpoint = config.endpoint ?? CALCULATOR_DEFAULTS.ENDPOINT;
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.logger = config.logger;
    this.http =
      config.http ??
      new HttpClient({
        headers: { 'User-Agent': `magdecl/${VERSION}` },
        timeoutMs: config.timeoutMs,
        retry: config.retry,
        logger: config.logger,
      });
  }

  async fetch(request: RequestRecord): Promise<Result<string, TransportError>> {
    const query = buildQuery(request, { apiKey: this.apiKey, model: this.model });
    this.logger?.debug(`GET ${this.endpoint} lat1=${query.lat1} lon1=${query.lon1}`);

    try {
      const response = await this.http.get({ url: this.endpoint, query });
      return ok(response.data);
    } catch (error) {
      if (error instanceof TransportError) {
        return err(error);
      }
      throw error;
    }
  }
}
