import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';

import { ZapConnectionConfig } from '../../types/config';
import { isRecord, readString } from '../../utils/helpers/common-helpers';
import { Logger } from '../../utils/logger/Logger';
import { RemoteOperationError, getErrorMessage } from '../errors';

export type ApiParams = Record<string, string | number | boolean | undefined>;

export interface ZapApiClientOptions {
  /** Per-request timeout (ms) */
  timeoutMs?: number;
  /** Transport override, used by tests to answer requests in-process */
  adapter?: AxiosAdapter;
  logger?: Logger;
}

export interface PingResult {
  reachable: boolean;
  version?: string;
  /** Error ZAP returned for the version check, such as a missing API key */
  apiError?: string;
}

const DEFAULT_TIMEOUT_MS = 30000;
const PING_TIMEOUT_MS = 5000;

/**
 * Thin wrapper over the ZAP HTTP API (`/JSON/<component>/<view|action>/<name>/`)
 */
export class ZapApiClient {
  public readonly baseUrl: string;
  private readonly http: AxiosInstance;
  private readonly logger: Logger;

  constructor(config: Pick<ZapConnectionConfig, 'zapUrl' | 'port' | 'apiKey'>, options: ZapApiClientOptions = {}) {
    this.baseUrl = buildBaseUrl(config.zapUrl, config.port);
    this.logger = options.logger ?? new Logger({ prefix: 'ZapApiClient' });
    this.http = axios.create({
      baseURL: this.baseUrl,
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      adapter: options.adapter,
      headers: config.apiKey ? { 'X-ZAP-API-Key': config.apiKey } : {},
      // API errors come back as JSON bodies with 4xx/5xx codes; inspect them ourselves
      validateStatus: () => true,
    });
  }

  async view(component: string, name: string, params: ApiParams = {}): Promise<Record<string, unknown>> {
    return this.json(component, 'view', name, params);
  }

  async action(component: string, name: string, params: ApiParams = {}): Promise<Record<string, unknown>> {
    return this.json(component, 'action', name, params);
  }

  /**
   * Call an `/OTHER/` endpoint, which answers with raw text (reports)
   */
  async other(component: string, name: string, params: ApiParams = {}): Promise<string> {
    const operation = `${component}.${name}`;
    const response = await this.send(operation, `/OTHER/${component}/other/${name}/`, params, 'text');
    if (response.status >= 400) {
      throw new RemoteOperationError(operation, `ZAP API error for ${operation}: HTTP ${response.status}`);
    }
    return typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
  }

  /**
   * Check whether a ZAP daemon answers at the base URL.
   *
   * A refused connection means not reachable. A ZAP API error body (such as
   * `bad_api_key`) still means ZAP is up. Anything else that answers without
   * a ZAP version is some other process holding the port.
   */
  async ping(): Promise<PingResult> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get('/JSON/core/view/version/', { timeout: PING_TIMEOUT_MS });
    } catch (error) {
      this.logger.debug(`ZAP did not answer at ${this.baseUrl}: ${getErrorMessage(error)}`);
      return { reachable: false };
    }

    const body = response.data;
    if (isRecord(body)) {
      const version = readString(body, 'version');
      if (response.status === 200 && version !== undefined) {
        return { reachable: true, version };
      }
      // ZAP refuses the call (e.g. bad_api_key) but is still the one answering
      const code = readString(body, 'code');
      if (response.status >= 400 && code !== undefined) {
        return { reachable: true, apiError: readString(body, 'message') ?? code };
      }
    }
    throw new RemoteOperationError('core.version', `Another process is listening on ${this.baseUrl}`);
  }

  private async json(
    component: string,
    type: 'view' | 'action',
    name: string,
    params: ApiParams
  ): Promise<Record<string, unknown>> {
    const operation = `${component}.${name}`;
    const response = await this.send(operation, `/JSON/${component}/${type}/${name}/`, params, 'json');
    const body = response.data;

    if (isRecord(body) && typeof body.code === 'string' && response.status >= 400) {
      const message = readString(body, 'message') ?? body.code;
      throw new RemoteOperationError(operation, `ZAP API error for ${operation}: ${message}`);
    }
    if (response.status >= 400) {
      throw new RemoteOperationError(operation, `ZAP API error for ${operation}: HTTP ${response.status}`);
    }
    if (!isRecord(body)) {
      throw new RemoteOperationError(operation, `Unexpected response from ZAP for ${operation}`);
    }
    return body;
  }

  private async send(
    operation: string,
    url: string,
    params: ApiParams,
    responseType: 'json' | 'text'
  ): Promise<AxiosResponse<unknown>> {
    this.logger.debug(`GET ${url}`);
    try {
      return await this.http.get(url, { params: compactParams(params), responseType });
    } catch (error) {
      throw new RemoteOperationError(
        operation,
        `Could not reach ZAP at ${this.baseUrl} for ${operation}: ${getErrorMessage(error)}`,
        { cause: error }
      );
    }
  }
}

/**
 * Combine the daemon URL and port into an origin, e.g. `http://127.0.0.1:8090`
 */
export function buildBaseUrl(zapUrl: string, port: number): string {
  const url = new URL(zapUrl);
  url.port = String(port);
  return url.origin;
}

function compactParams(params: ApiParams): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) result[key] = String(value);
  }
  return result;
}
