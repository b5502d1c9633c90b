import { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

import { isRecord, readString } from '../../src/utils/helpers/common-helpers';

export interface StubReply {
  status?: number;
  data: unknown;
}

export type StubRoute = (params: Record<string, string>) => StubReply;

export interface StubRequest {
  path: string;
  params: Record<string, string>;
  apiKey?: string;
}

/**
 * In-process stand-in for the ZAP HTTP API, plugged into axios as its adapter
 */
export class ZapStub {
  public readonly requests: StubRequest[] = [];
  /** Refuse every connection, as if nothing listens on the port */
  public down = false;
  private readonly routes = new Map<string, StubRoute>();

  on(path: string, route: StubRoute | StubReply): this {
    this.routes.set(path, typeof route === 'function' ? route : () => route);
    return this;
  }

  /** Answer successive calls with successive replies, repeating the last one */
  sequence(path: string, replies: StubReply[]): this {
    let index = 0;
    return this.on(path, () => replies[Math.min(index++, replies.length - 1)]);
  }

  paths(): string[] {
    return this.requests.map((r) => r.path);
  }

  readonly adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    if (this.down) {
      throw new Error('connect ECONNREFUSED 127.0.0.1:8090');
    }

    const path = config.url ?? '';
    const params: Record<string, string> = {};
    if (isRecord(config.params)) {
      for (const key of Object.keys(config.params)) {
        const value = readString(config.params, key);
        if (value !== undefined) params[key] = value;
      }
    }
    const apiKey = config.headers.get('X-ZAP-API-Key');
    this.requests.push({ path, params, apiKey: typeof apiKey === 'string' ? apiKey : undefined });

    const route = this.routes.get(path);
    const reply: StubReply = route
      ? route(params)
      : { status: 400, data: { code: 'bad_view', message: `No route for ${path}` } };
    const status = reply.status ?? 200;
    return { data: reply.data, status, statusText: String(status), headers: {}, config };
  };
}

export const OK = { data: { Result: 'OK' } } satisfies StubReply;
