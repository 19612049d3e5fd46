import {
  AxiosError,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig
} from 'axios';

/**
 * In-process axios transport for client tests. No sockets are opened.
 */

export interface RecordedRequest {
  method?: string;
  url?: string;
  baseURL?: string;
  params: unknown;
  body: unknown;
  headers: InternalAxiosRequestConfig['headers'];
}

export type StubReply =
  | { status?: number; data: unknown }
  | Error;

export interface StubTransport {
  adapter: AxiosAdapter;
  requests: RecordedRequest[];
}

export function createStubTransport(replies: StubReply[]): StubTransport {
  const requests: RecordedRequest[] = [];
  const queue = [...replies];

  const adapter: AxiosAdapter = async (config) => {
    requests.push({
      method: config.method,
      url: config.url,
      baseURL: config.baseURL,
      params: config.params,
      body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
      headers: config.headers
    });

    const reply = queue.shift();
    if (reply === undefined) {
      throw new Error(`No stubbed reply for ${config.method} ${config.url}`);
    }

    if (reply instanceof Error) {
      throw reply;
    }

    const status = reply.status ?? 200;
    const response: AxiosResponse = {
      data: reply.data,
      status,
      statusText: String(status),
      headers: {},
      config
    };

    if (status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${status}`,
        status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
        config,
        null,
        response
      );
    }

    return response;
  };

  return { adapter, requests };
}

/**
 * Network-level failure, as axios reports a refused connection
 */
export function connectionRefused(): AxiosError {
  return new AxiosError('connect ECONNREFUSED 127.0.0.1:443', 'ECONNREFUSED');
}
