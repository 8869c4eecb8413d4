import axios, { AxiosHeaders, type AxiosInstance, type AxiosResponse, type InternalAxiosRequestConfig } from "axios";

export interface RecordedRequest {
  method: string;
  url: string;
  params: Record<string, unknown>;
  headers: Record<string, string>;
  data: unknown;
}

export interface StubResponse {
  status: number;
  data?: unknown;
  headers?: Record<string, string>;
}

export type Responder = (request: RecordedRequest) => StubResponse | Promise<StubResponse>;

function toParams(value: unknown): Record<string, unknown> {
  if (value === null || typeof value !== "object") return {};
  return Object.fromEntries(Object.entries(value));
}

/**
 * An axios instance whose adapter answers from `responder` instead of the
 * network. Every request is recorded; every status resolves, like the
 * client built by createHttpClient.
 */
export function stubHttp(responder: Responder): { http: AxiosInstance; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];

  const http = axios.create({
    validateStatus: () => true,
    adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
      const headers = Object.fromEntries(
        Object.entries(AxiosHeaders.from(config.headers).toJSON(true)).map(([k, v]) => [
          k.toLowerCase(),
          String(v),
        ])
      );
      const request: RecordedRequest = {
        method: (config.method ?? "get").toUpperCase(),
        url: config.url ?? "",
        params: toParams(config.params),
        headers,
        data: config.data,
      };
      requests.push(request);

      const stub = await responder(request);
      return {
        status: stub.status,
        statusText: String(stub.status),
        data: stub.data ?? "",
        headers: AxiosHeaders.from(
          Object.fromEntries(Object.entries(stub.headers ?? {}).map(([k, v]) => [k.toLowerCase(), v]))
        ),
        config,
      };
    },
  });

  return { http, requests };
}
