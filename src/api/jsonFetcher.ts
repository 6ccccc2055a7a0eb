import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import { FetchError } from '../utils/errors';

export type RequestParams = Record<string, string | number>;

/**
 * Gửi request HTTP và trả về body đã decode JSON.
 * Mọi lỗi mạng, status không phải 2xx hoặc JSON hỏng đều là FetchError.
 */
export interface JsonFetcher {
  get(url: string, params: RequestParams): Promise<unknown>;
  post(url: string, params: RequestParams): Promise<unknown>;
}

export interface AxiosJsonFetcherOptions {
  userAgent: string;
  timeoutMs: number;
  adapter?: AxiosAdapter;
}

export class AxiosJsonFetcher implements JsonFetcher {
  private readonly http: AxiosInstance;

  constructor(options: AxiosJsonFetcherOptions) {
    this.http = axios.create({
      headers: {
        'User-Agent': options.userAgent,
        'Accept': 'application/json',
      },
      timeout: options.timeoutMs,
      adapter: options.adapter,
      // Tự kiểm tra status và tự parse JSON để phân biệt các loại lỗi
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      validateStatus: () => true,
    });
  }

  async get(url: string, params: RequestParams): Promise<unknown> {
    const response = await this.send(url, () => this.http.get<unknown>(url, { params }));
    return this.decode(url, response);
  }

  async post(url: string, params: RequestParams): Promise<unknown> {
    const form = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      form.append(key, String(value));
    }

    const response = await this.send(url, () =>
      this.http.post<unknown>(url, form.toString(), {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      })
    );
    return this.decode(url, response);
  }

  private async send(
    url: string,
    request: () => Promise<AxiosResponse<unknown>>
  ): Promise<AxiosResponse<unknown>> {
    let response: AxiosResponse<unknown>;
    try {
      response = await request();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new FetchError(`Request to ${url} failed: ${reason}`, url);
    }

    if (response.status < 200 || response.status >= 300) {
      throw new FetchError(`Request to ${url} returned HTTP ${response.status}`, url, response.status);
    }
    return response;
  }

  private decode(url: string, response: AxiosResponse<unknown>): unknown {
    if (typeof response.data !== 'string') {
      throw new FetchError(`Response from ${url} is not a text body`, url, response.status);
    }

    try {
      return JSON.parse(response.data);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new FetchError(`Response from ${url} is not valid JSON: ${reason}`, url, response.status);
    }
  }
}
