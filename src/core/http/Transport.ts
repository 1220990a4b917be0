// src/core/http/Transport.ts

import axios, { type AxiosInstance } from 'axios';
import * as http from 'http';
import * as https from 'https';
import type { HttpMethod } from '../endpoints/types';

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
}

export interface TransportResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * Performs exactly one HTTP request. Any status is a resolved response;
 * only failures below HTTP (timeout, reset, DNS) reject.
 */
export interface Transport {
  perform(request: TransportRequest): Promise<TransportResponse>;
}

export interface AxiosTransportOptions {
  timeout?: number;
  keepAlive?: boolean;
}

export class AxiosTransport implements Transport {
  private axiosInstance: AxiosInstance;

  constructor(options: AxiosTransportOptions = {}) {
    const keepAlive = options.keepAlive ?? true;

    this.axiosInstance = axios.create({
      timeout: options.timeout ?? 30000,
      httpAgent: new http.Agent({ keepAlive }),
      httpsAgent: new https.Agent({ keepAlive }),
      responseType: 'text',
      // Bodies are classified or decoded by the pipeline, never by axios
      transformResponse: [(data) => data],
      validateStatus: () => true,
    });
  }

  async perform(request: TransportRequest): Promise<TransportResponse> {
    const response = await this.axiosInstance.request<unknown>({
      url: request.url,
      method: request.method,
      headers: request.headers,
      data: request.body,
    });

    return {
      status: response.status,
      headers: toHeaderRecord(response.headers),
      body: toText(response.data),
    };
  }
}

export function toHeaderRecord(headers: object): Record<string, string> {
  const record: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      record[key.toLowerCase()] = value;
    }
  }
  return record;
}

function toText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return JSON.stringify(data);
}
