/**
 * HTTP transport for the catalog client. Maps every failure onto the
 * source error taxonomy so the retry layer can decide what to repeat.
 */

import axios, { type AxiosInstance } from "axios";
import {
  PermanentSourceError,
  TransientSourceError,
  isTransientStatus,
} from "./errors.js";

export type QueryParams = Readonly<Record<string, string>>;

export interface HttpTransport {
  /** GET `url` with `params`, returning the body as text */
  getText(url: string, params: QueryParams): Promise<string>;
}

export interface AxiosTransportOptions {
  timeoutMs?: number;
  userAgent: string;
}

function describeUrl(url: string, params: QueryParams): string {
  const query = new URLSearchParams(
    Object.entries(params).filter(([key]) => key !== "api_key")
  ).toString();
  return query ? `${url}?${query}` : url;
}

export class AxiosTransport implements HttpTransport {
  private readonly client: AxiosInstance;

  constructor(options: AxiosTransportOptions) {
    this.client = axios.create({
      timeout: options.timeoutMs ?? 60_000,
      responseType: "text",
      // Status handling happens below so 4xx/5xx never throw from axios
      validateStatus: () => true,
      headers: {
        "User-Agent": options.userAgent,
        Accept: "application/xml,text/xml,text/csv,application/json;q=0.9,*/*;q=0.8",
      },
    });
  }

  async getText(url: string, params: QueryParams): Promise<string> {
    const shown = describeUrl(url, params);
    let status: number;
    let body: unknown;

    try {
      const response = await this.client.get<unknown>(url, { params });
      status = response.status;
      body = response.data;
    } catch (err) {
      const code = axios.isAxiosError(err) ? err.code ?? "network" : "network";
      throw new TransientSourceError(`GET ${shown} failed (${code})`, {
        url: shown,
        cause: err,
      });
    }

    if (isTransientStatus(status)) {
      throw new TransientSourceError(`GET ${shown} returned HTTP ${status}`, {
        url: shown,
        status,
      });
    }
    if (status < 200 || status >= 300) {
      throw new PermanentSourceError(`GET ${shown} returned HTTP ${status}`, {
        url: shown,
        status,
      });
    }

    const text = typeof body === "string" ? body : JSON.stringify(body ?? "");
    if (text.trim() === "") {
      throw new TransientSourceError(`GET ${shown} returned an empty body`, {
        url: shown,
        status,
      });
    }
    return text;
  }
}
