import axios from 'axios';

import { NetworkError } from './errors.js';
import { logger } from './logger.js';

export interface HttpOptions {
  timeoutMs: number;
}

/** Fetches a URL as text. */
export type TextFetcher = (url: string, options: HttpOptions) => Promise<string>;

/** Fetches a URL as bytes; resolves undefined when the server answers 404. */
export type BinaryFetcher = (url: string, options: HttpOptions) => Promise<Buffer | undefined>;

function describeHttpFailure(error: unknown): string {
  if (axios.isAxiosError(error)) {
    return error.response ? `HTTP ${error.response.status}` : error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

export const fetchText: TextFetcher = async (url, options) => {
  logger.debug(`GET ${url}`);
  try {
    const response = await axios.get<string>(url, {
      responseType: 'text',
      timeout: options.timeoutMs,
      transformResponse: data => data
    });
    return response.data;
  } catch (error) {
    throw new NetworkError(`Failed to fetch ${url}: ${describeHttpFailure(error)}`, { url });
  }
};

export const fetchBinary: BinaryFetcher = async (url, options) => {
  logger.debug(`GET ${url}`);
  try {
    const response = await axios.get<ArrayBuffer>(url, {
      responseType: 'arraybuffer',
      timeout: options.timeoutMs,
      maxRedirects: 5
    });
    return Buffer.from(response.data);
  } catch (error) {
    if (axios.isAxiosError(error) && error.response?.status === 404) {
      return undefined;
    }
    throw new NetworkError(`Failed to download ${url}: ${describeHttpFailure(error)}`, { url });
  }
};
