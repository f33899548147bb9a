import axios, { AxiosInstance } from 'axios';
import type { Readable } from 'stream';
import { ProbeOutcome } from '../types';

export interface ProbeOptions {
  timeoutMs: number;
  expectedStatus: number;
}

export interface Prober {
  probe(endpoint: string, options: ProbeOptions): Promise<ProbeOutcome>;
}

const TIMEOUT_CODES = ['ECONNABORTED', 'ETIMEDOUT', 'ERR_CANCELED'];
const CONNECTION_CODES = ['ECONNREFUSED', 'ENOTFOUND', 'ECONNRESET', 'EHOSTUNREACH', 'ENETUNREACH', 'EAI_AGAIN', 'EPIPE'];

/**
 * Maps a request failure onto a probe outcome
 */
export function classifyProbeError(error: unknown): ProbeOutcome {
  if (axios.isCancel(error)) {
    return { kind: 'timeout' };
  }
  if (axios.isAxiosError(error)) {
    const code = error.code ?? '';
    if (TIMEOUT_CODES.includes(code) || error.message.toLowerCase().includes('timeout')) {
      return { kind: 'timeout' };
    }
    if (CONNECTION_CODES.includes(code)) {
      return { kind: 'connection_failed', message: code };
    }
    return { kind: 'other_error', message: error.message };
  }
  return { kind: 'other_error', message: error instanceof Error ? error.message : String(error) };
}

export class HttpProber implements Prober {
  private httpClient: AxiosInstance;

  constructor(userAgent: string = 'traffic-controller/1.0') {
    this.httpClient = axios.create({
      maxRedirects: 5,
      validateStatus: () => true, // status is classified below, never thrown
      headers: {
        'User-Agent': userAgent,
        Accept: 'text/html,application/json,*/*'
      }
    });
  }

  async probe(endpoint: string, options: ProbeOptions): Promise<ProbeOutcome> {
    const startTime = Date.now();

    try {
      // The abort signal bounds the whole exchange, including redirects
      const response = await this.httpClient.get<Readable>(endpoint, {
        timeout: options.timeoutMs,
        signal: AbortSignal.timeout(options.timeoutMs),
        responseType: 'stream'
      });
      const responseTimeMs = Date.now() - startTime;
      // Only the status matters; the body is never read
      response.data.destroy();

      if (response.status === options.expectedStatus) {
        return { kind: 'success', statusCode: response.status, responseTimeMs };
      }
      return { kind: 'unexpected_status', statusCode: response.status, responseTimeMs };
    } catch (error) {
      return classifyProbeError(error);
    }
  }
}
